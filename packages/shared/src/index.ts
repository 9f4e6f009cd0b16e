export { createLogger } from "./logger/index.js";
export type { Logger, LogLevel, LogContext } from "./logger/index.js";

export { generateRequestId } from "./utils/uuid.js";
export { formatZodError } from "./utils/validation.js";

export { EndpointOptionsSchema, MAX_TIMEOUT_MS } from "./utils/config-schema.js";
export type { EndpointOptions } from "./utils/config-schema.js";

export { formatDuration } from "./utils/duration.js";
