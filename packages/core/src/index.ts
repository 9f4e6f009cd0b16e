// Configuration
export {
  createEndpointConfig,
  normalizeBaseUrl,
  parseAuthHeader,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT_MS,
} from "./config/endpoint.js";

// Command Resolver
export { resolveCommand } from "./resolver/command-resolver.js";
export { ADMIN_PATHS, CONTENT_TYPES } from "./resolver/paths.js";
export type { DropOperation } from "./resolver/paths.js";

// Request Executor
export { createRequestExecutor, describeTransportFailure, joinUrl } from "./executor/request-executor.js";
export type { RequestExecutor, RequestExecutorOptions } from "./executor/request-executor.js";
export { createFetchTransport } from "./executor/http-transport.js";
export type { HttpTransport, HttpRequest, HttpResponse, FetchFn } from "./executor/http-transport.js";

// Composition
export { runCommand } from "./client/run-command.js";

// Response readers
export { interpretAlterResult, interpretSchema, interpretHealth } from "./interpret/responses.js";
