// Types
export type {
  AdminCommand,
  AdminCommandKind,
  UpdateSchemaCommand,
  GetSchemaCommand,
  DropAllCommand,
  DropDataCommand,
  GetHealthCommand,
} from "./types/command.js";

export { ADMIN_COMMAND_KINDS, isDropCommand } from "./types/command.js";

export type { AuthHeader, EndpointConfig } from "./types/endpoint.js";

export type { HttpMethod, RequestDescriptor } from "./types/request.js";

export type {
  Outcome,
  OutcomeKind,
  SuccessOutcome,
  ApplicationErrorOutcome,
  TransportErrorOutcome,
} from "./types/outcome.js";

export type { HealthEntry } from "./types/health.js";

// Errors
export { AdminError, ConfigurationError, ResponseFormatError } from "./errors/base.js";
export { ErrorCode } from "./errors/codes.js";
export type { ErrorCodeValue } from "./errors/codes.js";
