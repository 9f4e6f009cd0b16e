/**
 * Error hierarchy for the admin client.
 *
 * Non-2xx responses and transport failures are Outcome values, not errors.
 * These classes cover problems detected locally.
 */

import { ErrorCode } from "./codes.js";

export class AdminError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AdminError";
  }
}

/**
 * Invalid local input: blank schema, malformed auth header, bad URL or timeout.
 * Always raised before any request is sent.
 */
export class ConfigurationError extends AdminError {
  constructor(
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, options?.code ?? ErrorCode.CONFIG_ERROR, options);
    this.name = "ConfigurationError";
  }
}

/**
 * A success body that could not be interpreted for display.
 */
export class ResponseFormatError extends AdminError {
  constructor(
    public readonly command: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Unexpected "${command}" response: ${message}`, ErrorCode.RESPONSE_FORMAT_ERROR, options);
    this.name = "ResponseFormatError";
  }
}
