/**
 * Stable error codes carried by AdminError.code.
 */
export const ErrorCode = {
  CONFIG_ERROR: "CONFIG_ERROR",
  EMPTY_SCHEMA: "EMPTY_SCHEMA",
  INVALID_AUTH_HEADER: "INVALID_AUTH_HEADER",
  INVALID_URL: "INVALID_URL",
  INVALID_TIMEOUT: "INVALID_TIMEOUT",
  SCHEMA_READ_FAILED: "SCHEMA_READ_FAILED",
  RESPONSE_FORMAT_ERROR: "RESPONSE_FORMAT_ERROR",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];
