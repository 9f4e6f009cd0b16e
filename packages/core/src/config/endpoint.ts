/**
 * Builds the immutable EndpointConfig for one invocation.
 *
 * Raw options (flags/env) are shape-checked with EndpointOptionsSchema, then:
 *   - the URL gets "http://" when it has no scheme and is cut down to its origin
 *   - the auth string is split once, on the first ":", into name and value
 */

import {
  ConfigurationError,
  ErrorCode,
  type AuthHeader,
  type EndpointConfig,
} from "@dgraph-admin/sdk";
import { EndpointOptionsSchema, formatZodError } from "@dgraph-admin/shared";

/** Alpha's HTTP port on the local machine. */
export const DEFAULT_BASE_URL = "http://localhost:8080";

export const DEFAULT_TIMEOUT_MS = 30_000;

// RFC 9110 token characters.
const HEADER_NAME_PATTERN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;
// Header values are byte strings: tab, visible ASCII and Latin-1 only.
const HEADER_VALUE_PATTERN = /^[\t\x20-\x7e\x80-\xff]*$/;
const SCHEME_PATTERN = /^([a-z][a-z0-9+.-]*):\/\//i;

export function parseAuthHeader(raw: string): AuthHeader {
  const separator = raw.indexOf(":");
  if (separator === -1) {
    throw new ConfigurationError(
      'Auth header must be given as "Name:Value" (no ":" found)',
      { code: ErrorCode.INVALID_AUTH_HEADER },
    );
  }

  const name = raw.slice(0, separator).trim();
  const value = raw.slice(separator + 1).trim();

  if (name === "") {
    throw new ConfigurationError("Auth header name must not be empty", {
      code: ErrorCode.INVALID_AUTH_HEADER,
    });
  }
  if (!HEADER_NAME_PATTERN.test(name)) {
    throw new ConfigurationError(`Auth header name "${name}" is not a valid HTTP header name`, {
      code: ErrorCode.INVALID_AUTH_HEADER,
    });
  }
  if (/[\r\n\0]/.test(value)) {
    throw new ConfigurationError("Auth header value must not contain line breaks", {
      code: ErrorCode.INVALID_AUTH_HEADER,
    });
  }

  if (!HEADER_VALUE_PATTERN.test(value)) {
    throw new ConfigurationError("Auth header value must contain only Latin-1 characters", {
      code: ErrorCode.INVALID_AUTH_HEADER,
    });
  }

  return { name, value };
}

/**
 * "localhost:8080" → "http://localhost:8080"
 * "https://x.cloud.dgraph.io/graphql" → "https://x.cloud.dgraph.io"
 */
export function normalizeBaseUrl(raw: string): string {
  const input = raw.trim();
  const scheme = SCHEME_PATTERN.exec(input)?.[1]?.toLowerCase();

  if (scheme !== undefined && scheme !== "http" && scheme !== "https") {
    throw new ConfigurationError(`Unsupported URL scheme "${scheme}" in "${raw}"; use http or https`, {
      code: ErrorCode.INVALID_URL,
    });
  }

  const candidate = scheme === undefined ? `http://${input}` : input;
  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch (err) {
    throw new ConfigurationError(`Invalid URL "${raw}"`, {
      code: ErrorCode.INVALID_URL,
      cause: err,
    });
  }

  return parsed.origin;
}

/** Validate raw options and freeze them into an EndpointConfig. */
export function createEndpointConfig(options: unknown = {}): EndpointConfig {
  const result = EndpointOptionsSchema.safeParse(options);
  if (!result.success) {
    const field = result.error.issues[0]?.path[0];
    throw new ConfigurationError(`Invalid endpoint options: ${formatZodError(result.error)}`, {
      code:
        field === "timeoutMs"
          ? ErrorCode.INVALID_TIMEOUT
          : field === "url"
            ? ErrorCode.INVALID_URL
            : ErrorCode.CONFIG_ERROR,
      cause: result.error,
    });
  }

  const { url, auth, timeoutMs } = result.data;
  const baseUrl = normalizeBaseUrl(url ?? DEFAULT_BASE_URL);
  const resolvedTimeout = timeoutMs ?? DEFAULT_TIMEOUT_MS;

  if (auth === undefined) {
    return Object.freeze({ baseUrl, timeoutMs: resolvedTimeout });
  }
  return Object.freeze({
    baseUrl,
    authHeader: Object.freeze(parseAuthHeader(auth)),
    timeoutMs: resolvedTimeout,
  });
}
