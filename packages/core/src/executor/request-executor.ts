/**
 * Request Executor: performs exactly one HTTP request per descriptor and
 * classifies the result as an Outcome.
 *
 *   2xx              → success (raw body)
 *   any other status → application-error (status + raw body, untouched)
 *   no response      → transport-error (readable cause, no status)
 *
 * No retries. Redirects are left to the transport's defaults.
 */

import type { EndpointConfig, Outcome, RequestDescriptor } from "@dgraph-admin/sdk";
import { createLogger, type Logger } from "@dgraph-admin/shared";
import { createFetchTransport, type HttpResponse, type HttpTransport } from "./http-transport.js";

const defaultLogger = createLogger("RequestExecutor");

export interface RequestExecutor {
  execute(descriptor: RequestDescriptor): Promise<Outcome>;
}

export interface RequestExecutorOptions {
  transport?: HttpTransport;
  logger?: Logger;
}

export function createRequestExecutor(
  config: EndpointConfig,
  options: RequestExecutorOptions = {},
): RequestExecutor {
  const transport = options.transport ?? createFetchTransport();
  const logger = options.logger ?? defaultLogger;

  return {
    async execute(descriptor: RequestDescriptor): Promise<Outcome> {
      const url = joinUrl(config.baseUrl, descriptor.path);
      // Header names only; values may be credentials.
      logger.debug(`${descriptor.method} ${url}`, {
        headers: Object.keys(descriptor.headers),
        bodyBytes: descriptor.body === undefined ? 0 : Buffer.byteLength(descriptor.body),
      });

      const stop = logger.time(`${descriptor.method} ${descriptor.path}`);
      let response: HttpResponse;
      try {
        response = await transport.send({
          url,
          method: descriptor.method,
          headers: descriptor.headers,
          body: descriptor.body,
          timeoutMs: config.timeoutMs,
        });
      } catch (err) {
        stop();
        const cause = describeTransportFailure(err, config.timeoutMs);
        logger.debug("No response received", { cause });
        return { kind: "transport-error", cause };
      }
      stop();

      logger.debug(`Response ${response.status}`, { status: response.status });
      if (response.status >= 200 && response.status < 300) {
        return { kind: "success", body: response.body };
      }
      return { kind: "application-error", statusCode: response.status, body: response.body };
    },
  };
}

export function joinUrl(baseUrl: string, path: string): string {
  const base = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  return path.startsWith("/") ? `${base}${path}` : `${base}/${path}`;
}

/**
 * Turn a fetch rejection into one line. Node's fetch reports network failures
 * as `TypeError("fetch failed")` with the socket error under `cause`.
 */
export function describeTransportFailure(err: unknown, timeoutMs: number): string {
  const name = errorName(err);
  if (name === "TimeoutError") {
    return `request timed out after ${timeoutMs}ms`;
  }
  if (name === "AbortError") {
    return "request aborted";
  }
  if (!(err instanceof Error)) {
    return String(err);
  }

  const messages: string[] = [];
  let current: unknown = err;
  while (current instanceof Error && messages.length < 4) {
    if (current.message && !messages.includes(current.message)) {
      messages.push(current.message);
    }
    current = current.cause;
  }
  return messages.length > 0 ? messages.join(": ") : err.name;
}

function errorName(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "name" in err && typeof err.name === "string") {
    return err.name;
  }
  return undefined;
}
