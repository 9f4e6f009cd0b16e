/**
 * HTTP transport seam.
 *
 * The executor talks to this interface so tests can swap the network for a
 * stub. `send` resolves for any HTTP response (whatever the status) and
 * rejects only when no response arrived.
 */

import type { HttpMethod } from "@dgraph-admin/sdk";

export interface HttpRequest {
  url: string;
  method: HttpMethod;
  headers: Readonly<Record<string, string>>;
  body?: string;
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

export type FetchFn = typeof fetch;

/**
 * Transport backed by the global fetch. The timeout covers connecting and
 * reading the whole body.
 */
export function createFetchTransport(fetchFn: FetchFn = fetch): HttpTransport {
  return {
    async send(request: HttpRequest): Promise<HttpResponse> {
      const response = await fetchFn(request.url, {
        method: request.method,
        headers: { ...request.headers },
        body: request.body,
        signal: AbortSignal.timeout(request.timeoutMs),
      });
      const body = await response.text();
      return { status: response.status, body };
    },
  };
}
