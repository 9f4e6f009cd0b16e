export type HttpMethod = "GET" | "POST";

/**
 * Fully specified HTTP request for one admin command.
 * Paths are relative to EndpointConfig.baseUrl.
 */
export interface RequestDescriptor {
  readonly method: HttpMethod;
  readonly path: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: string;
}
