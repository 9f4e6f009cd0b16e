/**
 * Target instance for one invocation.
 */

export interface AuthHeader {
  /** Header name, as supplied (e.g. "X-Dgraph-AuthToken"). */
  name: string;
  /** Header value, verbatim. */
  value: string;
}

export interface EndpointConfig {
  /** Absolute http(s) origin, without a trailing path (e.g. "http://localhost:8080"). */
  readonly baseUrl: string;
  readonly authHeader?: Readonly<AuthHeader>;
  /** Upper bound for one HTTP round trip. */
  readonly timeoutMs: number;
}
