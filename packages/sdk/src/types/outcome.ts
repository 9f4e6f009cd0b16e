/**
 * Result of executing one request descriptor.
 */

export interface SuccessOutcome {
  kind: "success";
  body: string;
}

export interface ApplicationErrorOutcome {
  kind: "application-error";
  statusCode: number;
  /** Server error payload, unmodified. */
  body: string;
}

export interface TransportErrorOutcome {
  kind: "transport-error";
  /** No response was received, so there is no status code. */
  cause: string;
}

export type Outcome = SuccessOutcome | ApplicationErrorOutcome | TransportErrorOutcome;

export type OutcomeKind = Outcome["kind"];
