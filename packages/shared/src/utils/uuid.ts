import { randomUUID } from "node:crypto";

/** Correlates the log lines of one invocation. */
export function generateRequestId(): string {
  return randomUUID();
}
