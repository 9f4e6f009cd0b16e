/**
 * Prints an Outcome and picks the exit code.
 *
 * stdout: success body (or its --pretty summary)
 * stderr: everything else
 */

import { ResponseFormatError, type Outcome } from "@dgraph-admin/sdk";
import { EXIT_CODES, type ExitCode } from "../exit-codes.js";
import type { Presenter } from "./presenters.js";

export interface PrintOptions {
  /** Summarize success bodies instead of printing them raw. */
  presenter?: Presenter;
  /** The request changes data, so a lost response leaves its effect unknown. */
  destructive?: boolean;
}

export function printOutcome(outcome: Outcome, options: PrintOptions = {}): ExitCode {
  switch (outcome.kind) {
    case "success": {
      if (!options.presenter) {
        console.log(outcome.body);
        return EXIT_CODES.success;
      }
      try {
        const summary = options.presenter(outcome.body);
        if (summary !== "") {
          console.log(summary);
        }
        return EXIT_CODES.success;
      } catch (err) {
        if (err instanceof ResponseFormatError) {
          console.error(`Error: ${err.message}`);
          return EXIT_CODES.applicationError;
        }
        throw err;
      }
    }
    case "application-error":
      console.error(`Error: HTTP ${outcome.statusCode}`);
      if (outcome.body !== "") {
        console.error(outcome.body);
      }
      return EXIT_CODES.applicationError;
    case "transport-error":
      console.error(`Error: ${outcome.cause}`);
      if (options.destructive) {
        console.error("Outcome unknown: the request may have reached the server. Check its state before retrying.");
      }
      return EXIT_CODES.transportError;
  }
}
