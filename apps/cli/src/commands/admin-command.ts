/**
 * Shared flow for the five admin subcommands:
 *   flags/env → EndpointConfig → AdminCommand → runCommand → printOutcome
 */

import {
  ConfigurationError,
  isDropCommand,
  type AdminCommand,
  type AdminCommandKind,
  type Outcome,
} from "@dgraph-admin/sdk";
import { createEndpointConfig, runCommand, type HttpTransport } from "@dgraph-admin/core";
import { createLogger, generateRequestId } from "@dgraph-admin/shared";
import type { CliCommand, ParsedArgs } from "./base.js";
import { collectEndpointOptions } from "../utils/endpoint-options.js";
import type { SchemaSource } from "../utils/schema-input.js";
import { printOutcome } from "../output/printer.js";
import { PRESENTERS } from "../output/presenters.js";
import { EXIT_CODES } from "../exit-codes.js";

export interface AdminCommandDeps {
  /** Replaces the fetch transport (tests). */
  transport?: HttpTransport;
  env?: NodeJS.ProcessEnv;
  stdin?: SchemaSource;
}

export abstract class AdminCliCommand implements CliCommand {
  abstract readonly name: AdminCommandKind;
  abstract readonly description: string;
  usage?: string;

  constructor(protected readonly deps: AdminCommandDeps = {}) {}

  /** Turn CLI arguments into the command to resolve. */
  protected abstract buildCommand(args: ParsedArgs): Promise<AdminCommand>;

  async execute(args: ParsedArgs): Promise<number> {
    const logger = createLogger("dgraph-admin", args.flags.verbose === true ? "debug" : undefined);
    logger.setContext({ command: this.name, requestId: generateRequestId() });

    let command: AdminCommand;
    let outcome: Outcome;
    try {
      const config = createEndpointConfig(collectEndpointOptions(args.flags, this.deps.env));
      logger.debug("Endpoint configured", {
        baseUrl: config.baseUrl,
        authHeader: config.authHeader?.name ?? null,
        timeoutMs: config.timeoutMs,
      });

      command = await this.buildCommand(args);
      outcome = await runCommand(command, config, {
        transport: this.deps.transport,
        logger: logger.child("executor"),
      });
    } catch (err) {
      if (err instanceof ConfigurationError) {
        console.error(`Error: ${err.message}`);
        return EXIT_CODES.usage;
      }
      throw err;
    }

    return printOutcome(outcome, {
      presenter: args.flags.pretty === true ? PRESENTERS[this.name] : undefined,
      destructive: isDropCommand(command),
    });
  }
}
