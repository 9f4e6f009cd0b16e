/**
 * CLI subcommand router.
 *
 * Supports:
 *   - dgraph-admin [--url <url>] [--auth <Name:Value>] [--timeout <ms>] [--pretty] [--verbose] <command>
 *   - dgraph-admin version [--verbose]
 *   - dgraph-admin --help
 */

import { DEFAULT_TIMEOUT_MS } from "@dgraph-admin/core";
import { MAX_TIMEOUT_MS } from "@dgraph-admin/shared";
import type { CliCommand } from "./commands/base.js";
import type { AdminCommandDeps } from "./commands/admin-command.js";
import { UpdateSchemaCommand } from "./commands/update-schema.js";
import { GetSchemaCommand } from "./commands/get-schema.js";
import { DropAllCommand } from "./commands/drop-all.js";
import { DropDataCommand } from "./commands/drop-data.js";
import { GetHealthCommand } from "./commands/get-health.js";
import { VersionCommand } from "./commands/version.js";
import { parseArgs } from "./utils/args.js";
import { ENV_VARS } from "./utils/endpoint-options.js";
import { EXIT_CODES } from "./exit-codes.js";

export function createCommands(deps: AdminCommandDeps = {}): CliCommand[] {
  return [
    new UpdateSchemaCommand(deps),
    new GetSchemaCommand(deps),
    new DropAllCommand(deps),
    new DropDataCommand(deps),
    new GetHealthCommand(deps),
    new VersionCommand(),
  ];
}

export function printHelp(commands: CliCommand[]): void {
  const width = Math.max(...commands.map((cmd) => (cmd.usage ?? cmd.name).length)) + 2;

  console.log("dgraph-admin is a simple tool for managing dgraph.");
  console.log("");
  console.log("Usage: dgraph-admin [options] <command>");
  console.log("");
  console.log("Commands:");
  for (const cmd of commands) {
    console.log(`  ${(cmd.usage ?? cmd.name).padEnd(width)}${cmd.description}`);
  }
  console.log("");
  console.log("Options:");
  console.log(`  --url <url>          Database URL (default: localhost:8080, env: ${ENV_VARS.url})`);
  console.log(`  --auth <Name:Value>  Auth header to include with the request (env: ${ENV_VARS.auth})`);
  console.log(`  --timeout <ms>       Request timeout in milliseconds (default: ${DEFAULT_TIMEOUT_MS}, max: ${MAX_TIMEOUT_MS}, env: ${ENV_VARS.timeoutMs})`);
  console.log("  --pretty             Print a summary instead of the raw response");
  console.log("  --verbose            Log request details to stderr");
  console.log("  --help, -h           Show this help message");
}

export async function runCli(argv: string[], deps: AdminCommandDeps = {}): Promise<number> {
  const parsed = parseArgs(argv);
  const commands = createCommands(deps);

  if (parsed.flags.help === true || parsed.flags.h === true) {
    printHelp(commands);
    return EXIT_CODES.success;
  }

  if (parsed.command === "") {
    printHelp(commands);
    return EXIT_CODES.usage;
  }

  const command = commands.find((cmd) => cmd.name === parsed.command);
  if (!command) {
    console.error(`Unknown command: ${parsed.command}`);
    console.error(`Available commands: ${commands.map((cmd) => cmd.name).join(", ")}`);
    return EXIT_CODES.usage;
  }

  return command.execute(parsed);
}
