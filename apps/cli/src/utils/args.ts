/**
 * CLI argument parser.
 *
 * Hand-rolled minimal parser, no external CLI framework needed.
 */

import type { ParsedArgs } from "../commands/base.js";

/** Flags that never take a value, so `--pretty get-health` keeps its command. */
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(["pretty", "verbose", "help"]);

/**
 * Parse CLI arguments into structured ParsedArgs.
 *
 * Supported formats:
 *   - Long flag with value: --url localhost:8080
 *   - Long flag with inline value: --auth=X-Dgraph-AuthToken:abc
 *   - Boolean flag: --pretty (names in BOOLEAN_FLAGS never consume a value)
 *   - Short flag: -h (treated as boolean)
 *   - Command: first non-flag argument
 *   - Positional: remaining non-flag arguments ("-" counts as one, meaning stdin)
 *
 * Examples:
 *   parseArgs(["get-health", "--url", "localhost:8080"]) → { command: "get-health", flags: { url: "localhost:8080" }, positional: [] }
 *   parseArgs(["update-schema", "-"]) → { command: "update-schema", flags: {}, positional: ["-"] }
 *   parseArgs(["--help"]) → { command: "", flags: { help: true }, positional: [] }
 */
export function parseArgs(
  argv: string[],
  booleanFlags: ReadonlySet<string> = BOOLEAN_FLAGS,
): ParsedArgs {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];
  let command = "";

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    // Inline value: --auth=Name:Value
    if (arg.startsWith("--") && arg.includes("=")) {
      const eq = arg.indexOf("=");
      flags[arg.slice(2, eq)] = arg.slice(eq + 1);
      continue;
    }

    // Long flag with value: --url localhost:8080
    if (
      arg.startsWith("--") &&
      !booleanFlags.has(arg.slice(2)) &&
      next !== undefined &&
      next !== "" &&
      !isFlag(next)
    ) {
      flags[arg.slice(2)] = next;
      i++; // Skip next
      continue;
    }

    // Boolean flag: --pretty
    if (arg.startsWith("--")) {
      flags[arg.slice(2)] = true;
      continue;
    }

    // Short flag: -h
    if (arg.startsWith("-") && arg.length === 2) {
      flags[arg.slice(1)] = true;
      continue;
    }

    if (isFlag(arg)) {
      continue;
    }

    // First non-flag = command
    if (!command) {
      command = arg;
      continue;
    }

    positional.push(arg);
  }

  return { command, flags, positional };
}

function isFlag(arg: string): boolean {
  return arg.startsWith("-") && arg !== "-";
}
