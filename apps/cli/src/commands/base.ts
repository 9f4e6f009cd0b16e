/**
 * Base command interface for all CLI subcommands.
 */

export interface ParsedArgs {
  /** Command name (e.g., "get-health") */
  command: string;

  /** Named flags (e.g., { url: "localhost:8080", pretty: true }) */
  flags: Record<string, string | boolean>;

  /** Positional arguments after the command (e.g., ["schema.dql"]) */
  positional: string[];
}

export interface CliCommand {
  /** Command name (e.g., "get-schema", "version") */
  name: string;

  /** Command description for help text */
  description: string;

  /** Usage line shown in help, without the program name */
  usage?: string;

  /** Execute the command with parsed arguments */
  execute(args: ParsedArgs): Promise<number>; // Exit code, see EXIT_CODES
}
