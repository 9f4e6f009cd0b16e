/**
 * Admin commands understood by the resolver.
 *
 * Each variant is tagged by `kind`, which is also the CLI subcommand name.
 */

export interface UpdateSchemaCommand {
  kind: "update-schema";
  /** New schema text. Missing or blank fails resolution. */
  schema?: string;
}

export interface GetSchemaCommand {
  kind: "get-schema";
}

export interface DropAllCommand {
  kind: "drop-all";
}

export interface DropDataCommand {
  kind: "drop-data";
}

export interface GetHealthCommand {
  kind: "get-health";
}

export type AdminCommand =
  | UpdateSchemaCommand
  | GetSchemaCommand
  | DropAllCommand
  | DropDataCommand
  | GetHealthCommand;

export type AdminCommandKind = AdminCommand["kind"];

export const ADMIN_COMMAND_KINDS: readonly AdminCommandKind[] = [
  "update-schema",
  "get-schema",
  "drop-all",
  "drop-data",
  "get-health",
] as const;

/** Commands that destroy data on the server. */
export function isDropCommand(command: AdminCommand): command is DropAllCommand | DropDataCommand {
  return command.kind === "drop-all" || command.kind === "drop-data";
}
