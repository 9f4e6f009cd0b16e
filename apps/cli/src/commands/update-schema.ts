/**
 * Update Schema Command: add or modify the schema.
 *
 * Usage:
 *   dgraph-admin update-schema [file]
 *   cat schema.dql | dgraph-admin update-schema
 */

import type { AdminCommand } from "@dgraph-admin/sdk";
import { AdminCliCommand } from "./admin-command.js";
import type { ParsedArgs } from "./base.js";
import { readSchemaPayload } from "../utils/schema-input.js";

export class UpdateSchemaCommand extends AdminCliCommand {
  readonly name = "update-schema";
  readonly description = "Add or modify schema (reads stdin when no file is given)";
  usage = "update-schema [file|-]";

  protected async buildCommand(args: ParsedArgs): Promise<AdminCommand> {
    const schema = await readSchemaPayload(args.positional[0], this.deps.stdin);
    return { kind: "update-schema", schema };
  }
}
