/**
 * Drop Data Command: remove all data, keep the schema.
 */

import type { AdminCommand } from "@dgraph-admin/sdk";
import { AdminCliCommand } from "./admin-command.js";

export class DropDataCommand extends AdminCliCommand {
  readonly name = "drop-data";
  readonly description = "Drop all data only (keep schema)";

  protected async buildCommand(): Promise<AdminCommand> {
    return { kind: "drop-data" };
  }
}
