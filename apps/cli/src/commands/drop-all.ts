/**
 * Drop All Command: remove all data and the schema.
 */

import type { AdminCommand } from "@dgraph-admin/sdk";
import { AdminCliCommand } from "./admin-command.js";

export class DropAllCommand extends AdminCliCommand {
  readonly name = "drop-all";
  readonly description = "Drop all data and schema";

  protected async buildCommand(): Promise<AdminCommand> {
    return { kind: "drop-all" };
  }
}
