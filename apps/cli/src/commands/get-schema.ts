import type { AdminCommand } from "@dgraph-admin/sdk";
import { AdminCliCommand } from "./admin-command.js";

export class GetSchemaCommand extends AdminCliCommand {
  readonly name = "get-schema";
  readonly description = "Get the current schema";

  protected async buildCommand(): Promise<AdminCommand> {
    return { kind: "get-schema" };
  }
}
