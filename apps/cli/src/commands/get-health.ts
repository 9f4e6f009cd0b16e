import type { AdminCommand } from "@dgraph-admin/sdk";
import { AdminCliCommand } from "./admin-command.js";

export class GetHealthCommand extends AdminCliCommand {
  readonly name = "get-health";
  readonly description = "Get status of nodes";

  protected async buildCommand(): Promise<AdminCommand> {
    return { kind: "get-health" };
  }
}
