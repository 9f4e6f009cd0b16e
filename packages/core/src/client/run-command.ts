/**
 * runCommand: resolve then execute, the whole core in one call.
 */

import type { AdminCommand, EndpointConfig, Outcome } from "@dgraph-admin/sdk";
import { resolveCommand } from "../resolver/command-resolver.js";
import { createRequestExecutor, type RequestExecutorOptions } from "../executor/request-executor.js";

/**
 * @throws ConfigurationError before any request when the command cannot be resolved.
 */
export async function runCommand(
  command: AdminCommand,
  config: EndpointConfig,
  options: RequestExecutorOptions = {},
): Promise<Outcome> {
  const descriptor = resolveCommand(command, config);
  return createRequestExecutor(config, options).execute(descriptor);
}
