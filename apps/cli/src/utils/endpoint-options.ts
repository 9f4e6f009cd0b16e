/**
 * Collects raw endpoint options from flags, then environment.
 * Validation and normalization happen in createEndpointConfig.
 */

import { ConfigurationError } from "@dgraph-admin/sdk";
import type { EndpointOptions } from "@dgraph-admin/shared";

export const ENV_VARS = {
  url: "DGRAPH_ADMIN_URL",
  auth: "DGRAPH_ADMIN_AUTH",
  timeoutMs: "DGRAPH_ADMIN_TIMEOUT_MS",
} as const;

type RawEndpointOptions = { [K in keyof EndpointOptions]?: string };

export function collectEndpointOptions(
  flags: Record<string, string | boolean>,
  env: NodeJS.ProcessEnv = process.env,
): RawEndpointOptions {
  const options: RawEndpointOptions = {};

  const url = valueFlag(flags, "url") ?? nonEmpty(env[ENV_VARS.url]);
  const auth = valueFlag(flags, "auth") ?? nonEmpty(env[ENV_VARS.auth]);
  const timeoutMs = valueFlag(flags, "timeout") ?? nonEmpty(env[ENV_VARS.timeoutMs]);

  if (url !== undefined) options.url = url;
  if (auth !== undefined) options.auth = auth;
  if (timeoutMs !== undefined) options.timeoutMs = timeoutMs;
  return options;
}

function valueFlag(flags: Record<string, string | boolean>, name: string): string | undefined {
  const value = flags[name];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigurationError(`--${name} needs a value`);
  }
  return value;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}
