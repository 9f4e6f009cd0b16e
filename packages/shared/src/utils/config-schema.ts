/**
 * Zod schema for the raw endpoint options collected from flags and env.
 *
 * Semantic checks (URL normalization, auth header splitting) happen in
 * createEndpointConfig; this only pins down shapes and ranges.
 */

import { z } from "zod";

export const MAX_TIMEOUT_MS = 600_000;

export const EndpointOptionsSchema = z.object({
  url: z.string().trim().min(1, "URL must not be empty").optional(),
  auth: z.string().optional(),
  timeoutMs: z.coerce
    .number({ invalid_type_error: "Timeout must be a number of milliseconds" })
    .int("Timeout must be a whole number of milliseconds")
    .positive("Timeout must be positive")
    .max(MAX_TIMEOUT_MS, `Timeout must not exceed ${MAX_TIMEOUT_MS}ms`)
    .optional(),
});

export type EndpointOptions = z.infer<typeof EndpointOptionsSchema>;
