/**
 * Readers for success bodies, used when the operator asks for a summary
 * instead of the raw payload.
 */

import { z } from "zod";
import { ResponseFormatError, type HealthEntry } from "@dgraph-admin/sdk";
import { formatZodError } from "@dgraph-admin/shared";

const GraphQlErrorsSchema = z.object({
  errors: z.array(z.object({ message: z.string() })).min(1),
});

const AlterResultSchema = z.object({
  data: z.object({
    code: z.string(),
    message: z.string().optional(),
  }),
});

const HealthEntrySchema = z.object({
  instance: z.string().optional(),
  address: z.string().optional(),
  status: z.string(),
  version: z.string().optional(),
  uptime: z.number().nonnegative().optional(),
});

const HealthBodySchema = z.union([z.array(HealthEntrySchema), HealthEntrySchema]);

const SchemaBodySchema = z.object({
  data: z
    .object({
      getGQLSchema: z.object({ schema: z.string().nullable() }).nullable().optional(),
      schema: z.string().nullable().optional(),
    })
    .nullable(),
});

function parseJson(command: string, body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new ResponseFormatError(command, "body is not valid JSON", { cause: err });
  }
}

/** Errors reported inside a 2xx body, GraphQL style. */
function embeddedErrors(payload: unknown): string | undefined {
  const result = GraphQlErrorsSchema.safeParse(payload);
  if (!result.success) return undefined;
  return result.data.errors.map((e) => e.message).join("; ");
}

/**
 * Confirm an /alter call reported success. Returns the server's message
 * (usually "Done").
 */
export function interpretAlterResult(body: string): string {
  const payload = parseJson("alter", body);
  const errors = embeddedErrors(payload);
  if (errors !== undefined) {
    throw new ResponseFormatError("alter", errors);
  }

  const result = AlterResultSchema.safeParse(payload);
  if (!result.success || result.data.data.code !== "Success") {
    throw new ResponseFormatError("alter", `expected a Success code, got ${body}`);
  }
  return result.data.data.message ?? "Done";
}

/**
 * Extract schema text. A new database reports null, one after drop-all
 * reports ""; both come back as "". Non-JSON bodies are taken as the schema
 * itself.
 */
export function interpretSchema(body: string): string {
  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    return body.trim();
  }

  const errors = embeddedErrors(payload);
  if (errors !== undefined) {
    throw new ResponseFormatError("get-schema", errors);
  }

  const result = SchemaBodySchema.safeParse(payload);
  if (!result.success) {
    throw new ResponseFormatError("get-schema", formatZodError(result.error));
  }

  const data = result.data.data;
  const schema = data?.getGQLSchema?.schema ?? data?.schema ?? "";
  return schema.trim();
}

/** Normalize a /health body (one node or a list of nodes) into entries. */
export function interpretHealth(body: string): HealthEntry[] {
  const payload = parseJson("get-health", body);
  const result = HealthBodySchema.safeParse(payload);
  if (!result.success) {
    throw new ResponseFormatError("get-health", formatZodError(result.error));
  }

  const entries = Array.isArray(result.data) ? result.data : [result.data];
  return entries.map((entry) => ({
    address: entry.address ?? entry.instance ?? "unknown",
    status: entry.status,
    ...(entry.uptime !== undefined ? { uptime: entry.uptime } : {}),
    ...(entry.instance !== undefined ? { instance: entry.instance } : {}),
    ...(entry.version !== undefined ? { version: entry.version } : {}),
  }));
}
