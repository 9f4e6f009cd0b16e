/**
 * Reads the schema text for update-schema from a file or stdin.
 */

import { readFile } from "node:fs/promises";
import { ConfigurationError, ErrorCode } from "@dgraph-admin/sdk";

export type SchemaSource = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * `path` of undefined or "-" means stdin. An interactive stdin yields
 * undefined rather than blocking; the resolver then reports the missing schema.
 */
export async function readSchemaPayload(
  path: string | undefined,
  stdin: SchemaSource = process.stdin,
): Promise<string | undefined> {
  if (path !== undefined && path !== "-") {
    try {
      return await readFile(path, "utf-8");
    } catch (err) {
      throw new ConfigurationError(`Cannot read schema file "${path}"`, {
        code: ErrorCode.SCHEMA_READ_FAILED,
        cause: err,
      });
    }
  }

  if (stdin.isTTY) {
    return undefined;
  }
  return readStream(stdin);
}

async function readStream(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}
