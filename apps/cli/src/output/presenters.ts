/**
 * Human summaries of success bodies, used with --pretty.
 * Each presenter throws ResponseFormatError when the body does not fit.
 * An empty summary prints nothing.
 */

import type { AdminCommandKind } from "@dgraph-admin/sdk";
import { interpretAlterResult, interpretHealth, interpretSchema } from "@dgraph-admin/core";
import { formatDuration } from "@dgraph-admin/shared";

export type Presenter = (body: string) => string;

export const presentAlter: Presenter = (body) => {
  interpretAlterResult(body);
  return "success";
};

export const presentSchema: Presenter = (body) => {
  const schema = interpretSchema(body);
  return schema === "" ? "no schema" : schema;
};

export const presentHealth: Presenter = (body) => {
  return interpretHealth(body)
    .map((entry) => {
      const line = `${entry.address} is ${entry.status}`;
      return entry.uptime === undefined ? line : `${line}, uptime: ${formatDuration(entry.uptime)}`;
    })
    .join("\n");
};

export const PRESENTERS: Record<AdminCommandKind, Presenter> = {
  "update-schema": presentAlter,
  "get-schema": presentSchema,
  "drop-all": presentAlter,
  "drop-data": presentAlter,
  "get-health": presentHealth,
};
