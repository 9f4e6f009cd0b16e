/**
 * Admin HTTP API surface, pinned to one server API version.
 * Changing endpoints means changing these constants, not the resolver.
 */

export const ADMIN_PATHS = {
  alter: "/alter",
  schema: "/admin/schema",
  health: "/health",
} as const;

export const CONTENT_TYPES = {
  dql: "application/dql",
  json: "application/json",
} as const;

export type DropOperation = "all" | "data";
