import { describe, it, expect } from "vitest";
import {
  ADMIN_COMMAND_KINDS,
  ConfigurationError,
  ErrorCode,
  type AdminCommand,
  type EndpointConfig,
} from "@dgraph-admin/sdk";
import { resolveCommand } from "./command-resolver.js";

const plain: EndpointConfig = { baseUrl: "http://localhost:8080", timeoutMs: 30_000 };
const withAuth: EndpointConfig = {
  ...plain,
  authHeader: { name: "X-Dgraph-AuthToken", value: "test-secret" },
};

const allCommands: AdminCommand[] = [
  { kind: "update-schema", schema: "name: string @index(exact) ." },
  { kind: "get-schema" },
  { kind: "drop-all" },
  { kind: "drop-data" },
  { kind: "get-health" },
];

describe("resolveCommand", () => {
  describe("mapping table", () => {
    it("update-schema posts the raw schema to /alter", () => {
      expect(resolveCommand({ kind: "update-schema", schema: "name: string ." }, plain)).toEqual({
        method: "POST",
        path: "/alter",
        headers: { "Content-Type": "application/dql" },
        body: "name: string .",
      });
    });

    it("get-schema is a bodiless GET", () => {
      expect(resolveCommand({ kind: "get-schema" }, plain)).toEqual({
        method: "GET",
        path: "/admin/schema",
        headers: {},
      });
    });

    it("drop-all posts drop_op all", () => {
      expect(resolveCommand({ kind: "drop-all" }, plain)).toEqual({
        method: "POST",
        path: "/alter",
        headers: { "Content-Type": "application/json" },
        body: '{"drop_op":"all"}',
      });
    });

    it("drop-data posts drop_op data", () => {
      expect(resolveCommand({ kind: "drop-data" }, plain)).toEqual({
        method: "POST",
        path: "/alter",
        headers: { "Content-Type": "application/json" },
        body: '{"drop_op":"data"}',
      });
    });

    it("get-health is a bodiless GET", () => {
      const descriptor = resolveCommand({ kind: "get-health" }, plain);
      expect(descriptor).toEqual({ method: "GET", path: "/health", headers: {} });
      expect("body" in descriptor).toBe(false);
    });

    it("covers every command kind", () => {
      expect(allCommands.map((c) => c.kind)).toEqual([...ADMIN_COMMAND_KINDS]);
    });
  });

  describe("purity", () => {
    it.each(allCommands)("returns equal descriptors for $kind on repeated calls", (command) => {
      const first = resolveCommand(command, withAuth);
      const second = resolveCommand(command, withAuth);
      expect(second).toEqual(first);
      expect(second).not.toBe(first);
    });

    it("returns frozen descriptors", () => {
      const descriptor = resolveCommand({ kind: "drop-all" }, withAuth);
      expect(Object.isFrozen(descriptor)).toBe(true);
      expect(Object.isFrozen(descriptor.headers)).toBe(true);
    });
  });

  describe("auth header injection", () => {
    it.each(allCommands)("adds the configured header to $kind verbatim", (command) => {
      const descriptor = resolveCommand(command, withAuth);
      expect(descriptor.headers["X-Dgraph-AuthToken"]).toBe("test-secret");
    });

    it.each(allCommands)("adds no auth header to $kind when none is configured", (command) => {
      const descriptor = resolveCommand(command, plain);
      expect(Object.keys(descriptor.headers).filter((h) => h !== "Content-Type")).toEqual([]);
    });

    it("keeps an unusual header name exactly as given", () => {
      const config: EndpointConfig = { ...plain, authHeader: { name: "Dg-Auth", value: "k:1" } };
      expect(resolveCommand({ kind: "get-health" }, config).headers).toEqual({ "Dg-Auth": "k:1" });
    });
  });

  describe("drop commands", () => {
    it("differ only in drop_op", () => {
      const all = resolveCommand({ kind: "drop-all" }, withAuth);
      const data = resolveCommand({ kind: "drop-data" }, withAuth);

      expect({ ...all, body: undefined }).toEqual({ ...data, body: undefined });
      expect(JSON.parse(all.body ?? "")).toEqual({ drop_op: "all" });
      expect(JSON.parse(data.body ?? "")).toEqual({ drop_op: "data" });
    });
  });

  describe("update-schema precondition", () => {
    it.each([
      ["empty", ""],
      ["missing", undefined],
      ["blank", "  \n\t"],
    ])("rejects a %s payload with EMPTY_SCHEMA", (_label, schema) => {
      const command: AdminCommand = { kind: "update-schema", schema };
      let caught: unknown;
      try {
        resolveCommand(command, withAuth);
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught instanceof ConfigurationError && caught.code).toBe(ErrorCode.EMPTY_SCHEMA);
    });

    it("sends the payload without trimming it", () => {
      const descriptor = resolveCommand({ kind: "update-schema", schema: "\nage: int .\n" }, plain);
      expect(descriptor.body).toBe("\nage: int .\n");
    });
  });
});
