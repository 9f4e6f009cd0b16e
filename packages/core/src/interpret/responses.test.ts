import { describe, it, expect } from "vitest";
import { ResponseFormatError } from "@dgraph-admin/sdk";
import { interpretAlterResult, interpretHealth, interpretSchema } from "./responses.js";

describe("interpretAlterResult", () => {
  it("returns the server message on success", () => {
    expect(interpretAlterResult('{"data":{"code":"Success","message":"Done"}}')).toBe("Done");
  });

  it("defaults the message to Done", () => {
    expect(interpretAlterResult('{"data":{"code":"Success"}}')).toBe("Done");
  });

  it("surfaces embedded errors", () => {
    expect(() =>
      interpretAlterResult('{"errors":[{"message":"line 1: unexpected token"},{"message":"second"}]}'),
    ).toThrow('Unexpected "alter" response: line 1: unexpected token; second');
  });

  it("rejects other codes", () => {
    expect(() => interpretAlterResult('{"data":{"code":"Error"}}')).toThrow(ResponseFormatError);
  });

  it("rejects non-JSON", () => {
    expect(() => interpretAlterResult("Done")).toThrow('Unexpected "alter" response: body is not valid JSON');
  });
});

describe("interpretSchema", () => {
  it("reads a GraphQL schema payload", () => {
    expect(interpretSchema('{"data":{"getGQLSchema":{"schema":"  type Person { name: String }\\n"}}}')).toBe(
      "type Person { name: String }",
    );
  });

  it("treats a null schema as empty", () => {
    expect(interpretSchema('{"data":{"getGQLSchema":{"schema":null}}}')).toBe("");
    expect(interpretSchema('{"data":{"getGQLSchema":null}}')).toBe("");
  });

  it("reads a plain data.schema string", () => {
    expect(interpretSchema('{"data":{"schema":"name: string ."}}')).toBe("name: string .");
  });

  it("takes a non-JSON body as the schema text", () => {
    expect(interpretSchema("name: string @index(exact) .\n")).toBe("name: string @index(exact) .");
  });

  it("surfaces embedded errors", () => {
    expect(() => interpretSchema('{"errors":[{"message":"unauthorized"}]}')).toThrow(
      'Unexpected "get-schema" response: unauthorized',
    );
  });

  it("rejects JSON without data", () => {
    expect(() => interpretSchema('{"other":1}')).toThrow(ResponseFormatError);
  });
});

describe("interpretHealth", () => {
  it("reads a list of nodes", () => {
    const body = JSON.stringify([
      { instance: "zero", address: "localhost:5080", status: "healthy", uptime: 3723, group: "0" },
      { instance: "alpha", address: "localhost:7080", status: "healthy", version: "v23.1.0", uptime: 60 },
    ]);
    expect(interpretHealth(body)).toEqual([
      { address: "localhost:5080", status: "healthy", uptime: 3723, instance: "zero" },
      { address: "localhost:7080", status: "healthy", uptime: 60, instance: "alpha", version: "v23.1.0" },
    ]);
  });

  it("accepts a single node object", () => {
    expect(interpretHealth('{"status":"healthy"}')).toEqual([{ address: "unknown", status: "healthy" }]);
  });

  it("falls back to the instance name for the address", () => {
    expect(interpretHealth('[{"instance":"alpha","status":"unhealthy"}]')).toEqual([
      { address: "alpha", status: "unhealthy", instance: "alpha" },
    ]);
  });

  it("rejects entries without a status", () => {
    expect(() => interpretHealth('[{"address":"localhost:7080"}]')).toThrow(ResponseFormatError);
  });

  it("rejects non-JSON", () => {
    expect(() => interpretHealth("OK")).toThrow('Unexpected "get-health" response: body is not valid JSON');
  });
});
