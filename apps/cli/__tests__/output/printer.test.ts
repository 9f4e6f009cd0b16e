import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";
import { printOutcome } from "../../src/output/printer.js";
import { presentHealth } from "../../src/output/presenters.js";
import { EXIT_CODES } from "../../src/exit-codes.js";

describe("printOutcome", () => {
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
  });

  it("prints a success body verbatim to stdout", () => {
    const code = printOutcome({ kind: "success", body: '{"status":"healthy"}' });
    expect(code).toBe(EXIT_CODES.success);
    expect(logSpy.mock.calls).toEqual([['{"status":"healthy"}']]);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("prints the presenter summary when one is given", () => {
    const code = printOutcome(
      { kind: "success", body: '[{"address":"a:1","status":"healthy","uptime":5}]' },
      { presenter: presentHealth },
    );
    expect(code).toBe(EXIT_CODES.success);
    expect(logSpy.mock.calls).toEqual([["a:1 is healthy, uptime: 5s"]]);
  });

  it("prints nothing for an empty summary", () => {
    const code = printOutcome({ kind: "success", body: "[]" }, { presenter: presentHealth });
    expect(code).toBe(EXIT_CODES.success);
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it("reports an uninterpretable success body as an application error", () => {
    const code = printOutcome({ kind: "success", body: "not json" }, { presenter: presentHealth });
    expect(code).toBe(EXIT_CODES.applicationError);
    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy.mock.calls).toEqual([['Error: Unexpected "get-health" response: body is not valid JSON']]);
  });

  it("prints status and raw body of an application error to stderr", () => {
    const body = '{"errors":[{"message":"Schema parse error"}]}';
    const code = printOutcome({ kind: "application-error", statusCode: 400, body });
    expect(code).toBe(EXIT_CODES.applicationError);
    expect(errorSpy.mock.calls).toEqual([["Error: HTTP 400"], [body]]);
    expect(logSpy).not.toHaveBeenCalled();
  });

  it("skips an empty error body", () => {
    printOutcome({ kind: "application-error", statusCode: 502, body: "" });
    expect(errorSpy.mock.calls).toEqual([["Error: HTTP 502"]]);
  });

  it("prints the transport cause with its own exit code", () => {
    const code = printOutcome({ kind: "transport-error", cause: "request timed out after 100ms" });
    expect(code).toBe(EXIT_CODES.transportError);
    expect(errorSpy.mock.calls).toEqual([["Error: request timed out after 100ms"]]);
  });

  it("warns that a destructive request has an unknown outcome", () => {
    printOutcome({ kind: "transport-error", cause: "socket hang up" }, { destructive: true });
    expect(errorSpy.mock.calls).toEqual([
      ["Error: socket hang up"],
      ["Outcome unknown: the request may have reached the server. Check its state before retrying."],
    ]);
  });
});
