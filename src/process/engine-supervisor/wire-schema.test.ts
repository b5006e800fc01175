import { describe, expect, it } from "vitest";
import { parseControlRequest, parseControlResponse, parseSupervisorEvent } from "./wire-schema.js";

describe("wire schema", () => {
  it("should accept every control request type", () => {
    expect(parseControlRequest('{"type":"tail","lines":20}')).toEqual({
      ok: true,
      value: { type: "tail", lines: 20 },
    });
    expect(parseControlRequest('{"type":"stop"}')).toEqual({ ok: true, value: { type: "stop" } });
  });

  it("should report malformed JSON", () => {
    const result = parseControlRequest("{nope");
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.startsWith("Malformed request: SyntaxError")).toBe(true);
  });

  it("should name the offending field of an invalid request", () => {
    expect(parseControlRequest('{"type":"tail","lines":-1}')).toEqual({
      ok: false,
      error: "Invalid request: lines: Number must be greater than or equal to 0",
    });
  });

  it("should reject an unknown request type", () => {
    const result = parseControlRequest('{"type":"restart"}');
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.startsWith("Invalid request: type: ")).toBe(true);
  });

  it("should validate status responses including the failure record", () => {
    const raw = JSON.stringify({
      type: "status",
      success: true,
      status: {
        state: "build-failed",
        phase: "build",
        failure: {
          reason: "freeze-timeout",
          message: "No engine output for 61s; process killed",
          phase: "build",
          elapsedMs: 61000,
          exitCode: null,
          recentOutput: ["Reading"],
          atMs: 1700000000000,
        },
      },
    });

    const result = parseControlResponse(raw);
    expect(result.ok && result.value.type === "status" && result.value.status?.failure?.reason).toBe(
      "freeze-timeout",
    );
  });

  it("should reject an event with an unknown state", () => {
    const result = parseSupervisorEvent(
      JSON.stringify({ kind: "supervisor.state", ts: 1, from: "idle", to: "sleeping" }),
    );
    expect(result.ok).toBe(false);
  });

  it("should accept a port mismatch event", () => {
    const event = { kind: "supervisor.port-mismatch", ts: 5, allocated: 41000, reported: 8080 };
    expect(parseSupervisorEvent(JSON.stringify(event))).toEqual({ ok: true, value: event });
  });
});
