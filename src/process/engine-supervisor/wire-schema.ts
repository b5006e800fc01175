/**
 * zod schemas for everything that crosses the ZeroMQ sockets. Both ends
 * validate what they receive instead of trusting the peer's JSON.
 */

import { z } from "zod";
import type { ControlRequest, ControlResponse, SupervisorEvent } from "./types.js";

const phaseSchema = z.enum(["build", "serve"]);

const supervisorStateSchema = z.enum([
  "idle",
  "preparing",
  "building",
  "build-failed",
  "graph-ready",
  "starting",
  "running",
  "frozen",
  "stopped",
  "failed",
]);

const failureReasonSchema = z.enum([
  "fetch-error",
  "launch-error",
  "port-unavailable",
  "engine-error",
  "freeze-timeout",
  "phase-timeout",
  "unexpected-exit",
]);

const failureInfoSchema = z.object({
  reason: failureReasonSchema,
  message: z.string(),
  phase: phaseSchema.optional(),
  elapsedMs: z.number(),
  exitCode: z.number().nullable().optional(),
  recentOutput: z.array(z.string()),
  atMs: z.number(),
});

const supervisorStatusSchema = z.object({
  state: supervisorStateSchema,
  phase: phaseSchema.optional(),
  port: z.number().int().optional(),
  pid: z.number().int().optional(),
  lastLine: z.string().optional(),
  lastOutputAtMs: z.number().optional(),
  failure: failureInfoSchema.optional(),
  portMismatch: z.object({ allocated: z.number(), reported: z.number() }).optional(),
  startedAtMs: z.number().optional(),
});

export const controlRequestSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("status") }),
  z.object({ type: z.literal("stop") }),
  z.object({ type: z.literal("tail"), lines: z.number().int().nonnegative().optional() }),
  z.object({ type: z.literal("health") }),
]);

export const controlResponseSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("status"),
    success: z.boolean(),
    status: supervisorStatusSchema.optional(),
    error: z.string().optional(),
  }),
  z.object({
    type: z.literal("stop"),
    success: z.boolean(),
    status: supervisorStatusSchema.optional(),
    error: z.string().optional(),
  }),
  z.object({
    type: z.literal("tail"),
    success: z.boolean(),
    lines: z.array(z.string()),
    error: z.string().optional(),
  }),
  z.object({
    type: z.literal("health"),
    success: z.boolean(),
    uptime: z.number(),
    state: supervisorStateSchema,
    memoryUsageMB: z.number(),
    error: z.string().optional(),
  }),
]);

export const supervisorEventSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("supervisor.state"),
    ts: z.number(),
    from: supervisorStateSchema,
    to: supervisorStateSchema,
    reason: failureReasonSchema.optional(),
  }),
  z.object({
    kind: z.literal("supervisor.output"),
    ts: z.number(),
    phase: phaseSchema,
    line: z.string(),
  }),
  z.object({
    kind: z.literal("supervisor.port-mismatch"),
    ts: z.number(),
    allocated: z.number(),
    reported: z.number(),
  }),
]);

export type WireResult<T> = { ok: true; value: T } | { ok: false; error: string };

function parseJson<T>(raw: string, schema: z.ZodType<T>, what: string): WireResult<T> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    return { ok: false, error: `Malformed ${what}: ${String(err)}` };
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    return { ok: false, error: `Invalid ${what}: ${issues.join("; ")}` };
  }
  return { ok: true, value: parsed.data };
}

export function parseControlRequest(raw: string): WireResult<ControlRequest> {
  return parseJson(raw, controlRequestSchema, "request");
}

export function parseControlResponse(raw: string): WireResult<ControlResponse> {
  return parseJson(raw, controlResponseSchema, "response");
}

export function parseSupervisorEvent(raw: string): WireResult<SupervisorEvent> {
  return parseJson(raw, supervisorEventSchema, "event");
}
