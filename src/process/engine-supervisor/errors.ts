import type { EngineErrorCategory, FailureReason, Phase, SupervisorState } from "./types.js";

export type SupervisorErrorKind =
  | "FetchError"
  | "LaunchError"
  | "PortUnavailable"
  | "EngineError"
  | "FreezeTimeout"
  | "PhaseTimeout"
  | "UnexpectedExit"
  | "SupervisorState";

export type SupervisorErrorDetails = {
  phase?: Phase;
  elapsedMs?: number;
  recentOutput?: string[];
  exitCode?: number | null;
  cause?: unknown;
};

/**
 * Base class of every error the supervisor surfaces. `reason` is the value
 * recorded in the failure status; SupervisorStateError has none because it
 * never ends a lifecycle.
 */
export class SupervisorError extends Error {
  readonly phase?: Phase;
  readonly elapsedMs: number;
  readonly recentOutput: string[];
  readonly exitCode?: number | null;

  constructor(
    message: string,
    readonly kind: SupervisorErrorKind,
    readonly reason: FailureReason | null,
    details: SupervisorErrorDetails = {},
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = kind === "SupervisorState" ? "SupervisorStateError" : kind;
    this.phase = details.phase;
    this.elapsedMs = details.elapsedMs ?? 0;
    this.recentOutput = details.recentOutput ?? [];
    this.exitCode = details.exitCode;
  }
}

export class FetchError extends SupervisorError {
  constructor(
    message: string,
    readonly url?: string,
    details?: SupervisorErrorDetails,
  ) {
    super(message, "FetchError", "fetch-error", details);
  }
}

export type LaunchErrorCode = "COMMAND_NOT_FOUND" | "PERMISSION_DENIED" | "SPAWN_FAILED";

export class LaunchError extends SupervisorError {
  constructor(
    message: string,
    readonly code: LaunchErrorCode,
    details?: SupervisorErrorDetails,
  ) {
    super(message, "LaunchError", "launch-error", details);
  }
}

export class PortUnavailableError extends SupervisorError {
  constructor(
    readonly port: number | null,
    message?: string,
    details?: SupervisorErrorDetails,
  ) {
    super(
      message ?? (port === null ? "No free port available" : `Port ${port} is already in use`),
      "PortUnavailable",
      "port-unavailable",
      details,
    );
  }
}

export class EngineError extends SupervisorError {
  constructor(
    readonly detail: string,
    readonly category: EngineErrorCategory,
    details?: SupervisorErrorDetails,
  ) {
    super(`Engine reported ${category}: ${detail}`, "EngineError", "engine-error", details);
  }
}

export class FreezeTimeoutError extends SupervisorError {
  constructor(
    readonly idleMs: number,
    details?: SupervisorErrorDetails,
  ) {
    super(
      `No engine output for ${Math.round(idleMs / 1000)}s; process killed`,
      "FreezeTimeout",
      "freeze-timeout",
      details,
    );
  }
}

export class PhaseTimeoutError extends SupervisorError {
  constructor(
    readonly limitMs: number,
    details?: SupervisorErrorDetails,
  ) {
    super(
      `Phase ${details?.phase ?? "unknown"} exceeded ${Math.round(limitMs / 1000)}s; process killed`,
      "PhaseTimeout",
      "phase-timeout",
      details,
    );
  }
}

export class UnexpectedExitError extends SupervisorError {
  constructor(message: string, details?: SupervisorErrorDetails) {
    super(message, "UnexpectedExit", "unexpected-exit", details);
  }
}

export class SupervisorStateError extends SupervisorError {
  constructor(
    readonly from: SupervisorState,
    readonly to: SupervisorState | null,
    message?: string,
  ) {
    super(
      message ?? `Illegal transition ${from} -> ${to ?? "?"}`,
      "SupervisorState",
      null,
    );
  }
}
