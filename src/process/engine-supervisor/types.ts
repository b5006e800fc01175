/**
 * Engine Supervisor Types
 *
 * Shared types for the lifecycle supervisor, its collaborators, and the
 * ZeroMQ control plane that exposes it to other processes.
 */

// =============================================================================
// Lifecycle
// =============================================================================

export type Phase = "build" | "serve";

export type SupervisorState =
  | "idle"
  | "preparing"
  | "building"
  | "build-failed"
  | "graph-ready"
  | "starting"
  | "running"
  | "frozen"
  | "stopped"
  | "failed";

export type FailureReason =
  | "fetch-error"
  | "launch-error"
  | "port-unavailable"
  | "engine-error"
  | "freeze-timeout"
  | "phase-timeout"
  | "unexpected-exit";

/**
 * How liveness is judged once the engine is serving.
 * - process: only an exit counts as failure; silence is healthy
 * - output: silence longer than the idle threshold marks the engine frozen
 * - probe: a TCP connect to the bound port counts as activity alongside output
 */
export type ServeLivenessPolicy = "process" | "output" | "probe";

export type BoundingBox = {
  left: number;
  bottom: number;
  right: number;
  top: number;
};

export type GraphInputs = {
  mapExtract: string;
  transitFeeds: string[];
};

export type SupervisorTimeouts = {
  /** Silence allowed during build/startup before the process is killed */
  freezeTimeoutMs: number;
  /** Silence allowed while serving before the engine counts as frozen */
  idleThresholdMs: number;
  /** Overall cap on the build phase (0 disables) */
  buildTimeoutMs: number;
  /** Overall cap on the startup phase (0 disables) */
  startupTimeoutMs: number;
  /** Period of the freeze/liveness check */
  checkIntervalMs: number;
  /** Time between SIGTERM and SIGKILL on stop */
  stopGracePeriodMs: number;
};

// =============================================================================
// Engine process
// =============================================================================

export type EngineExit = {
  exitCode: number | null;
  exitSignal: NodeJS.Signals | null;
};

/**
 * Handle to one spawned engine invocation. Build and serve are separate
 * invocations, so each phase gets its own handle.
 */
export interface EngineProcess {
  readonly pid: number | undefined;
  readonly phase: Phase;
  readonly startedAtMs: number;
  /** Interleaved stdout/stderr lines; ends when both streams close */
  readonly lines: AsyncIterable<string>;
  hasExited(): boolean;
  /** undefined while the process is alive */
  exitCode(): number | null | undefined;
  wait(): Promise<EngineExit>;
  kill(signal?: NodeJS.Signals): void;
  dispose(): void;
}

export type LaunchRequest = {
  phase: Phase;
  graphDirectory: string;
  graphName: string;
  inputs: GraphInputs;
  port?: number;
  extraPorts?: number[];
};

export interface EngineLauncher {
  launch(request: LaunchRequest): Promise<EngineProcess>;
}

// =============================================================================
// Output classification
// =============================================================================

export type EngineErrorCategory =
  | "out-of-memory"
  | "bad-input"
  | "bind-failure"
  | "uncaught-exception";

export type MonitorEvent =
  | { kind: "build-complete"; ts: number; line: string }
  | { kind: "serve-ready"; ts: number; line: string; port?: number }
  | {
      kind: "engine-error";
      ts: number;
      line: string;
      category: EngineErrorCategory;
    }
  | { kind: "exited"; ts: number; exitCode: number | null; exitSignal: NodeJS.Signals | null };

export type ActivityState = {
  startedAtMs: number;
  lastOutputAtMs: number;
  lastLine?: string;
  linesSeen: number;
};

// =============================================================================
// Status
// =============================================================================

export type FailureInfo = {
  reason: FailureReason;
  message: string;
  phase?: Phase;
  elapsedMs: number;
  exitCode?: number | null;
  recentOutput: string[];
  atMs: number;
};

export type PortMismatch = {
  allocated: number;
  reported: number;
};

export type SupervisorStatus = {
  state: SupervisorState;
  phase?: Phase;
  port?: number;
  pid?: number;
  lastLine?: string;
  lastOutputAtMs?: number;
  failure?: FailureInfo;
  portMismatch?: PortMismatch;
  startedAtMs?: number;
};

export type SupervisorEvent =
  | {
      kind: "supervisor.state";
      ts: number;
      from: SupervisorState;
      to: SupervisorState;
      reason?: FailureReason;
    }
  | { kind: "supervisor.output"; ts: number; phase: Phase; line: string }
  | { kind: "supervisor.port-mismatch"; ts: number; allocated: number; reported: number };

export type SupervisorListener = (event: SupervisorEvent) => void;

// =============================================================================
// Control Plane (REQ/REP)
// =============================================================================

export type StatusRequest = { type: "status" };

export type StopRequest = { type: "stop" };

export type TailRequest = {
  type: "tail";
  /** Number of most recent lines (default: all retained) */
  lines?: number;
};

export type HealthRequest = { type: "health" };

export type ControlRequest = StatusRequest | StopRequest | TailRequest | HealthRequest;

export type StatusResponse = {
  type: "status";
  success: boolean;
  status?: SupervisorStatus;
  error?: string;
};

export type StopResponse = {
  type: "stop";
  success: boolean;
  status?: SupervisorStatus;
  error?: string;
};

export type TailResponse = {
  type: "tail";
  success: boolean;
  lines: string[];
  error?: string;
};

export type HealthResponse = {
  type: "health";
  success: boolean;
  uptime: number;
  state: SupervisorState;
  memoryUsageMB: number;
  error?: string;
};

export type ControlResponse = StatusResponse | StopResponse | TailResponse | HealthResponse;

// =============================================================================
// Control Plane Config
// =============================================================================

export type ControlServerConfig = {
  /** Control plane REP socket address (default: tcp://127.0.0.1:18890) */
  controlAddress?: string;
  /** Event plane PUB socket address (default: tcp://127.0.0.1:18891) */
  eventAddress?: string;
  /** Instance name used in event topics (default: "default") */
  instance?: string;
};

export type ControlClientConfig = {
  controlAddress?: string;
  eventAddress?: string;
  instance?: string;
  /** Request timeout in ms (default: 10000) */
  requestTimeoutMs?: number;
};
