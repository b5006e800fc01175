/**
 * Engine Lifecycle Supervisor
 *
 * Drives one engine instance through preparation, graph build and serving.
 * Each phase runs its own engine process whose output monitor feeds an event
 * queue; the phase loop is that queue's only consumer and the only code that
 * changes state while a phase is active. `stop()` never transitions directly,
 * it queues a stop event for the loop.
 */

import fs from "node:fs";
import path from "node:path";
import type { DataFetcher } from "../../fetch/types.js";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import {
  EngineError,
  FetchError,
  FreezeTimeoutError,
  LaunchError,
  PhaseTimeoutError,
  PortUnavailableError,
  SupervisorError,
  SupervisorStateError,
  UnexpectedExitError,
  type SupervisorErrorDetails,
} from "./errors.js";
import { EventQueue } from "./event-queue.js";
import {
  discoverInputs,
  loadGraphManifest,
  sanitizeGraphName,
  updateGraphManifest,
  type GraphManifest,
} from "./graph-manifest.js";
import { OutputMonitor } from "./output-monitor.js";
import { OutputTail } from "./output-tail.js";
import { createPortAllocator, probePort, type PortAllocator } from "./port-allocator.js";
import type { EngineProfile } from "./profiles.js";
import {
  DEFAULT_BUILD_TIMEOUT_MS,
  DEFAULT_CHECK_INTERVAL_MS,
  DEFAULT_FREEZE_TIMEOUT_MS,
  DEFAULT_IDLE_THRESHOLD_MS,
  DEFAULT_MAX_PORT_RETRIES,
  DEFAULT_STARTUP_TIMEOUT_MS,
  DEFAULT_STOP_GRACE_PERIOD_MS,
  DEFAULT_TAIL_LINES,
} from "./protocol.js";
import type {
  BoundingBox,
  EngineExit,
  EngineLauncher,
  EngineProcess,
  FailureInfo,
  FailureReason,
  GraphInputs,
  LaunchRequest,
  MonitorEvent,
  Phase,
  PortMismatch,
  ServeLivenessPolicy,
  SupervisorEvent,
  SupervisorListener,
  SupervisorState,
  SupervisorStatus,
  SupervisorTimeouts,
} from "./types.js";

const log = createSubsystemLogger("engine-supervisor");

// =============================================================================
// Options
// =============================================================================

export type HealthProbe = (port: number) => Promise<boolean>;

export type EngineSupervisorOptions = {
  /** Holds the inputs, the manifest, engine logs and the built graph */
  graphDirectory: string;
  /** Defaults to the graph directory's base name */
  graphName?: string;
  /** Area to download inputs for when none are present */
  boundingBox?: BoundingBox;
  profile: EngineProfile;
  launcher: EngineLauncher;
  fetcher?: DataFetcher;
  portAllocator?: PortAllocator;
  /** Fixed serve port; dynamic allocation when omitted */
  port?: number;
  timeouts?: Partial<SupervisorTimeouts>;
  serveLiveness?: ServeLivenessPolicy;
  /** Health signal for the "probe" policy (default: TCP connect) */
  healthProbe?: HealthProbe;
  maxPortRetries?: number;
  /** Build even when the manifest records a built graph */
  rebuildGraph?: boolean;
  /** Fail preparation when no transit feed can be obtained */
  requireTransitFeeds?: boolean;
  tailLines?: number;
};

export function resolveTimeouts(overrides: Partial<SupervisorTimeouts> = {}): SupervisorTimeouts {
  return {
    freezeTimeoutMs: overrides.freezeTimeoutMs ?? DEFAULT_FREEZE_TIMEOUT_MS,
    idleThresholdMs: overrides.idleThresholdMs ?? DEFAULT_IDLE_THRESHOLD_MS,
    buildTimeoutMs: overrides.buildTimeoutMs ?? DEFAULT_BUILD_TIMEOUT_MS,
    startupTimeoutMs: overrides.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS,
    checkIntervalMs: overrides.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS,
    stopGracePeriodMs: overrides.stopGracePeriodMs ?? DEFAULT_STOP_GRACE_PERIOD_MS,
  };
}

// =============================================================================
// Transition Table
// =============================================================================

const TRANSITIONS: Record<SupervisorState, readonly SupervisorState[]> = {
  idle: ["preparing", "stopped"],
  preparing: ["building", "graph-ready", "failed", "stopped"],
  building: ["graph-ready", "build-failed", "stopped"],
  "build-failed": ["idle"],
  "graph-ready": ["starting", "stopped"],
  starting: ["running", "failed", "stopped"],
  running: ["frozen", "failed", "stopped"],
  frozen: ["running", "failed", "stopped"],
  stopped: ["preparing"],
  failed: ["idle"],
};

export function canTransition(from: SupervisorState, to: SupervisorState): boolean {
  return TRANSITIONS[from].includes(to);
}

// =============================================================================
// Internal Types
// =============================================================================

type PhaseEvent =
  | MonitorEvent
  | { kind: "stop"; ts: number }
  | { kind: "monitor-failed"; ts: number; error: string };

type ActivePhase = {
  phase: Phase;
  engine: EngineProcess;
  monitor: OutputMonitor;
  queue: EventQueue<PhaseEvent>;
  monitorDone: Promise<void>;
  startedAtMs: number;
};

type PhaseOutcome =
  | { kind: "done" }
  | { kind: "stopped" }
  | { kind: "failed"; error: SupervisorError }
  | { kind: "retry-port"; error: SupervisorError };

type LifecycleTarget = "graph-ready" | "running";

type StartWaiter = {
  resolve: (status: SupervisorStatus) => void;
  reject: (err: unknown) => void;
};

type Tick = (now: number) => SupervisorError | null | Promise<SupervisorError | null>;

function asSupervisorError(
  err: unknown,
  wrap: (message: string) => SupervisorError,
): SupervisorError {
  if (err instanceof SupervisorError) {
    return err;
  }
  return wrap(err instanceof Error ? err.message : String(err));
}

function describeExit(exit: EngineExit): string {
  return exit.exitSignal ? `signal ${exit.exitSignal}` : `code ${exit.exitCode ?? "unknown"}`;
}

function existingFile(filePath: string | undefined): string | undefined {
  return filePath !== undefined && fs.existsSync(filePath) ? filePath : undefined;
}

function carryDetails(error: SupervisorError): SupervisorErrorDetails {
  return {
    phase: error.phase,
    elapsedMs: error.elapsedMs,
    recentOutput: error.recentOutput,
    exitCode: error.exitCode,
    cause: error,
  };
}

// =============================================================================
// Supervisor
// =============================================================================

export class EngineSupervisor {
  private state: SupervisorState = "idle";
  private readonly graphName: string;
  private readonly timeouts: SupervisorTimeouts;
  private readonly allocator: PortAllocator;
  private readonly healthProbe: HealthProbe;
  private readonly tail: OutputTail;
  private readonly listeners = new Set<SupervisorListener>();

  private current: ActivePhase | null = null;
  private inflight: { target: LifecycleTarget; promise: Promise<SupervisorStatus> } | null = null;
  private lifecycle: Promise<void> | null = null;
  private startWaiter: StartWaiter | null = null;
  private stopping: Promise<SupervisorStatus> | null = null;
  private stopRequested = false;
  private abort: AbortController | null = null;

  private manifest: GraphManifest | null = null;
  private inputs: GraphInputs | null = null;
  private boundPort: number | undefined;
  private failure: FailureInfo | undefined;
  private mismatch: PortMismatch | undefined;
  private lastClassifiedLine: string | undefined;
  private lastOutputAtMs: number | undefined;
  private lineageStartedAtMs: number | undefined;
  private lastHealthyAtMs = 0;

  constructor(private readonly options: EngineSupervisorOptions) {
    this.graphName = sanitizeGraphName(
      options.graphName ?? path.basename(path.resolve(options.graphDirectory)),
    );
    this.timeouts = resolveTimeouts(options.timeouts);
    this.allocator = options.portAllocator ?? createPortAllocator();
    this.healthProbe = options.healthProbe ?? ((port) => probePort(port));
    this.tail = new OutputTail(options.tailLines ?? DEFAULT_TAIL_LINES);
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /**
   * Prepare inputs, build the graph if needed and serve it. Resolves once the
   * engine is running, or with the stopped status if `stop()` interrupted it.
   * Rejects with the failure's error after the state became `build-failed` or
   * `failed`.
   */
  start(): Promise<SupervisorStatus> {
    return this.begin("running");
  }

  /** Prepare inputs and build the graph, then rest in `graph-ready`. */
  buildGraph(): Promise<SupervisorStatus> {
    return this.begin("graph-ready");
  }

  stop(): Promise<SupervisorStatus> {
    if (!this.stopping) {
      this.stopping = this.performStop().finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  /** Clear a failure so the supervisor can be started again. */
  reset(): void {
    if (this.state !== "failed" && this.state !== "build-failed") {
      throw new SupervisorStateError(
        this.state,
        "idle",
        `reset() is only valid after a failure (state: ${this.state})`,
      );
    }
    this.transition("idle");
    this.failure = undefined;
    this.mismatch = undefined;
    this.tail.clear();
  }

  status(): SupervisorStatus {
    const active = this.current;
    return {
      state: this.state,
      phase: active?.phase,
      port: this.port,
      pid: active?.engine.pid,
      lastLine: this.lastClassifiedLine,
      lastOutputAtMs: active ? active.monitor.activity.lastOutputAtMs : this.lastOutputAtMs,
      failure: this.failure,
      portMismatch: this.mismatch,
      startedAtMs: this.lineageStartedAtMs,
    };
  }

  /** Bound port; defined only while the engine is serving. */
  get port(): number | undefined {
    return this.state === "running" || this.state === "frozen" ? this.boundPort : undefined;
  }

  get currentState(): SupervisorState {
    return this.state;
  }

  recentOutput(count?: number): string[] {
    return this.tail.lines(count);
  }

  onEvent(listener: SupervisorListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---------------------------------------------------------------------------
  // State
  // ---------------------------------------------------------------------------

  private now(): number {
    return Date.now();
  }

  private emit(event: SupervisorEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        log.warn(`Event listener threw: ${String(err)}`);
      }
    }
  }

  private transition(to: SupervisorState, reason?: FailureReason): void {
    const from = this.state;
    if (!canTransition(from, to)) {
      throw new SupervisorStateError(from, to);
    }
    this.state = to;
    log.info(`${from} -> ${to}${reason ? ` (${reason})` : ""}`);
    this.emit({ kind: "supervisor.state", ts: this.now(), from, to, reason });
  }

  private beginLineage(): void {
    this.failure = undefined;
    this.mismatch = undefined;
    this.boundPort = undefined;
    this.lastClassifiedLine = undefined;
    this.lastOutputAtMs = undefined;
    this.inputs = null;
    this.tail.clear();
    this.lineageStartedAtMs = this.now();
  }

  private fail(error: SupervisorError): void {
    const target = this.state === "building" ? "build-failed" : "failed";
    const reason = error.reason ?? "unexpected-exit";
    this.failure = {
      reason,
      message: error.message,
      phase: error.phase,
      elapsedMs: error.elapsedMs,
      exitCode: error.exitCode,
      recentOutput: error.recentOutput.length > 0 ? error.recentOutput : this.tail.lines(),
      atMs: this.now(),
    };
    log.error(`Engine ${target}: ${error.message}`);
    this.transition(target, reason);
  }

  private settleStart(result: { status: SupervisorStatus } | { error: unknown }): void {
    const waiter = this.startWaiter;
    if (!waiter) {
      return;
    }
    this.startWaiter = null;
    if ("status" in result) {
      waiter.resolve(result.status);
    } else {
      waiter.reject(result.error);
    }
  }

  private details(active: ActivePhase, exitCode?: number | null): SupervisorErrorDetails {
    return {
      phase: active.phase,
      elapsedMs: this.now() - active.startedAtMs,
      recentOutput: this.tail.lines(),
      exitCode,
    };
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  private begin(target: LifecycleTarget): Promise<SupervisorStatus> {
    if (this.inflight) {
      if (this.inflight.target === target) {
        return this.inflight.promise;
      }
      return Promise.reject(
        new SupervisorStateError(this.state, null, `Another lifecycle operation is in progress`),
      );
    }
    if (this.stopping) {
      return Promise.reject(new SupervisorStateError(this.state, null, "Stop is in progress"));
    }

    switch (this.state) {
      case "running":
      case "frozen":
        return target === "running"
          ? Promise.resolve(this.status())
          : Promise.reject(
              new SupervisorStateError(this.state, "building", "Stop the engine before rebuilding"),
            );
      case "graph-ready":
        if (target === "graph-ready") {
          return Promise.resolve(this.status());
        }
        break;
      case "failed":
      case "build-failed":
        return Promise.reject(
          new SupervisorStateError(
            this.state,
            "preparing",
            `Supervisor is ${this.state}; call reset() before starting again`,
          ),
        );
      default:
        break;
    }

    const promise = new Promise<SupervisorStatus>((resolve, reject) => {
      this.startWaiter = { resolve, reject };
    });
    this.inflight = { target, promise };
    this.stopRequested = false;
    this.lifecycle = this.runLifecycle(target)
      .catch((err: unknown) => {
        log.error(`Lifecycle aborted in state ${this.state}: ${String(err)}`);
        this.settleStart({ error: err });
      })
      .finally(() => {
        this.lifecycle = null;
        this.inflight = null;
      });
    return promise;
  }

  private async runLifecycle(target: LifecycleTarget): Promise<void> {
    const outcome = await this.drive(target);
    switch (outcome.kind) {
      case "done":
        this.settleStart({ status: this.status() });
        return;
      case "stopped":
        this.transition("stopped");
        this.settleStart({ status: this.status() });
        return;
      case "failed":
      case "retry-port":
        this.fail(outcome.error);
        this.settleStart({ error: outcome.error });
        return;
    }
  }

  private async drive(target: LifecycleTarget): Promise<PhaseOutcome> {
    const abort = new AbortController();
    this.abort = abort;
    try {
      let inputs = this.state === "graph-ready" ? this.inputs : null;

      if (!inputs) {
        this.beginLineage();
        this.transition("preparing");
        let prepared: { inputs: GraphInputs; graphBuilt: boolean };
        try {
          prepared = await this.prepare(abort.signal);
        } catch (err) {
          if (this.stopRequested) {
            return { kind: "stopped" };
          }
          return {
            kind: "failed",
            error: asSupervisorError(
              err,
              (message) => new FetchError(`Preparing inputs failed: ${message}`, undefined, { cause: err }),
            ),
          };
        }
        if (this.stopRequested) {
          return { kind: "stopped" };
        }
        inputs = prepared.inputs;
        this.inputs = inputs;

        if (prepared.graphBuilt) {
          log.info(`Graph ${this.graphName} already built; skipping build`);
        } else {
          const built = await this.runBuild(inputs);
          if (built.kind !== "done") {
            return built;
          }
          this.recordGraphBuilt();
        }
        this.transition("graph-ready");
      }

      if (this.stopRequested) {
        return { kind: "stopped" };
      }
      if (target === "graph-ready") {
        return { kind: "done" };
      }
      return await this.runServe(inputs);
    } finally {
      this.abort = null;
    }
  }

  private async performStop(): Promise<SupervisorStatus> {
    const lifecycle = this.lifecycle;
    if (!lifecycle) {
      if (this.state === "idle" || this.state === "graph-ready") {
        this.transition("stopped");
      }
      return this.status();
    }

    log.info(`Stop requested in state ${this.state}`);
    this.stopRequested = true;
    this.abort?.abort();
    this.current?.queue.push({ kind: "stop", ts: this.now() });
    await lifecycle;
    return this.status();
  }

  // ---------------------------------------------------------------------------
  // Preparing
  // ---------------------------------------------------------------------------

  private async prepare(signal: AbortSignal): Promise<{ inputs: GraphInputs; graphBuilt: boolean }> {
    const { graphDirectory, boundingBox, fetcher, profile } = this.options;
    fs.mkdirSync(graphDirectory, { recursive: true });

    let manifest = loadGraphManifest(graphDirectory, this.graphName);
    const found = discoverInputs(graphDirectory);

    let mapExtract = existingFile(manifest.mapExtractPath) ?? found.mapExtract;
    if (mapExtract === undefined) {
      if (!fetcher || !boundingBox) {
        throw new FetchError(`No map extract in ${graphDirectory} and no bounding box to fetch one`);
      }
      log.info(`Fetching map extract for graph ${this.graphName}`);
      mapExtract = await fetcher.fetchMapExtract(boundingBox, graphDirectory, signal);
      manifest = updateGraphManifest(graphDirectory, manifest, {
        mapExtractPath: mapExtract,
        mapExtractFetchedAt: new Date().toISOString(),
      });
    }

    let transitFeeds = manifest.transitFeedPaths.filter((feed) => fs.existsSync(feed));
    if (transitFeeds.length === 0) {
      transitFeeds = found.transitFeeds;
    }
    if (transitFeeds.length === 0 && fetcher && boundingBox) {
      log.info(`Fetching transit feeds for graph ${this.graphName}`);
      try {
        transitFeeds = await fetcher.fetchTransitFeeds(boundingBox, graphDirectory, signal);
        manifest = updateGraphManifest(graphDirectory, manifest, {
          transitFeedPaths: transitFeeds,
          transitFeedsFetchedAt: new Date().toISOString(),
        });
      } catch (err) {
        if (this.options.requireTransitFeeds || signal.aborted) {
          throw err;
        }
        log.warn(
          `Continuing without transit feeds: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    }
    if (transitFeeds.length === 0 && this.options.requireTransitFeeds) {
      throw new FetchError(`No transit feeds available for graph ${this.graphName}`);
    }

    this.manifest = manifest;
    const artifact = profile.graphArtifact;
    const graphBuilt =
      !this.options.rebuildGraph &&
      manifest.graphBuiltAt !== undefined &&
      manifest.engine === profile.id &&
      (artifact === undefined || fs.existsSync(path.join(graphDirectory, artifact)));

    return { inputs: { mapExtract, transitFeeds }, graphBuilt };
  }

  private recordGraphBuilt(): void {
    const { graphDirectory, profile } = this.options;
    try {
      this.manifest = updateGraphManifest(
        graphDirectory,
        this.manifest ?? loadGraphManifest(graphDirectory, this.graphName),
        { engine: profile.id, graphBuiltAt: new Date().toISOString() },
      );
    } catch (err) {
      log.warn(`Could not record the built graph in the manifest: ${String(err)}`);
    }
  }

  // ---------------------------------------------------------------------------
  // Phases
  // ---------------------------------------------------------------------------

  private async launchPhase(request: LaunchRequest): Promise<ActivePhase | SupervisorError> {
    let engine: EngineProcess;
    try {
      engine = await this.options.launcher.launch(request);
    } catch (err) {
      return asSupervisorError(
        err,
        (message) =>
          new LaunchError(message, "SPAWN_FAILED", { phase: request.phase, cause: err }),
      );
    }

    const queue = new EventQueue<PhaseEvent>();
    const monitor = new OutputMonitor({
      process: engine,
      rules: this.options.profile.markers,
      events: queue,
      tail: this.tail,
      onLine: (line, ts) => this.emit({ kind: "supervisor.output", ts, phase: request.phase, line }),
    });
    const monitorDone = monitor.run().catch((err: unknown) => {
      log.error(`Output monitor for ${request.phase} failed: ${String(err)}`);
      queue.push({ kind: "monitor-failed", ts: this.now(), error: String(err) });
    });

    const active: ActivePhase = {
      phase: request.phase,
      engine,
      monitor,
      queue,
      monitorDone,
      startedAtMs: this.now(),
    };
    this.current = active;
    if (this.stopRequested) {
      queue.push({ kind: "stop", ts: this.now() });
    }
    return active;
  }

  /**
   * Wait for the next phase event, running `tick` every check interval while
   * none arrives. An event queued by the time a tick is due is taken first,
   * so a success signal always wins over a timeout firing at the same moment.
   */
  private async nextEvent(active: ActivePhase, tick: Tick): Promise<PhaseEvent | SupervisorError> {
    for (;;) {
      const take = await active.queue.next(this.timeouts.checkIntervalMs);
      if (take.kind === "item") {
        return this.observe(take.value);
      }
      if (take.kind === "closed") {
        return { kind: "monitor-failed", ts: this.now(), error: "event queue closed" };
      }

      const pending = active.queue.shift();
      if (pending !== undefined) {
        return this.observe(pending);
      }
      const timedOut = await tick(this.now());
      if (timedOut) {
        return timedOut;
      }
    }
  }

  private observe(event: PhaseEvent): PhaseEvent {
    if ("line" in event) {
      this.lastClassifiedLine = event.line;
    }
    return event;
  }

  /** Freeze and overall-duration checks of the build and startup phases. */
  private phaseDeadline(
    active: ActivePhase,
    now: number,
    limitMs: number,
    checkFreeze = true,
  ): SupervisorError | null {
    const idleMs = active.monitor.idleMs(now);
    if (checkFreeze && this.timeouts.freezeTimeoutMs > 0 && idleMs > this.timeouts.freezeTimeoutMs) {
      return new FreezeTimeoutError(idleMs, this.details(active));
    }
    if (limitMs > 0 && now - active.startedAtMs > limitMs) {
      return new PhaseTimeoutError(limitMs, this.details(active));
    }
    return null;
  }

  private async runBuild(inputs: GraphInputs): Promise<PhaseOutcome> {
    this.transition("building");
    const launched = await this.launchPhase({
      phase: "build",
      graphDirectory: this.options.graphDirectory,
      graphName: this.graphName,
      inputs,
    });
    if (launched instanceof SupervisorError) {
      return { kind: "failed", error: launched };
    }

    const active = launched;
    let completed = false;
    try {
      for (;;) {
        const next = await this.nextEvent(active, (now) =>
          // After the completion marker only the overall build limit applies
          this.phaseDeadline(active, now, this.timeouts.buildTimeoutMs, !completed),
        );
        if (next instanceof SupervisorError) {
          await this.terminate(active, "kill");
          return { kind: "failed", error: next };
        }

        switch (next.kind) {
          case "stop":
            await this.terminate(active, "graceful");
            return { kind: "stopped" };
          case "build-complete":
            completed = true;
            log.info(`Graph build complete: ${next.line}`);
            if (this.options.profile.buildCompletion === "terminate") {
              await this.terminate(active, "graceful");
              return { kind: "done" };
            }
            break;
          case "engine-error":
            await this.terminate(active, "kill");
            return {
              kind: "failed",
              error: new EngineError(next.line, next.category, this.details(active)),
            };
          case "exited":
            if (completed && next.exitCode === 0) {
              return { kind: "done" };
            }
            return {
              kind: "failed",
              error: new UnexpectedExitError(
                completed
                  ? `Graph build exited with ${describeExit(next)} after reporting completion`
                  : `Graph build exited with ${describeExit(next)} before reporting completion`,
                this.details(active, next.exitCode),
              ),
            };
          case "monitor-failed":
            await this.terminate(active, "kill");
            return {
              kind: "failed",
              error: new UnexpectedExitError(`Output monitor failed: ${next.error}`, this.details(active)),
            };
          case "serve-ready":
            break;
        }
      }
    } finally {
      await this.release(active);
    }
  }

  private async runServe(inputs: GraphInputs): Promise<PhaseOutcome> {
    this.transition("starting");
    const fixed = this.options.port;
    const maxRetries = this.options.maxPortRetries ?? DEFAULT_MAX_PORT_RETRIES;

    for (let attempt = 0; ; attempt++) {
      let port: number;
      let extraPorts: number[];
      try {
        port = await this.allocator.allocate(fixed);
        extraPorts = await this.allocator.allocateMany(this.options.profile.extraPorts, [port]);
      } catch (err) {
        return {
          kind: "failed",
          error: asSupervisorError(
            err,
            (message) =>
              new PortUnavailableError(fixed ?? null, message, { phase: "serve", cause: err }),
          ),
        };
      }
      if (this.stopRequested) {
        return { kind: "stopped" };
      }

      const outcome = await this.runServeAttempt(inputs, port, extraPorts);
      if (outcome.kind !== "retry-port") {
        return outcome;
      }
      if (fixed !== undefined) {
        return {
          kind: "failed",
          error: new PortUnavailableError(
            fixed,
            `Engine could not bind fixed port ${fixed}`,
            carryDetails(outcome.error),
          ),
        };
      }
      if (attempt >= maxRetries) {
        return {
          kind: "failed",
          error: new PortUnavailableError(
            port,
            `Engine could not bind a port after ${attempt + 1} attempts`,
            carryDetails(outcome.error),
          ),
        };
      }
      log.warn(`Engine could not bind port ${port}; retrying on a new port (${attempt + 1}/${maxRetries})`);
    }
  }

  private async runServeAttempt(
    inputs: GraphInputs,
    port: number,
    extraPorts: number[],
  ): Promise<PhaseOutcome> {
    const launched = await this.launchPhase({
      phase: "serve",
      graphDirectory: this.options.graphDirectory,
      graphName: this.graphName,
      inputs,
      port,
      extraPorts,
    });
    if (launched instanceof SupervisorError) {
      return { kind: "failed", error: launched };
    }

    const active = launched;
    try {
      for (;;) {
        const next = await this.nextEvent(active, (now) => this.serveTick(active, now));
        if (next instanceof SupervisorError) {
          await this.terminate(active, "kill");
          return { kind: "failed", error: next };
        }

        switch (next.kind) {
          case "stop":
            await this.terminate(active, "graceful");
            return { kind: "stopped" };
          case "serve-ready":
            if (this.state === "starting") {
              this.markRunning(port, next.port);
            }
            break;
          case "engine-error": {
            await this.terminate(active, "kill");
            const error = new EngineError(next.line, next.category, this.details(active));
            if (this.state === "starting" && next.category === "bind-failure") {
              return { kind: "retry-port", error };
            }
            return { kind: "failed", error };
          }
          case "exited":
            return {
              kind: "failed",
              error: new UnexpectedExitError(
                this.state === "starting"
                  ? `Engine exited with ${describeExit(next)} before it was ready`
                  : `Engine exited with ${describeExit(next)} while serving`,
                this.details(active, next.exitCode),
              ),
            };
          case "monitor-failed":
            await this.terminate(active, "kill");
            return {
              kind: "failed",
              error: new UnexpectedExitError(`Output monitor failed: ${next.error}`, this.details(active)),
            };
          case "build-complete":
            break;
        }
      }
    } finally {
      await this.release(active);
    }
  }

  /**
   * The engine may bind a different port than the one allocated (some engines
   * pick their own); the reported port wins and the difference is surfaced.
   */
  private markRunning(allocated: number, reported: number | undefined): void {
    let bound = allocated;
    if (reported !== undefined && reported !== allocated) {
      this.mismatch = { allocated, reported };
      log.warn(`Engine reported port ${reported} but ${allocated} was allocated; using ${reported}`);
      this.emit({ kind: "supervisor.port-mismatch", ts: this.now(), allocated, reported });
      bound = reported;
    }
    this.boundPort = bound;
    this.lastHealthyAtMs = this.now();
    this.transition("running");
    log.info(`Engine serving graph ${this.graphName} on port ${bound}`);
    this.settleStart({ status: this.status() });
  }

  private async serveTick(active: ActivePhase, now: number): Promise<SupervisorError | null> {
    if (this.state === "starting") {
      return this.phaseDeadline(active, now, this.timeouts.startupTimeoutMs);
    }

    const policy = this.options.serveLiveness ?? "process";
    if (policy === "process") {
      return null;
    }
    if (policy === "probe" && this.boundPort !== undefined) {
      if (await this.healthProbe(this.boundPort)) {
        this.lastHealthyAtMs = this.now();
      }
    }

    const lastActivity = Math.max(
      active.monitor.activity.lastOutputAtMs,
      policy === "probe" ? this.lastHealthyAtMs : 0,
    );
    const idleMs = this.now() - lastActivity;
    if (this.state === "running" && idleMs > this.timeouts.idleThresholdMs) {
      log.warn(`No engine activity for ${Math.round(idleMs / 1000)}s; marking frozen`);
      this.transition("frozen");
    } else if (this.state === "frozen" && idleMs <= this.timeouts.idleThresholdMs) {
      log.info("Engine activity resumed");
      this.transition("running");
    }
    return null;
  }

  // ---------------------------------------------------------------------------
  // Termination
  // ---------------------------------------------------------------------------

  private async terminate(active: ActivePhase, mode: "graceful" | "kill"): Promise<void> {
    const { engine } = active;
    if (engine.hasExited()) {
      return;
    }

    if (mode === "graceful") {
      engine.kill("SIGTERM");
      if (await waitForExit(engine, this.timeouts.stopGracePeriodMs)) {
        return;
      }
      log.warn(
        `Engine ${active.phase} did not exit within ${this.timeouts.stopGracePeriodMs}ms; sending SIGKILL`,
      );
    }
    engine.kill("SIGKILL");
    await engine.wait();
  }

  private async release(active: ActivePhase): Promise<void> {
    active.queue.close();
    active.engine.dispose();
    await active.monitorDone;
    this.lastOutputAtMs = active.monitor.activity.lastOutputAtMs;
    if (this.current === active) {
      this.current = null;
    }
  }
}

function waitForExit(engine: EngineProcess, timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(false), timeoutMs);
    engine.wait().then(
      () => {
        clearTimeout(timer);
        resolve(true);
      },
      (err: unknown) => {
        clearTimeout(timer);
        log.warn(`Waiting for engine exit failed: ${String(err)}`);
        resolve(false);
      },
    );
  });
}
