/**
 * Engine Process Launcher
 *
 * Spawns the engine for one phase with its working directory set to the
 * graph directory, and exposes its stdout and stderr as one interleaved,
 * line-buffered stream. Every line is also appended to a per-invocation log
 * file next to the graph.
 */

import { spawn, type ChildProcess } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { registerCleanup } from "./cleanup.js";
import { LaunchError, type LaunchErrorCode } from "./errors.js";
import { EventQueue } from "./event-queue.js";
import type { EngineProfile } from "./profiles.js";
import type {
  EngineExit,
  EngineLauncher,
  EngineProcess,
  LaunchRequest,
  Phase,
} from "./types.js";

const log = createSubsystemLogger("engine-supervisor/launcher");

// =============================================================================
// Config
// =============================================================================

export type ProcessLauncherConfig = {
  /** Executable to run: "java" for jar-based engines, or the engine binary */
  command: string;
  /** Engine jar; when set the argv starts with [...jvmArgs, "-jar", jarPath] */
  jarPath?: string;
  jvmArgs?: string[];
  /** Appended after the profile's arguments */
  extraArgs?: string[];
  env?: Record<string, string>;
  profile: EngineProfile;
  /** Write each invocation's output to <graphDirectory>/<phase>_<timestamp>.log */
  logToFile?: boolean;
};

export function buildEngineArgv(
  config: ProcessLauncherConfig,
  request: LaunchRequest,
): { command: string; args: string[] } {
  const ctx = {
    graphDirectory: request.graphDirectory,
    graphName: request.graphName,
    graphRoot: path.dirname(request.graphDirectory),
    inputs: request.inputs,
    port: request.port,
    extraPorts: request.extraPorts ?? [],
  };
  const profileArgs =
    request.phase === "build" ? config.profile.buildArgs(ctx) : config.profile.serveArgs(ctx);

  const args: string[] = [];
  if (config.jarPath) {
    args.push(...(config.jvmArgs ?? []), "-jar", config.jarPath);
  }
  args.push(...profileArgs, ...(config.extraArgs ?? []));
  return { command: config.command, args };
}

export function logFileName(phase: Phase, now: Date = new Date()): string {
  return `${phase}_${now.toISOString().replace(/[:.]/g, "-")}.log`;
}

function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function launchErrorCode(err: unknown): LaunchErrorCode {
  switch (errnoCode(err)) {
    case "ENOENT":
      return "COMMAND_NOT_FOUND";
    case "EACCES":
      return "PERMISSION_DENIED";
    default:
      return "SPAWN_FAILED";
  }
}

function assertLaunchable(config: ProcessLauncherConfig, graphDirectory: string): void {
  if (config.jarPath && !fs.existsSync(config.jarPath)) {
    throw new LaunchError(`Engine jar not found: ${config.jarPath}`, "COMMAND_NOT_FOUND");
  }
  if (config.command.includes(path.sep)) {
    try {
      fs.accessSync(config.command, fs.constants.X_OK);
    } catch (err) {
      const code = launchErrorCode(err);
      throw new LaunchError(
        code === "COMMAND_NOT_FOUND"
          ? `Engine executable not found: ${config.command}`
          : `Engine executable is not runnable: ${config.command}`,
        code,
        { cause: err },
      );
    }
  }
  if (!fs.existsSync(graphDirectory)) {
    throw new LaunchError(`Graph directory does not exist: ${graphDirectory}`, "SPAWN_FAILED");
  }
}

// =============================================================================
// Child Process Handle
// =============================================================================

class ChildEngineProcess implements EngineProcess {
  readonly lines = new EventQueue<string>();
  readonly startedAtMs = Date.now();
  private exit: EngineExit | undefined;
  private readonly exited: Promise<EngineExit>;
  private readonly unregisterCleanup: () => void;
  private openStreams = 0;

  constructor(
    private readonly child: ChildProcess,
    readonly phase: Phase,
    private readonly logStream: fs.WriteStream | null,
  ) {
    this.exited = new Promise<EngineExit>((resolve) => {
      child.once("exit", (code, signal) => {
        this.exit = { exitCode: code, exitSignal: signal };
        this.unregisterCleanup();
        resolve(this.exit);
      });
    });

    this.unregisterCleanup = registerCleanup(`engine ${phase} (pid ${child.pid ?? "?"})`, () => {
      if (!this.hasExited()) {
        child.kill("SIGKILL");
      }
    });

    this.attach(child.stdout);
    this.attach(child.stderr);
    if (this.openStreams === 0) {
      this.lines.close();
    }
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  private attach(stream: Readable | null): void {
    if (!stream) {
      return;
    }
    this.openStreams++;
    const reader = createInterface({ input: stream, crlfDelay: Infinity });
    reader.on("line", (raw) => {
      const line = raw.trimEnd();
      if (line.length === 0) {
        return;
      }
      this.logStream?.write(`${line}\n`);
      this.lines.push(line);
    });
    reader.once("close", () => {
      this.openStreams--;
      if (this.openStreams === 0) {
        this.lines.close();
      }
    });
  }

  hasExited(): boolean {
    return this.exit !== undefined;
  }

  exitCode(): number | null | undefined {
    return this.exit?.exitCode;
  }

  wait(): Promise<EngineExit> {
    return this.exited;
  }

  kill(signal: NodeJS.Signals = "SIGTERM"): void {
    if (this.hasExited()) {
      return;
    }
    this.child.kill(signal);
  }

  dispose(): void {
    if (!this.hasExited()) {
      this.child.kill("SIGKILL");
    }
    this.unregisterCleanup();
    this.child.stdout?.destroy();
    this.child.stderr?.destroy();
    this.logStream?.end();
  }
}

// =============================================================================
// Launcher
// =============================================================================

export function createProcessLauncher(config: ProcessLauncherConfig): EngineLauncher {
  return {
    async launch(request: LaunchRequest): Promise<EngineProcess> {
      assertLaunchable(config, request.graphDirectory);
      const { command, args } = buildEngineArgv(config, request);

      log.info(`Launching ${request.phase}: ${command} ${args.join(" ")}`);

      let child: ChildProcess;
      try {
        child = spawn(command, args, {
          cwd: request.graphDirectory,
          env: { ...process.env, ...config.env },
          stdio: ["ignore", "pipe", "pipe"],
          detached: false,
        });
      } catch (err) {
        throw new LaunchError(`Failed to spawn ${command}: ${String(err)}`, launchErrorCode(err), {
          phase: request.phase,
          cause: err,
        });
      }

      const logStream = config.logToFile
        ? fs.createWriteStream(path.join(request.graphDirectory, logFileName(request.phase)), {
            flags: "a",
          })
        : null;
      logStream?.on("error", (err) => {
        log.warn(`Engine log file write failed: ${err.message}`);
      });

      const handle = new ChildEngineProcess(child, request.phase, logStream);

      try {
        await new Promise<void>((resolve, reject) => {
          const onSpawn = () => {
            child.off("error", onError);
            resolve();
          };
          const onError = (err: Error) => {
            child.off("spawn", onSpawn);
            reject(err);
          };
          child.once("spawn", onSpawn);
          child.once("error", onError);
        });
      } catch (err) {
        handle.dispose();
        throw new LaunchError(
          `Failed to spawn ${command}: ${err instanceof Error ? err.message : String(err)}`,
          launchErrorCode(err),
          { phase: request.phase, cause: err },
        );
      }

      child.on("error", (err) => {
        log.error(`Engine ${request.phase} process error: ${err.message}`);
      });

      log.info(`Engine ${request.phase} started (PID: ${handle.pid ?? "unknown"})`);
      return handle;
    },
  };
}
