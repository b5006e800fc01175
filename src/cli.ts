#!/usr/bin/env node
/**
 * engine-supervisor command line
 *
 *   engine-supervisor start  [--config=<file>] [--graph=<name>] [--port=<n>] [--log-level=<level>]
 *   engine-supervisor build  [--config=<file>] [--graph=<name>] [--dry-run]
 *   engine-supervisor status | stop | tail [--lines=<n>]   [--control=<addr>] [--event=<addr>]
 *
 * Exit codes: 0 ok, 2 graph build failed, 3 engine failed, 4 configuration
 * error, 5 control plane unreachable.
 */

import { ConfigError, loadConfig } from "./config/load.js";
import type { SupervisorConfig } from "./config/schema.js";
import { planDownloads } from "./fetch/http-fetcher.js";
import { createSubsystemLogger, parseLogLevel, setLogFile, setLogLevel } from "./logging/subsystem.js";
import { ControlRequestError, createSupervisorClient } from "./process/engine-supervisor/client.js";
import { SupervisorError } from "./process/engine-supervisor/errors.js";
import { createEngineSupervisor } from "./process/engine-supervisor/factory.js";
import { DEFAULT_CONTROL_ADDRESS, DEFAULT_EVENT_ADDRESS } from "./process/engine-supervisor/protocol.js";
import { startControlServer } from "./process/engine-supervisor/server.js";
import type { SupervisorStatus } from "./process/engine-supervisor/types.js";

const log = createSubsystemLogger("cli");

export const EXIT_OK = 0;
export const EXIT_BUILD_FAILED = 2;
export const EXIT_FAILED = 3;
export const EXIT_CONFIG_ERROR = 4;
export const EXIT_UNREACHABLE = 5;

/** Covers the engine's SIGTERM grace period */
const STOP_REQUEST_TIMEOUT_MS = 2 * 60 * 1000;

const COMMANDS = ["start", "build", "status", "stop", "tail"] as const;
export type Command = (typeof COMMANDS)[number];

export type CliArgs = {
  command: Command;
  configPath?: string;
  graphName?: string;
  port?: number;
  logLevel?: string;
  controlAddress?: string;
  eventAddress?: string;
  instance?: string;
  lines?: number;
  /** build only: print the download URLs and exit */
  dryRun?: boolean;
};

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

function parseInteger(flag: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${flag} expects an integer, got "${raw}"`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const [command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new ConfigError(
      `Unknown command "${command ?? ""}"; expected one of ${COMMANDS.join(", ")}`,
    );
  }

  const args: CliArgs = { command };
  for (const arg of rest) {
    const eq = arg.indexOf("=");
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const value = eq === -1 ? "" : arg.slice(eq + 1);
    switch (flag) {
      case "--config":
        args.configPath = value;
        break;
      case "--graph":
        args.graphName = value;
        break;
      case "--port":
        args.port = parseInteger(flag, value);
        break;
      case "--log-level":
        args.logLevel = value;
        break;
      case "--control":
        args.controlAddress = value;
        break;
      case "--event":
        args.eventAddress = value;
        break;
      case "--instance":
        args.instance = value;
        break;
      case "--lines":
        args.lines = parseInteger(flag, value);
        break;
      case "--dry-run":
        args.dryRun = true;
        break;
      default:
        throw new ConfigError(`Unknown option ${arg}`);
    }
  }
  return args;
}

export function exitCodeFor(status: SupervisorStatus): number {
  switch (status.state) {
    case "build-failed":
      return EXIT_BUILD_FAILED;
    case "failed":
      return EXIT_FAILED;
    default:
      return EXIT_OK;
  }
}

function loadCliConfig(args: CliArgs): SupervisorConfig {
  const control: Record<string, string> = {};
  if (args.controlAddress) {
    control.controlAddress = args.controlAddress;
  }
  if (args.eventAddress) {
    control.eventAddress = args.eventAddress;
  }
  if (args.instance) {
    control.instance = args.instance;
  }
  return loadConfig({
    path: args.configPath,
    overrides: {
      graphName: args.graphName,
      port: args.port,
      logLevel: args.logLevel,
      control: Object.keys(control).length > 0 ? control : undefined,
    },
  });
}

function applyLogging(config: SupervisorConfig): void {
  setLogLevel(config.logLevel);
  if (config.logFile) {
    setLogFile(config.logFile);
  }
}

function failureCode(err: unknown): number {
  if (err instanceof SupervisorError && err.kind !== "SupervisorState") {
    return err.phase === "build" || err.reason === "fetch-error" ? EXIT_BUILD_FAILED : EXIT_FAILED;
  }
  return EXIT_FAILED;
}

// =============================================================================
// Supervising Commands
// =============================================================================

async function runStart(args: CliArgs): Promise<number> {
  const config = loadCliConfig(args);
  applyLogging(config);

  const supervisor = createEngineSupervisor(config);
  const server = await startControlServer(supervisor, config.control);

  let stopping: Promise<SupervisorStatus> | null = null;
  const requestStop = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, stopping engine...`);
    if (!stopping) {
      stopping = supervisor.stop();
    }
  };
  process.on("SIGINT", requestStop);
  process.on("SIGTERM", requestStop);

  let unsubscribe: () => void = () => {};
  const ended = new Promise<SupervisorStatus>((resolve) => {
    unsubscribe = supervisor.onEvent((event) => {
      if (event.kind === "supervisor.state" && (event.to === "stopped" || event.to === "failed")) {
        resolve(supervisor.status());
      }
    });
  });

  try {
    let status: SupervisorStatus;
    try {
      status = await supervisor.start();
    } catch (err) {
      log.error(`Engine did not start: ${err instanceof Error ? err.message : String(err)}`);
      return exitCodeFor(supervisor.status());
    }
    if (status.state !== "running") {
      return exitCodeFor(status);
    }

    const finalState = await ended;
    if (stopping) {
      await stopping;
    }
    return exitCodeFor(finalState);
  } finally {
    unsubscribe();
    process.off("SIGINT", requestStop);
    process.off("SIGTERM", requestStop);
    await supervisor.stop();
    await server.stop();
  }
}

async function printDownloadPlan(config: SupervisorConfig): Promise<number> {
  if (!config.boundingBox) {
    throw new ConfigError("--dry-run needs a boundingBox in the configuration");
  }
  const plan = await planDownloads(config.boundingBox, { waysOnly: config.download.waysOnly });
  console.log(plan.mapExtractUrl);
  for (const url of plan.transitFeedUrls) {
    console.log(url);
  }
  return EXIT_OK;
}

async function runBuild(args: CliArgs): Promise<number> {
  const config = loadCliConfig(args);
  applyLogging(config);
  if (args.dryRun) {
    return printDownloadPlan(config);
  }

  const supervisor = createEngineSupervisor(config);
  const requestStop = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, stopping build...`);
    supervisor.stop().catch((err: unknown) => {
      log.error(`Stop failed: ${String(err)}`);
    });
  };
  process.on("SIGINT", requestStop);
  process.on("SIGTERM", requestStop);
  try {
    const status = await supervisor.buildGraph();
    log.info(`Graph ${config.graphName} is ${status.state}`);
    return exitCodeFor(status);
  } catch (err) {
    log.error(`Graph build failed: ${err instanceof Error ? err.message : String(err)}`);
    return supervisor.currentState === "build-failed" ? EXIT_BUILD_FAILED : failureCode(err);
  } finally {
    process.off("SIGINT", requestStop);
    process.off("SIGTERM", requestStop);
  }
}

// =============================================================================
// Client Commands
// =============================================================================

async function runClientCommand(args: CliArgs): Promise<number> {
  const client = createSupervisorClient({
    controlAddress:
      args.controlAddress ?? process.env.ENGINE_SUPERVISOR_CONTROL ?? DEFAULT_CONTROL_ADDRESS,
    eventAddress: args.eventAddress ?? process.env.ENGINE_SUPERVISOR_EVENT ?? DEFAULT_EVENT_ADDRESS,
    instance: args.instance,
  });

  await client.connect();
  try {
    switch (args.command) {
      case "status": {
        const status = await client.status();
        console.log(JSON.stringify(status, null, 2));
        return exitCodeFor(status);
      }
      case "stop": {
        const status = await client.stop(STOP_REQUEST_TIMEOUT_MS);
        console.log(`Engine ${status.state}`);
        return EXIT_OK;
      }
      case "tail":
        for (const line of await client.tail(args.lines)) {
          console.log(line);
        }
        return EXIT_OK;
      default:
        throw new ConfigError(`${args.command} is not a client command`);
    }
  } catch (err) {
    if (err instanceof ControlRequestError) {
      log.error(`Control plane request failed: ${err.message}`);
      return EXIT_UNREACHABLE;
    }
    throw err;
  } finally {
    await client.disconnect();
  }
}

export async function main(argv: readonly string[]): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
    if (args.logLevel !== undefined) {
      const level = parseLogLevel(args.logLevel);
      if (!level) {
        throw new ConfigError(`Unknown log level "${args.logLevel}"`);
      }
      setLogLevel(level);
    }
  } catch (err) {
    log.error(err instanceof Error ? err.message : String(err));
    return EXIT_CONFIG_ERROR;
  }

  try {
    switch (args.command) {
      case "start":
        return await runStart(args);
      case "build":
        return await runBuild(args);
      default:
        return await runClientCommand(args);
    }
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(err.message);
      return EXIT_CONFIG_ERROR;
    }
    log.error(`engine-supervisor ${args.command} failed: ${err instanceof Error ? err.message : String(err)}`);
    return failureCode(err);
  }
}

const isMainModule =
  process.argv[1]?.endsWith("cli.ts") ||
  process.argv[1]?.endsWith("cli.js") ||
  process.argv[1]?.endsWith("engine-supervisor");
if (isMainModule) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      log.error(`Unhandled error: ${String(err)}`);
      process.exitCode = EXIT_FAILED;
    },
  );
}
