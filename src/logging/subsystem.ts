/**
 * Subsystem loggers
 *
 * Every module logs through a named subsystem logger ("engine-supervisor/launcher",
 * "engine/build", ...). Output goes through tslog; a JSON-lines copy can be
 * appended to a file for post-mortem inspection of long builds.
 */

import fs from "node:fs";
import path from "node:path";
import { Logger, type ILogObj } from "tslog";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type SubsystemLogger = {
  readonly subsystem: string;
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  child: (name: string) => SubsystemLogger;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

const root = new Logger<ILogObj>({
  name: "engine-supervisor",
  type: "pretty",
  minLevel: 0,
  hideLogPositionForProduction: true,
});

const subLoggers = new Map<string, Logger<ILogObj>>();

let minLevel: LogLevel = parseLogLevel(process.env.ENGINE_SUPERVISOR_LOG_LEVEL) ?? "info";
let logFilePath: string | null = null;

export function parseLogLevel(raw: string | undefined): LogLevel | undefined {
  const normalized = raw?.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  return undefined;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

/**
 * Mirror every emitted record to a JSON-lines file. Pass null to stop.
 */
export function setLogFile(filePath: string | null): void {
  if (filePath) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }
  logFilePath = filePath;
}

function subLogger(subsystem: string): Logger<ILogObj> {
  let logger = subLoggers.get(subsystem);
  if (!logger) {
    logger = root.getSubLogger({ name: subsystem });
    subLoggers.set(subsystem, logger);
  }
  return logger;
}

function writeFileRecord(level: LogLevel, subsystem: string, message: string): void {
  if (!logFilePath) {
    return;
  }
  const record = { ts: new Date().toISOString(), level, subsystem, message };
  try {
    fs.appendFileSync(logFilePath, `${JSON.stringify(record)}\n`, "utf8");
  } catch (err) {
    // Stop mirroring rather than fail every later log call.
    const failedPath = logFilePath;
    logFilePath = null;
    root.error(`Failed to write log file ${failedPath}: ${String(err)}`);
  }
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: LogLevel, message: string) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) {
      return;
    }
    const logger = subLogger(subsystem);
    switch (level) {
      case "debug":
        logger.debug(message);
        break;
      case "info":
        logger.info(message);
        break;
      case "warn":
        logger.warn(message);
        break;
      case "error":
        logger.error(message);
        break;
    }
    writeFileRecord(level, subsystem, message);
  };

  return {
    subsystem,
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
