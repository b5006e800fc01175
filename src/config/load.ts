import fs from "node:fs";
import { supervisorConfigSchema, type SupervisorConfig } from "./schema.js";

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n  ${issues.join("\n  ")}` : message);
    this.name = "ConfigError";
  }
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Nested objects merge; everything else in `patch` replaces `base`. */
export function mergeConfig(base: RawConfig, patch: RawConfig): RawConfig {
  const merged: RawConfig = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined) {
      continue;
    }
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? mergeConfig(current, value) : value;
  }
  return merged;
}

export function readConfigFile(filePath: string): RawConfig {
  let text: string;
  try {
    text = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${String(err)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${String(err)}`);
  }
  if (!isRecord(data)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  return data;
}

/**
 * Overrides taken from the environment:
 * ENGINE_SUPERVISOR_PORT, ENGINE_SUPERVISOR_CONTROL, ENGINE_SUPERVISOR_EVENT,
 * ENGINE_SUPERVISOR_LOG_LEVEL, ENGINE_SUPERVISOR_GRAPH_ROOT.
 */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): RawConfig {
  const overrides: RawConfig = {};
  const control: RawConfig = {};

  if (env.ENGINE_SUPERVISOR_PORT) {
    overrides.port = Number(env.ENGINE_SUPERVISOR_PORT);
  }
  if (env.ENGINE_SUPERVISOR_GRAPH_ROOT) {
    overrides.graphRoot = env.ENGINE_SUPERVISOR_GRAPH_ROOT;
  }
  if (env.ENGINE_SUPERVISOR_LOG_LEVEL) {
    overrides.logLevel = env.ENGINE_SUPERVISOR_LOG_LEVEL.trim().toLowerCase();
  }
  if (env.ENGINE_SUPERVISOR_CONTROL) {
    control.controlAddress = env.ENGINE_SUPERVISOR_CONTROL;
  }
  if (env.ENGINE_SUPERVISOR_EVENT) {
    control.eventAddress = env.ENGINE_SUPERVISOR_EVENT;
  }
  if (Object.keys(control).length > 0) {
    overrides.control = control;
  }
  return overrides;
}

export type LoadConfigOptions = {
  /** JSON config file */
  path?: string;
  /** Highest precedence, e.g. from command-line flags */
  overrides?: RawConfig;
  env?: NodeJS.ProcessEnv;
};

/**
 * Resolve the configuration: file, then environment, then explicit
 * overrides, validated against the schema.
 */
export function loadConfig(options: LoadConfigOptions = {}): SupervisorConfig {
  let raw: RawConfig = options.path ? readConfigFile(options.path) : {};
  raw = mergeConfig(raw, envOverrides(options.env));
  raw = mergeConfig(raw, options.overrides ?? {});

  const parsed = supervisorConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      "Invalid configuration",
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`),
    );
  }
  return parsed.data;
}
