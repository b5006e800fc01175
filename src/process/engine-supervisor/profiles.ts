/**
 * Engine Profiles
 *
 * A profile describes one engine family: the arguments of its build and
 * serve invocations and the table of output markers that the monitor turns
 * into lifecycle events. New engine versions add rules here; the state
 * machine never looks at raw text.
 */

import path from "node:path";
import type { EngineErrorCategory, GraphInputs, MonitorEvent, Phase } from "./types.js";

// =============================================================================
// Marker Rules
// =============================================================================

export type MarkerRule =
  | { signal: "build-complete"; pattern: RegExp }
  | { signal: "serve-ready"; pattern: RegExp; portGroup?: number }
  | { signal: "engine-error"; pattern: RegExp; category: EngineErrorCategory };

export const ERROR_MARKERS: readonly MarkerRule[] = [
  { signal: "engine-error", pattern: /OutOfMemoryError/, category: "out-of-memory" },
  {
    signal: "engine-error",
    pattern: /Address already in use|BindException|Failed to bind/i,
    category: "bind-failure",
  },
  {
    signal: "engine-error",
    pattern: /\b(?:malformed|corrupt(?:ed)?)\b.*\b(?:input|osm|pbf|gtfs|feed)\b/i,
    category: "bad-input",
  },
  { signal: "engine-error", pattern: /Exception in thread/, category: "uncaught-exception" },
];

function appliesTo(rule: MarkerRule, phase: Phase): boolean {
  switch (rule.signal) {
    case "build-complete":
      return phase === "build";
    case "serve-ready":
      return phase === "serve";
    case "engine-error":
      return true;
  }
}

function parsePort(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const port = Number.parseInt(raw, 10);
  return Number.isInteger(port) && port > 0 && port <= 65535 ? port : undefined;
}

/**
 * Classify one output line. The first rule that applies to the phase and
 * matches wins; unmatched lines yield null.
 */
export function classifyLine(
  rules: readonly MarkerRule[],
  phase: Phase,
  line: string,
  ts: number,
): MonitorEvent | null {
  for (const rule of rules) {
    if (!appliesTo(rule, phase)) {
      continue;
    }
    const match = rule.pattern.exec(line);
    if (!match) {
      continue;
    }
    switch (rule.signal) {
      case "build-complete":
        return { kind: "build-complete", ts, line };
      case "serve-ready": {
        const port = rule.portGroup === undefined ? undefined : parsePort(match[rule.portGroup]);
        return port === undefined
          ? { kind: "serve-ready", ts, line }
          : { kind: "serve-ready", ts, line, port };
      }
      case "engine-error":
        return { kind: "engine-error", ts, line, category: rule.category };
    }
  }
  return null;
}

// =============================================================================
// Profiles
// =============================================================================

export type ArgContext = {
  graphDirectory: string;
  graphName: string;
  graphRoot: string;
  inputs: GraphInputs;
  port?: number;
  extraPorts: number[];
};

export type EngineProfile = {
  id: string;
  markers: readonly MarkerRule[];
  /**
   * exit: the build process exits by itself and must exit 0.
   * terminate: the build process keeps running after the graph is loaded and
   * is stopped by the supervisor once the completion marker appears.
   */
  buildCompletion: "exit" | "terminate";
  /** Secondary ports the serve invocation needs besides the main port */
  extraPorts: number;
  /** Path, relative to the graph directory, that exists once a graph is built */
  graphArtifact?: string;
  buildArgs: (ctx: ArgContext) => string[];
  serveArgs: (ctx: ArgContext) => string[];
};

function requirePort(ctx: ArgContext, profile: string): number {
  if (ctx.port === undefined) {
    throw new Error(`${profile} serve invocation needs a port`);
  }
  return ctx.port;
}

export const OTP_PROFILE: EngineProfile = {
  id: "otp",
  markers: [
    ...ERROR_MARKERS,
    { signal: "build-complete", pattern: /Graph written/ },
    { signal: "serve-ready", pattern: /Grizzly server running/ },
  ],
  buildCompletion: "exit",
  extraPorts: 1,
  graphArtifact: "Graph.obj",
  buildArgs: (ctx) => ["--build", ctx.graphDirectory],
  serveArgs: (ctx) => {
    const port = requirePort(ctx, "otp");
    const securePort = ctx.extraPorts[0];
    const args = ["--graphs", ctx.graphRoot, "--router", ctx.graphName, "--server"];
    args.push("--port", String(port));
    if (securePort !== undefined) {
      args.push("--securePort", String(securePort));
    }
    return args;
  },
};

export type GraphHopperOptions = {
  /** Properties file passed as `config=` */
  configFile?: string;
  /** Web app directory passed as `jetty.resourcebase=` */
  resourceBase?: string;
};

export function createGraphHopperProfile(options: GraphHopperOptions = {}): EngineProfile {
  const args = (ctx: ArgContext): string[] => {
    const out: string[] = [];
    if (options.resourceBase) {
      out.push(`jetty.resourcebase=${options.resourceBase}`);
    }
    if (options.configFile) {
      out.push(`config=${options.configFile}`);
    }
    out.push(
      `datareader.file=${ctx.inputs.mapExtract}`,
      `graph.location=${path.join(ctx.graphDirectory, "graph-cache")}`,
      "graph.flag_encoders=car,foot,bike",
    );
    return out;
  };

  return {
    id: "graphhopper",
    markers: [
      ...ERROR_MARKERS,
      { signal: "build-complete", pattern: /loaded graph/i },
      { signal: "serve-ready", pattern: /Started server at HTTP(?:\s*:?\s*(\d+))?/, portGroup: 1 },
    ],
    buildCompletion: "terminate",
    extraPorts: 0,
    graphArtifact: "graph-cache",
    buildArgs: (ctx) => args(ctx),
    serveArgs: (ctx) => [...args(ctx), `jetty.port=${requirePort(ctx, "graphhopper")}`],
  };
}

export const GRAPHHOPPER_PROFILE: EngineProfile = createGraphHopperProfile();

/** Markers understood by the template profile when none are configured. */
export const GENERIC_MARKERS: readonly MarkerRule[] = [
  ...ERROR_MARKERS,
  { signal: "build-complete", pattern: /\bGraph (?:built|written)\b/i },
  { signal: "serve-ready", pattern: /Server started on port (\d+)/i, portGroup: 1 },
  { signal: "serve-ready", pattern: /Grizzly server running/ },
  { signal: "serve-ready", pattern: /Started server at HTTP(?:\s*:?\s*(\d+))?/, portGroup: 1 },
];

export type TemplateProfileOptions = {
  id?: string;
  buildArgs: string[];
  serveArgs: string[];
  markers?: readonly MarkerRule[];
  buildCompletion?: "exit" | "terminate";
  extraPorts?: number;
  graphArtifact?: string;
};

/**
 * Expand `{placeholder}` arguments. An argument that is exactly
 * `{transitFeeds}` expands to one argument per feed.
 */
export function expandTemplate(template: readonly string[], ctx: ArgContext): string[] {
  const values: Record<string, string | undefined> = {
    graphDir: ctx.graphDirectory,
    graphName: ctx.graphName,
    graphRoot: ctx.graphRoot,
    mapExtract: ctx.inputs.mapExtract,
    port: ctx.port === undefined ? undefined : String(ctx.port),
  };
  ctx.extraPorts.forEach((port, index) => {
    values[`extraPort${index}`] = String(port);
  });

  const args: string[] = [];
  for (const arg of template) {
    if (arg === "{transitFeeds}") {
      args.push(...ctx.inputs.transitFeeds);
      continue;
    }
    args.push(
      arg.replace(/\{(\w+)\}/g, (whole, key: string) => {
        const value = values[key];
        if (value === undefined) {
          throw new Error(`No value for argument placeholder ${whole}`);
        }
        return value;
      }),
    );
  }
  return args;
}

export function createTemplateProfile(options: TemplateProfileOptions): EngineProfile {
  return {
    id: options.id ?? "generic",
    markers: options.markers ?? GENERIC_MARKERS,
    buildCompletion: options.buildCompletion ?? "exit",
    extraPorts: options.extraPorts ?? 0,
    graphArtifact: options.graphArtifact,
    buildArgs: (ctx) => expandTemplate(options.buildArgs, ctx),
    serveArgs: (ctx) => expandTemplate(options.serveArgs, ctx),
  };
}

export type EngineKind = "otp" | "graphhopper" | "generic";

export function resolveProfile(
  kind: EngineKind,
  template?: { buildArgs: string[]; serveArgs: string[] },
  graphhopper?: GraphHopperOptions,
): EngineProfile {
  switch (kind) {
    case "otp":
      return OTP_PROFILE;
    case "graphhopper":
      return graphhopper?.configFile || graphhopper?.resourceBase
        ? createGraphHopperProfile(graphhopper)
        : GRAPHHOPPER_PROFILE;
    case "generic":
      if (!template) {
        throw new Error("generic engine needs buildArgs and serveArgs templates");
      }
      return createTemplateProfile(template);
  }
}
