/**
 * Supervisor configuration schema. Defaults live here so a config file only
 * needs to name what differs.
 */

import { z } from "zod";
import {
  DEFAULT_CONTROL_ADDRESS,
  DEFAULT_EVENT_ADDRESS,
  DEFAULT_MAX_PORT_RETRIES,
} from "../process/engine-supervisor/protocol.js";
import { DEFAULT_MIN_EXTRACT_BYTES } from "../fetch/overpass.js";
import { DEFAULT_FEED_CONCURRENCY } from "../fetch/transitland.js";

export const portSchema = z.number().int().min(1).max(65535);

export const boundingBoxSchema = z
  .object({
    left: z.number().min(-180).max(180),
    bottom: z.number().min(-90).max(90),
    right: z.number().min(-180).max(180),
    top: z.number().min(-90).max(90),
  })
  .refine((box) => box.left < box.right && box.bottom < box.top, {
    message: "left must be less than right and bottom less than top",
  });

export const engineConfigSchema = z
  .object({
    kind: z.enum(["otp", "graphhopper", "generic"]).default("otp"),
    /** Executable; "java" for jar-based engines */
    command: z.string().min(1).default("java"),
    jar: z.string().min(1).optional(),
    jvmArgs: z.array(z.string()).default(["-Xmx2G"]),
    extraArgs: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
    /** GraphHopper properties file */
    configFile: z.string().min(1).optional(),
    /** GraphHopper web app directory */
    resourceBase: z.string().min(1).optional(),
    /** Argument templates of the generic engine */
    buildArgs: z.array(z.string()).optional(),
    serveArgs: z.array(z.string()).optional(),
  })
  .refine(
    (engine) =>
      engine.kind !== "generic" || (engine.buildArgs !== undefined && engine.serveArgs !== undefined),
    { message: "a generic engine needs buildArgs and serveArgs", path: ["buildArgs"] },
  );

export const timeoutsSchema = z.object({
  freezeTimeoutMs: z.number().int().nonnegative().optional(),
  idleThresholdMs: z.number().int().positive().optional(),
  buildTimeoutMs: z.number().int().nonnegative().optional(),
  startupTimeoutMs: z.number().int().nonnegative().optional(),
  checkIntervalMs: z.number().int().positive().optional(),
  stopGracePeriodMs: z.number().int().nonnegative().optional(),
});

export const downloadSchema = z.object({
  /** Highway ways and their nodes only; no points of interest */
  waysOnly: z.boolean().default(false),
  minExtractBytes: z.number().int().nonnegative().default(DEFAULT_MIN_EXTRACT_BYTES),
  feedConcurrency: z.number().int().positive().default(DEFAULT_FEED_CONCURRENCY),
});

export const controlSchema = z.object({
  controlAddress: z.string().min(1).default(DEFAULT_CONTROL_ADDRESS),
  eventAddress: z.string().min(1).default(DEFAULT_EVENT_ADDRESS),
  instance: z.string().min(1).optional(),
});

export const supervisorConfigSchema = z
  .object({
    graphName: z.string().min(1),
    /** Parent of the per-graph directories */
    graphRoot: z.string().min(1).default("graphs"),
    boundingBox: boundingBoxSchema.optional(),
    engine: engineConfigSchema.default({}),
    /** Fixed serve port; dynamic allocation when omitted */
    port: portSchema.optional(),
    /** Scan this range for a free port instead of asking the OS */
    portRange: z.object({ from: portSchema, to: portSchema }).optional(),
    maxPortRetries: z.number().int().nonnegative().default(DEFAULT_MAX_PORT_RETRIES),
    timeouts: timeoutsSchema.default({}),
    serveLiveness: z.enum(["process", "output", "probe"]).default("process"),
    rebuildGraph: z.boolean().default(false),
    requireTransitFeeds: z.boolean().default(false),
    download: downloadSchema.default({}),
    /** Keep a per-invocation engine log file in the graph directory */
    engineLogFiles: z.boolean().default(true),
    logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
    /** JSON-lines copy of the supervisor's own log */
    logFile: z.string().min(1).optional(),
    control: controlSchema.default({}),
  })
  .refine((config) => !config.portRange || config.portRange.from <= config.portRange.to, {
    message: "portRange.from must not exceed portRange.to",
    path: ["portRange"],
  });

export type SupervisorConfig = z.infer<typeof supervisorConfigSchema>;
export type SupervisorConfigInput = z.input<typeof supervisorConfigSchema>;
