import path from "node:path";
import type { SupervisorConfig } from "../../config/schema.js";
import { createHttpDataFetcher } from "../../fetch/http-fetcher.js";
import { sanitizeGraphName } from "./graph-manifest.js";
import { createProcessLauncher } from "./launcher.js";
import { createPortAllocator } from "./port-allocator.js";
import { resolveProfile } from "./profiles.js";
import { EngineSupervisor, type EngineSupervisorOptions } from "./supervisor.js";

export function graphDirectoryFor(config: Pick<SupervisorConfig, "graphRoot" | "graphName">): string {
  return path.resolve(config.graphRoot, sanitizeGraphName(config.graphName));
}

/**
 * Wire a supervisor from loaded configuration. `overrides` replaces any of
 * the collaborators, e.g. a launcher or fetcher stand-in.
 */
export function createEngineSupervisor(
  config: SupervisorConfig,
  overrides: Partial<EngineSupervisorOptions> = {},
): EngineSupervisor {
  const { engine } = config;
  const profile =
    overrides.profile ??
    resolveProfile(
      engine.kind,
      engine.buildArgs && engine.serveArgs
        ? { buildArgs: engine.buildArgs, serveArgs: engine.serveArgs }
        : undefined,
      { configFile: engine.configFile, resourceBase: engine.resourceBase },
    );

  const launcher =
    overrides.launcher ??
    createProcessLauncher({
      command: engine.command,
      jarPath: engine.jar,
      jvmArgs: engine.jvmArgs,
      extraArgs: engine.extraArgs,
      env: engine.env,
      profile,
      logToFile: config.engineLogFiles,
    });

  return new EngineSupervisor({
    graphDirectory: graphDirectoryFor(config),
    graphName: config.graphName,
    boundingBox: config.boundingBox,
    fetcher: createHttpDataFetcher(config.download),
    portAllocator: createPortAllocator({ range: config.portRange }),
    port: config.port,
    timeouts: config.timeouts,
    serveLiveness: config.serveLiveness,
    maxPortRetries: config.maxPortRetries,
    rebuildGraph: config.rebuildGraph,
    requireTransitFeeds: config.requireTransitFeeds,
    ...overrides,
    profile,
    launcher,
  });
}
