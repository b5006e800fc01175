/**
 * Graph Manifest
 *
 * Per-graph record of which preparation steps already completed, so a
 * restarted supervisor skips finished downloads and an already built graph.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { createSubsystemLogger } from "../../logging/subsystem.js";
import { MANIFEST_FILENAME, MANIFEST_VERSION } from "./protocol.js";

const log = createSubsystemLogger("engine-supervisor/manifest");

const ILLEGAL_NAME_CHARACTERS = /[()?]/g;

const graphManifestSchema = z.object({
  version: z.number().int(),
  graphName: z.string(),
  engine: z.string().optional(),
  mapExtractPath: z.string().optional(),
  mapExtractFetchedAt: z.string().optional(),
  transitFeedPaths: z.array(z.string()).default([]),
  transitFeedsFetchedAt: z.string().optional(),
  graphBuiltAt: z.string().optional(),
  updatedAtMs: z.number(),
});

export type GraphManifest = z.infer<typeof graphManifestSchema>;

/** Replace characters that break engine path arguments with "_". */
export function sanitizeGraphName(name: string): string {
  return name.replace(ILLEGAL_NAME_CHARACTERS, "_");
}

export function manifestPath(graphDirectory: string): string {
  return path.join(graphDirectory, MANIFEST_FILENAME);
}

export function emptyManifest(graphName: string): GraphManifest {
  return {
    version: MANIFEST_VERSION,
    graphName,
    transitFeedPaths: [],
    updatedAtMs: Date.now(),
  };
}

export function loadGraphManifest(graphDirectory: string, graphName: string): GraphManifest {
  const filePath = manifestPath(graphDirectory);
  try {
    if (!fs.existsSync(filePath)) {
      return emptyManifest(graphName);
    }

    const parsed = graphManifestSchema.safeParse(JSON.parse(fs.readFileSync(filePath, "utf-8")));
    if (!parsed.success) {
      log.warn(`Ignoring invalid manifest ${filePath}: ${parsed.error.message}`);
      return emptyManifest(graphName);
    }

    if (parsed.data.version > MANIFEST_VERSION) {
      log.warn(`Manifest version ${parsed.data.version} is newer than ${MANIFEST_VERSION}`);
    }
    return parsed.data;
  } catch (err) {
    log.warn(`Failed to load manifest ${filePath}: ${String(err)}`);
    return emptyManifest(graphName);
  }
}

export function saveGraphManifest(graphDirectory: string, manifest: GraphManifest): void {
  const filePath = manifestPath(graphDirectory);
  fs.mkdirSync(graphDirectory, { recursive: true });

  const data: GraphManifest = { ...manifest, version: MANIFEST_VERSION, updatedAtMs: Date.now() };

  // Write atomically using temp file
  const tempPath = `${filePath}.tmp`;
  fs.writeFileSync(tempPath, JSON.stringify(data, null, 2));
  fs.renameSync(tempPath, filePath);
}

/**
 * Apply a change and persist it. Returns the saved manifest.
 */
export function updateGraphManifest(
  graphDirectory: string,
  manifest: GraphManifest,
  patch: Partial<Omit<GraphManifest, "version" | "updatedAtMs">>,
): GraphManifest {
  const next = { ...manifest, ...patch };
  saveGraphManifest(graphDirectory, next);
  return next;
}

const MAP_EXTRACT_EXTENSIONS = [".osm", ".pbf", ".osm.pbf", ".o5m"];
const TRANSIT_FEED_EXTENSIONS = [".zip"];

/**
 * Input files already present in the graph directory, whether or not the
 * manifest knows about them.
 */
export function discoverInputs(graphDirectory: string): {
  mapExtract?: string;
  transitFeeds: string[];
} {
  if (!fs.existsSync(graphDirectory)) {
    return { transitFeeds: [] };
  }
  const files = fs
    .readdirSync(graphDirectory, { withFileTypes: true })
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();

  const mapExtract = files.find((name) =>
    MAP_EXTRACT_EXTENSIONS.some((ext) => name.toLowerCase().endsWith(ext)),
  );
  const transitFeeds = files
    .filter((name) => TRANSIT_FEED_EXTENSIONS.some((ext) => name.toLowerCase().endsWith(ext)))
    .map((name) => path.join(graphDirectory, name));

  return {
    mapExtract: mapExtract === undefined ? undefined : path.join(graphDirectory, mapExtract),
    transitFeeds,
  };
}
