/**
 * OpenStreetMap extract download through the Overpass API.
 */

import fs from "node:fs";
import path from "node:path";
import { FetchError } from "../process/engine-supervisor/errors.js";
import type { BoundingBox } from "../process/engine-supervisor/types.js";
import { downloadFile, type FetchFn } from "./download.js";

/** Full map export of a bounding box */
export const OVERPASS_MAP_URL = "https://overpass-api.de/api/map";

/** Interpreter used for highway-only extracts */
export const OVERPASS_INTERPRETER_URL = "https://overpass-api.de/api/interpreter";

/** Anything smaller is an error page or an empty area, not a usable extract */
export const DEFAULT_MIN_EXTRACT_BYTES = 10_000;

export type OverpassOptions = {
  /** Only ways tagged `highway` and their nodes; no points of interest */
  waysOnly?: boolean;
  minBytes?: number;
  mapUrl?: string;
  interpreterUrl?: string;
  signal?: AbortSignal;
  fetchImpl?: FetchFn;
};

function coord(value: number): string {
  return value.toFixed(6);
}

export function overpassUrl(bbox: BoundingBox, options: OverpassOptions = {}): string {
  if (options.waysOnly) {
    // Overpass QL takes (south, west, north, east)
    const query =
      `way["highway"](${coord(bbox.bottom)},${coord(bbox.left)},` +
      `${coord(bbox.top)},${coord(bbox.right)});(._;>;);out;`;
    return `${options.interpreterUrl ?? OVERPASS_INTERPRETER_URL}?data=${encodeURIComponent(query)}`;
  }
  const box = [bbox.left, bbox.bottom, bbox.right, bbox.top].map(coord).join(",");
  return `${options.mapUrl ?? OVERPASS_MAP_URL}?bbox=${box}`;
}

export function mapExtractFileName(now: Date = new Date()): string {
  return `map-${now.toISOString().replace(/[:.]/g, "-")}.osm`;
}

export async function downloadMapExtract(
  bbox: BoundingBox,
  directory: string,
  options: OverpassOptions = {},
): Promise<string> {
  const url = overpassUrl(bbox, options);
  const result = await downloadFile(url, path.join(directory, mapExtractFileName()), {
    signal: options.signal,
    fetchImpl: options.fetchImpl,
  });

  const minBytes = options.minBytes ?? DEFAULT_MIN_EXTRACT_BYTES;
  if (result.bytes < minBytes) {
    fs.rmSync(result.path, { force: true });
    throw new FetchError(
      `Map extract is ${result.bytes} bytes, smaller than the ${minBytes} byte minimum`,
      url,
    );
  }
  return result.path;
}
