import type { BoundingBox } from "../process/engine-supervisor/types.js";

/**
 * Acquires the inputs of a graph build. Implementations write into
 * `directory` and return the paths of the files they produced.
 */
export interface DataFetcher {
  fetchMapExtract(bbox: BoundingBox, directory: string, signal?: AbortSignal): Promise<string>;
  fetchTransitFeeds(bbox: BoundingBox, directory: string, signal?: AbortSignal): Promise<string[]>;
}
