import type { BoundingBox } from "../process/engine-supervisor/types.js";
import type { FetchFn } from "./download.js";
import { downloadMapExtract, overpassUrl } from "./overpass.js";
import { downloadTransitFeeds, listTransitFeeds } from "./transitland.js";
import type { DataFetcher } from "./types.js";

export type HttpDataFetcherOptions = {
  waysOnly?: boolean;
  minExtractBytes?: number;
  overpassMapUrl?: string;
  overpassInterpreterUrl?: string;
  transitlandFeedsUrl?: string;
  feedConcurrency?: number;
  fetchImpl?: FetchFn;
};

/** DataFetcher backed by the public Overpass and Transitland services. */
export function createHttpDataFetcher(options: HttpDataFetcherOptions = {}): DataFetcher {
  return {
    fetchMapExtract(bbox: BoundingBox, directory: string, signal?: AbortSignal) {
      return downloadMapExtract(bbox, directory, {
        waysOnly: options.waysOnly,
        minBytes: options.minExtractBytes,
        mapUrl: options.overpassMapUrl,
        interpreterUrl: options.overpassInterpreterUrl,
        signal,
        fetchImpl: options.fetchImpl,
      });
    },

    fetchTransitFeeds(bbox: BoundingBox, directory: string, signal?: AbortSignal) {
      return downloadTransitFeeds(bbox, directory, {
        feedsUrl: options.transitlandFeedsUrl,
        concurrency: options.feedConcurrency,
        signal,
        fetchImpl: options.fetchImpl,
      });
    },
  };
}

export type DownloadPlan = {
  mapExtractUrl: string;
  transitFeedUrls: string[];
};

/** URLs the fetcher would download for the bounding box; only the feed registry is queried. */
export async function planDownloads(
  bbox: BoundingBox,
  options: HttpDataFetcherOptions = {},
): Promise<DownloadPlan> {
  const mapExtractUrl = overpassUrl(bbox, {
    waysOnly: options.waysOnly,
    mapUrl: options.overpassMapUrl,
    interpreterUrl: options.overpassInterpreterUrl,
  });
  const transitFeedUrls = await listTransitFeeds(bbox, {
    feedsUrl: options.transitlandFeedsUrl,
    fetchImpl: options.fetchImpl,
  });
  return { mapExtractUrl, transitFeedUrls };
}
