/**
 * Transit feed discovery through the Transitland feed registry, followed by
 * parallel download of every listed feed.
 */

import path from "node:path";
import pLimit from "p-limit";
import { z } from "zod";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { FetchError } from "../process/engine-supervisor/errors.js";
import type { BoundingBox } from "../process/engine-supervisor/types.js";
import { downloadFile, type FetchFn } from "./download.js";

const log = createSubsystemLogger("fetch/transitland");

export const TRANSITLAND_FEEDS_URL = "https://transit.land/api/v1/feeds";

export const DEFAULT_FEED_CONCURRENCY = 4;

const feedsResponseSchema = z.object({
  feeds: z.array(z.object({ url: z.string().min(1) }).passthrough()),
});

export type TransitlandOptions = {
  feedsUrl?: string;
  concurrency?: number;
  signal?: AbortSignal;
  fetchImpl?: FetchFn;
};

export function transitlandFeedsUrl(bbox: BoundingBox, feedsUrl = TRANSITLAND_FEEDS_URL): string {
  const box = [bbox.left, bbox.bottom, bbox.right, bbox.top].map((v) => v.toFixed(6)).join(",");
  return `${feedsUrl}?bbox=${box}`;
}

export async function listTransitFeeds(
  bbox: BoundingBox,
  options: TransitlandOptions = {},
): Promise<string[]> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = transitlandFeedsUrl(bbox, options.feedsUrl);

  log.info(`Querying feed registry: ${url}`);
  let response: Response;
  try {
    response = await fetchImpl(url, { signal: options.signal });
  } catch (err) {
    throw new FetchError(`Feed registry query failed: ${String(err)}`, url, { cause: err });
  }
  if (!response.ok) {
    throw new FetchError(`Feed registry returned HTTP ${response.status}`, url);
  }

  const parsed = feedsResponseSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new FetchError(`Unexpected feed registry response: ${parsed.error.message}`, url);
  }
  return parsed.data.feeds.map((feed) => feed.url);
}

/**
 * File names for the feeds, from the last URL path segment, made distinct
 * so two feeds named `gtfs.zip` do not overwrite each other.
 */
export function feedFileNames(urls: readonly string[]): string[] {
  const taken = new Set<string>();
  return urls.map((url) => {
    let base: string;
    try {
      base = path.posix.basename(new URL(url).pathname);
    } catch {
      base = "";
    }
    if (base === "") {
      base = "untitled";
    }
    if (!base.endsWith(".zip")) {
      base = `${base}.zip`;
    }

    let name = base;
    const stem = base.slice(0, -".zip".length);
    for (let i = 1; taken.has(name); i++) {
      name = `${stem}.${i}.zip`;
    }
    taken.add(name);
    return name;
  });
}

export async function downloadTransitFeeds(
  bbox: BoundingBox,
  directory: string,
  options: TransitlandOptions = {},
): Promise<string[]> {
  const urls = await listTransitFeeds(bbox, options);
  if (urls.length === 0) {
    throw new FetchError("Feed registry lists no feeds for the bounding box");
  }

  const names = feedFileNames(urls);
  const tasks = urls.map((url, index) => ({ url, name: names[index] ?? `feed-${index}.zip` }));
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_FEED_CONCURRENCY);
  log.info(`Downloading ${tasks.length} feed(s), ${concurrency} at a time`);

  const limit = pLimit(concurrency);
  const results = await Promise.all(
    tasks.map((task) =>
      limit(async () => {
        try {
          const result = await downloadFile(task.url, path.join(directory, task.name), {
            signal: options.signal,
            fetchImpl: options.fetchImpl,
          });
          return result.path;
        } catch (err) {
          if (options.signal?.aborted) {
            throw err;
          }
          log.warn(`Skipping feed ${task.url}: ${err instanceof Error ? err.message : String(err)}`);
          return null;
        }
      }),
    ),
  );
  const saved = results.filter((file): file is string => file !== null);

  if (saved.length === 0) {
    throw new FetchError(`None of the ${tasks.length} listed feeds could be downloaded`);
  }
  return saved.sort();
}
