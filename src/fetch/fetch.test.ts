import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { FetchError } from "../process/engine-supervisor/errors.js";
import type { BoundingBox } from "../process/engine-supervisor/types.js";
import { downloadFile, uniquePath, withExtension, type FetchFn } from "./download.js";
import { createHttpDataFetcher, planDownloads } from "./http-fetcher.js";
import { downloadMapExtract, mapExtractFileName, overpassUrl } from "./overpass.js";
import { downloadTransitFeeds, feedFileNames, transitlandFeedsUrl } from "./transitland.js";

const bbox: BoundingBox = { left: 13.3, bottom: 52.5, right: 13.4, top: 52.55 };

type Route = () => Response;

function stubFetch(routes: Record<string, Route>): { fetchImpl: FetchFn; requested: string[] } {
  const requested: string[] = [];
  const fetchImpl: FetchFn = async (input) => {
    const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
    requested.push(url);
    const route = routes[url];
    return route ? route() : new Response("not found", { status: 404 });
  };
  return { fetchImpl, requested };
}

function bytes(count: number): Route {
  return () => new Response("x".repeat(count), { status: 200 });
}

function json(body: unknown): Route {
  return () =>
    new Response(JSON.stringify(body), {
      status: 200,
      headers: { "content-type": "application/json" },
    });
}

describe("data fetchers", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "engine-fetch-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("download", () => {
    it("should stream the body to the target file", async () => {
      const { fetchImpl } = stubFetch({ "https://data.test/a.osm": bytes(42) });

      const result = await downloadFile("https://data.test/a.osm", path.join(dir, "a.osm"), { fetchImpl });

      expect(result).toEqual({ path: path.join(dir, "a.osm"), bytes: 42 });
      expect(fs.readFileSync(result.path, "utf-8")).toBe("x".repeat(42));
      expect(fs.existsSync(`${result.path}.part`)).toBe(false);
    });

    it("should name a download into a directory untitled", async () => {
      const { fetchImpl } = stubFetch({ "https://data.test/": bytes(3) });

      const result = await downloadFile("https://data.test/", dir, { fetchImpl, desiredExtension: "zip" });

      expect(result.path).toBe(path.join(dir, "untitled.zip"));
    });

    it("should keep an existing file when overwrite is off", async () => {
      fs.writeFileSync(path.join(dir, "feed.zip"), "old");
      const { fetchImpl } = stubFetch({ "https://data.test/feed.zip": bytes(3) });

      const result = await downloadFile("https://data.test/feed.zip", path.join(dir, "feed.zip"), {
        fetchImpl,
        overwrite: false,
      });

      expect(result.path).toBe(path.join(dir, "feed.1.zip"));
      expect(fs.readFileSync(path.join(dir, "feed.zip"), "utf-8")).toBe("old");
    });

    it("should fail on an HTTP error status", async () => {
      const { fetchImpl } = stubFetch({});

      await expect(
        downloadFile("https://data.test/missing", path.join(dir, "missing"), { fetchImpl }),
      ).rejects.toThrow("Download failed with HTTP 404: https://data.test/missing");
    });

    it("should wrap a network failure", async () => {
      const fetchImpl: FetchFn = async () => {
        throw new TypeError("fetch failed");
      };

      const error = await downloadFile("https://data.test/x", path.join(dir, "x"), { fetchImpl }).catch(
        (err: unknown) => err,
      );

      expect(error).toBeInstanceOf(FetchError);
      expect(error instanceof FetchError && error.url).toBe("https://data.test/x");
    });

    it("should build unique paths and extensions", () => {
      fs.writeFileSync(path.join(dir, "map.osm"), "");
      fs.writeFileSync(path.join(dir, "map.1.osm"), "");

      expect(uniquePath(path.join(dir, "map.osm"))).toBe(path.join(dir, "map.2.osm"));
      expect(withExtension("feed", ".zip")).toBe("feed.zip");
      expect(withExtension("feed.zip", "zip")).toBe("feed.zip");
      expect(withExtension("feed", undefined)).toBe("feed");
    });
  });

  describe("map extract", () => {
    it("should request the whole bounding box from the map endpoint", () => {
      expect(overpassUrl(bbox)).toBe(
        "https://overpass-api.de/api/map?bbox=13.300000,52.500000,13.400000,52.550000",
      );
    });

    it("should query highways only through the interpreter", () => {
      const url = overpassUrl(bbox, { waysOnly: true, interpreterUrl: "https://overpass.test/api" });
      const [base, data] = url.split("?data=");

      expect(base).toBe("https://overpass.test/api");
      expect(decodeURIComponent(data ?? "")).toBe(
        'way["highway"](52.500000,13.300000,52.550000,13.400000);(._;>;);out;',
      );
    });

    it("should name extracts after the download time", () => {
      expect(mapExtractFileName(new Date("2024-06-01T08:00:00.000Z"))).toBe(
        "map-2024-06-01T08-00-00-000Z.osm",
      );
    });

    it("should keep an extract above the minimum size", async () => {
      const { fetchImpl } = stubFetch({ [overpassUrl(bbox)]: bytes(64) });

      const file = await downloadMapExtract(bbox, dir, { fetchImpl, minBytes: 32 });

      expect(path.dirname(file)).toBe(dir);
      expect(path.basename(file)).toMatch(/^map-.*\.osm$/);
      expect(fs.statSync(file).size).toBe(64);
    });

    it("should delete an extract below the minimum size", async () => {
      const { fetchImpl } = stubFetch({ [overpassUrl(bbox)]: bytes(10) });

      await expect(downloadMapExtract(bbox, dir, { fetchImpl, minBytes: 32 })).rejects.toThrow(
        "Map extract is 10 bytes, smaller than the 32 byte minimum",
      );
      expect(fs.readdirSync(dir)).toEqual([]);
    });
  });

  describe("transit feeds", () => {
    const registry = transitlandFeedsUrl(bbox);

    it("should derive distinct file names from feed URLs", () => {
      expect(
        feedFileNames([
          "https://a.test/feeds/gtfs.zip",
          "https://b.test/gtfs.zip",
          "https://c.test/",
          "https://d.test/latest",
        ]),
      ).toEqual(["gtfs.zip", "gtfs.1.zip", "untitled.zip", "latest.zip"]);
    });

    it("should download every listed feed and skip the ones that fail", async () => {
      const { fetchImpl, requested } = stubFetch({
        [registry]: json({
          feeds: [
            { url: "https://a.test/gtfs.zip", onestop_id: "f-a" },
            { url: "https://b.test/broken.zip" },
            { url: "https://c.test/bus.zip" },
          ],
        }),
        "https://a.test/gtfs.zip": bytes(5),
        "https://c.test/bus.zip": bytes(5),
      });

      const feeds = await downloadTransitFeeds(bbox, dir, { fetchImpl, concurrency: 2 });

      expect(feeds).toEqual([path.join(dir, "bus.zip"), path.join(dir, "gtfs.zip")]);
      expect(requested).toHaveLength(4);
      expect(requested[0]).toBe(
        "https://transit.land/api/v1/feeds?bbox=13.300000,52.500000,13.400000,52.550000",
      );
    });

    it("should keep at most the configured number of feed downloads in flight", async () => {
      const feedUrls = ["a", "b", "c", "d", "e"].map((name) => `https://feeds.test/${name}.zip`);
      let inFlight = 0;
      let maxInFlight = 0;
      const fetchImpl: FetchFn = async (input) => {
        const url = typeof input === "string" ? input : input instanceof URL ? input.href : input.url;
        if (url === registry) {
          return json({ feeds: feedUrls.map((feed) => ({ url: feed })) })();
        }
        inFlight++;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return bytes(5)();
      };

      const feeds = await downloadTransitFeeds(bbox, dir, { fetchImpl, concurrency: 2 });

      expect(feeds).toHaveLength(5);
      expect(maxInFlight).toBe(2);
    });

    it("should fail when the registry lists no feeds", async () => {
      const { fetchImpl } = stubFetch({ [registry]: json({ feeds: [] }) });

      await expect(downloadTransitFeeds(bbox, dir, { fetchImpl })).rejects.toThrow(
        "Feed registry lists no feeds for the bounding box",
      );
    });

    it("should fail when no listed feed downloads", async () => {
      const { fetchImpl } = stubFetch({ [registry]: json({ feeds: [{ url: "https://a.test/x.zip" }] }) });

      await expect(downloadTransitFeeds(bbox, dir, { fetchImpl })).rejects.toThrow(
        "None of the 1 listed feeds could be downloaded",
      );
    });

    it("should reject a registry response of the wrong shape", async () => {
      const { fetchImpl } = stubFetch({ [registry]: json({ data: [] }) });

      await expect(downloadTransitFeeds(bbox, dir, { fetchImpl })).rejects.toBeInstanceOf(FetchError);
    });
  });

  describe("http fetcher", () => {
    it("should route both fetches through the configured endpoints", async () => {
      const { fetchImpl } = stubFetch({
        "https://osm.test/map?bbox=13.300000,52.500000,13.400000,52.550000": bytes(20),
        "https://feeds.test/v1?bbox=13.300000,52.500000,13.400000,52.550000": json({
          feeds: [{ url: "https://a.test/gtfs.zip" }],
        }),
        "https://a.test/gtfs.zip": bytes(5),
      });
      const fetcher = createHttpDataFetcher({
        overpassMapUrl: "https://osm.test/map",
        transitlandFeedsUrl: "https://feeds.test/v1",
        minExtractBytes: 10,
        fetchImpl,
      });

      const extract = await fetcher.fetchMapExtract(bbox, dir);
      const feeds = await fetcher.fetchTransitFeeds(bbox, dir);

      expect(fs.statSync(extract).size).toBe(20);
      expect(feeds).toEqual([path.join(dir, "gtfs.zip")]);
    });

    it("should list the download URLs without fetching anything but the feed registry", async () => {
      const { fetchImpl, requested } = stubFetch({
        "https://feeds.test/v1?bbox=13.300000,52.500000,13.400000,52.550000": json({
          feeds: [{ url: "https://a.test/gtfs.zip" }, { url: "https://b.test/bus.zip" }],
        }),
      });

      const plan = await planDownloads(bbox, {
        overpassMapUrl: "https://osm.test/map",
        transitlandFeedsUrl: "https://feeds.test/v1",
        fetchImpl,
      });

      expect(plan).toEqual({
        mapExtractUrl: "https://osm.test/map?bbox=13.300000,52.500000,13.400000,52.550000",
        transitFeedUrls: ["https://a.test/gtfs.zip", "https://b.test/bus.zip"],
      });
      expect(requested).toEqual(["https://feeds.test/v1?bbox=13.300000,52.500000,13.400000,52.550000"]);
      expect(fs.readdirSync(dir)).toEqual([]);
    });
  });
});
