/**
 * Streamed HTTP download to a file.
 *
 * The body is written to `<target>.part` and renamed into place once
 * complete, so an interrupted download never leaves a file that looks
 * finished.
 */

import fs from "node:fs";
import path from "node:path";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { FetchError } from "../process/engine-supervisor/errors.js";

const log = createSubsystemLogger("fetch/download");

export type FetchFn = typeof fetch;

export type DownloadOptions = {
  /** Replace an existing file (default: true); otherwise pick `name.N.ext` */
  overwrite?: boolean;
  /** Extension the saved file must end with, appended when missing */
  desiredExtension?: string;
  signal?: AbortSignal;
  fetchImpl?: FetchFn;
};

export type DownloadResult = {
  path: string;
  bytes: number;
};

/**
 * `map.osm` -> `map.1.osm`, `map.2.osm`, ... until the path is free.
 */
export function uniquePath(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    return filePath;
  }
  const dir = path.dirname(filePath);
  const ext = path.extname(filePath);
  const stem = path.basename(filePath, ext);
  for (let i = 1; ; i++) {
    const candidate = path.join(dir, `${stem}.${i}${ext}`);
    if (!fs.existsSync(candidate)) {
      return candidate;
    }
  }
}

export function withExtension(filePath: string, extension: string | undefined): string {
  if (!extension) {
    return filePath;
  }
  const suffix = extension.startsWith(".") ? extension : `.${extension}`;
  return filePath.endsWith(suffix) ? filePath : `${filePath}${suffix}`;
}

function resolveTarget(outputPath: string, options: DownloadOptions): string {
  let target = outputPath;
  // URLs ending in "/" leave no usable file name
  if (target.endsWith("/") || target.endsWith(path.sep) || isDirectory(target)) {
    target = path.join(target, "untitled");
  }
  target = withExtension(target, options.desiredExtension);
  if (options.overwrite === false) {
    target = uniquePath(target);
  } else if (fs.existsSync(target)) {
    log.info(`Overwriting existing file ${target}`);
  }
  return target;
}

function isDirectory(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch {
    return false;
  }
}

export async function downloadFile(
  url: string,
  outputPath: string,
  options: DownloadOptions = {},
): Promise<DownloadResult> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const target = resolveTarget(outputPath, options);

  log.info(`Downloading ${url}`);
  let response: Response;
  try {
    response = await fetchImpl(url, { signal: options.signal });
  } catch (err) {
    throw new FetchError(`Download failed: ${url}: ${String(err)}`, url, { cause: err });
  }
  if (!response.ok) {
    throw new FetchError(`Download failed with HTTP ${response.status}: ${url}`, url);
  }
  if (!response.body) {
    throw new FetchError(`Download returned no body: ${url}`, url);
  }

  fs.mkdirSync(path.dirname(target), { recursive: true });
  const partPath = `${target}.part`;
  const handle = await fs.promises.open(partPath, "w");
  let bytes = 0;
  try {
    const reader = response.body.getReader();
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      await handle.write(value);
      bytes += value.byteLength;
    }
  } catch (err) {
    await handle.close();
    await fs.promises.rm(partPath, { force: true });
    throw new FetchError(`Download interrupted: ${url}: ${String(err)}`, url, { cause: err });
  }
  await handle.close();
  await fs.promises.rename(partPath, target);

  log.info(`Saved ${target} (${Math.round(bytes / 1024)} kB)`);
  return { path: target, bytes };
}
