import { rm } from "node:fs/promises";
import path from "node:path";

import { ToolchainError } from "../errors.js";
import { errorMessage, type ForgeLogger } from "../logger.js";
import type { ResolvedToolchain } from "../types.js";
import { isDirectory } from "../utils/fsUtil.js";
import { runWithRetry, type RetryPolicy } from "../utils/retry.js";
import { downloadToFile, type Downloader } from "./httpDownload.js";
import { extractZip, type Extractor } from "./zipExtract.js";

export type ToolchainResolverOpts = {
  chamber: string;
  version: string;
  downloadUrl: string;
  systemRoot?: string;
  downloadTimeoutMs: number;
  maxDownloadBytes?: number;
  retry: RetryPolicy;
  log: ForgeLogger;
  download?: Downloader;
  extract?: Extractor;
  signal?: AbortSignal;
};

/**
 * Locates the NDK: an already installed one wins, then the copy cached in the
 * chamber, and only then a fresh download.
 */
export async function resolveToolchain(opts: ToolchainResolverOpts): Promise<ResolvedToolchain> {
  const { log } = opts;

  if (opts.systemRoot && (await isDirectory(opts.systemRoot))) {
    log.info(`using system NDK: ${opts.systemRoot}`);
    return { root: opts.systemRoot, version: opts.version, source: "system" };
  }

  const cachedRoot = path.join(opts.chamber, opts.version);
  if (await isDirectory(cachedRoot)) {
    log.info(`using cached NDK: ${cachedRoot}`);
    return { root: cachedRoot, version: opts.version, source: "cached" };
  }

  const download = opts.download ?? downloadToFile;
  const extract = opts.extract ?? extractZip;
  const archive = path.join(opts.chamber, `${opts.version}.zip`);

  log.info(`downloading NDK ${opts.version}`, { url: opts.downloadUrl });
  const fetched = await runWithRetry(
    () =>
      download({
        url: opts.downloadUrl,
        destFile: archive,
        timeoutMs: opts.downloadTimeoutMs,
        maxBytes: opts.maxDownloadBytes ?? 0,
        log,
        signal: opts.signal,
      }),
    opts.retry,
    { description: "downloading NDK", log, signal: opts.signal },
  );
  if (!fetched.ok) {
    throw new ToolchainError(`failed to download NDK ${opts.version}`, errorMessage(fetched.error));
  }

  try {
    await extract({ zipFile: archive, outDir: opts.chamber });
  } catch (err) {
    await rm(cachedRoot, { recursive: true, force: true });
    throw new ToolchainError(`failed to unpack NDK ${opts.version}`, errorMessage(err));
  } finally {
    await rm(archive, { force: true });
  }

  if (!(await isDirectory(cachedRoot))) {
    throw new ToolchainError(`NDK archive did not contain ${opts.version}/`);
  }

  log.info(`NDK installed: ${cachedRoot}`);
  return { root: cachedRoot, version: opts.version, source: "downloaded" };
}
