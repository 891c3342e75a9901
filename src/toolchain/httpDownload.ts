import { createWriteStream } from "node:fs";
import { mkdir, rename, rm } from "node:fs/promises";
import path from "node:path";
import { Readable, Transform, type TransformCallback } from "node:stream";
import { pipeline } from "node:stream/promises";

import type { ForgeLogger } from "../logger.js";

export type DownloadOpts = {
  url: string;
  destFile: string;
  timeoutMs: number;
  // 0 means no cap
  maxBytes: number;
  log?: ForgeLogger;
  signal?: AbortSignal;
};

export type Downloader = (opts: DownloadOpts) => Promise<{ bytes: number }>;

const PROGRESS_STEP = 64 * 1024 * 1024;

/** Counts bytes on their way to disk and fails the stream past the cap. */
class ByteMeter extends Transform {
  bytes = 0;
  private nextReport = PROGRESS_STEP;

  constructor(
    private readonly maxBytes: number,
    private readonly onProgress: (bytes: number) => void,
  ) {
    super();
  }

  override _transform(chunk: Uint8Array, _enc: BufferEncoding, cb: TransformCallback): void {
    this.bytes += chunk.length;
    if (this.maxBytes > 0 && this.bytes > this.maxBytes) {
      cb(new Error(`NDK archive exceeds ${this.maxBytes} bytes`));
      return;
    }
    if (this.bytes >= this.nextReport) {
      this.onProgress(this.bytes);
      this.nextReport += PROGRESS_STEP;
    }
    cb(null, chunk);
  }
}

function declaredLength(res: Response): number | null {
  const raw = res.headers.get("content-length")?.trim();
  if (!raw) return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}

/**
 * Streams the NDK archive to `<destFile>.part` and renames it into place once
 * complete, so an interrupted download never looks like a finished one.
 */
export const downloadToFile: Downloader = async ({ url, destFile, timeoutMs, maxBytes, log, signal }) => {
  const target = path.resolve(destFile);
  const partial = `${target}.part`;
  await mkdir(path.dirname(target), { recursive: true });

  const ctrl = new AbortController();
  const timer = setTimeout(() => ctrl.abort(new Error(`NDK download timed out after ${timeoutMs}ms`)), timeoutMs);
  timer.unref();
  const forward = () => ctrl.abort(signal?.reason);
  if (signal?.aborted) forward();
  signal?.addEventListener("abort", forward, { once: true });

  try {
    const res = await fetch(url, { signal: ctrl.signal });
    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new Error(`NDK download failed: HTTP ${res.status} ${body}`.trim());
    }
    if (!res.body) throw new Error("NDK download failed: empty body");

    const expected = declaredLength(res);
    if (maxBytes > 0 && expected !== null && expected > maxBytes) {
      throw new Error(`NDK archive exceeds ${maxBytes} bytes (Content-Length ${expected})`);
    }

    const meter = new ByteMeter(maxBytes, (bytes) => log?.debug("NDK download progress", { bytes, total: expected }));
    await pipeline(Readable.fromWeb(res.body), meter, createWriteStream(partial));
    await rename(partial, target);
    log?.debug("NDK archive saved", { file: target, bytes: meter.bytes });
    return { bytes: meter.bytes };
  } catch (err) {
    await rm(partial, { force: true });
    throw err;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", forward);
  }
};
