import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import yauzl, { type Entry, type ZipFile } from "yauzl";

export type ExtractOpts = {
  zipFile: string;
  outDir: string;
  maxEntries?: number;
  maxTotalBytes?: number;
  maxFileBytes?: number;
};

export type Extractor = (opts: ExtractOpts) => Promise<{ entries: number }>;

const S_IFMT = 0o170000;
const S_IFLNK = 0o120000;

function normalizeZipPath(fileName: string): string {
  return String(fileName ?? "").replace(/\\/g, "/");
}

function isZipSlipPath(p: string): boolean {
  const normalized = path.posix.normalize(p);
  if (!normalized || normalized === "." || normalized === "..") return true;
  if (normalized.startsWith("../") || normalized.includes("/../")) return true;
  if (normalized.startsWith("/")) return true;
  if (/^[A-Za-z]:\//.test(normalized)) return true;
  return false;
}

function unixMode(entry: Entry): number {
  return (entry.externalFileAttributes >>> 16) & 0xffff;
}

function isInside(outDir: string, target: string): boolean {
  return target === outDir || target.startsWith(outDir + path.sep);
}

function limitOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? Math.max(1, Math.floor(value)) : fallback;
}

async function readAll(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString("utf8");
}

function openZip(zipFile: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(zipFile, { lazyEntries: true, autoClose: true }, (err, zip) => {
      if (err || !zip) reject(err ?? new Error("zip open failed"));
      else resolve(zip);
    });
  });
}

function openEntry(zip: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zip.openReadStream(entry, (err, stream) => {
      if (err || !stream) reject(err ?? new Error("zip read stream failed"));
      else resolve(stream);
    });
  });
}

/**
 * Extracts a toolchain archive. Entries may not escape `outDir`; symlinks are
 * recreated when their target stays inside it, and executable bits are kept
 * since the archive holds compilers.
 */
export const extractZip: Extractor = async (opts) => {
  const zipFile = path.resolve(opts.zipFile);
  const outDir = path.resolve(opts.outDir);
  await fsp.mkdir(outDir, { recursive: true });

  const maxEntries = limitOr(opts.maxEntries, 200_000);
  const maxTotalBytes = limitOr(opts.maxTotalBytes, 16 * 1024 * 1024 * 1024);
  const maxFileBytes = limitOr(opts.maxFileBytes, 2 * 1024 * 1024 * 1024);

  const zip = await openZip(zipFile);

  let entryCount = 0;
  let totalUncompressed = 0;

  const handleEntry = async (entry: Entry): Promise<void> => {
    entryCount += 1;
    if (entryCount > maxEntries) throw new Error(`zip too many entries: maxEntries=${maxEntries}`);

    const rawName = normalizeZipPath(entry.fileName);
    if (!rawName) throw new Error("zip entry filename empty");
    if (isZipSlipPath(rawName)) throw new Error(`zip entry path is not allowed: ${rawName}`);

    const targetPath = path.resolve(path.join(outDir, rawName));
    if (!isInside(outDir, targetPath)) throw new Error(`zip entry escaped output dir: ${rawName}`);

    if (rawName.endsWith("/")) {
      await fsp.mkdir(targetPath, { recursive: true });
      return;
    }

    const fileBytes = Math.max(0, Math.floor(entry.uncompressedSize));
    if (fileBytes > maxFileBytes) {
      throw new Error(`zip entry too large: ${rawName} size=${fileBytes} maxFileBytes=${maxFileBytes}`);
    }
    totalUncompressed += fileBytes;
    if (totalUncompressed > maxTotalBytes) {
      throw new Error(`zip too large: total=${totalUncompressed} maxTotalBytes=${maxTotalBytes}`);
    }

    await fsp.mkdir(path.dirname(targetPath), { recursive: true });
    const mode = unixMode(entry);
    const stream = await openEntry(zip, entry);

    if ((mode & S_IFMT) === S_IFLNK) {
      const linkTarget = (await readAll(stream)).trim();
      const resolved = path.resolve(path.dirname(targetPath), linkTarget);
      if (!linkTarget || path.isAbsolute(linkTarget) || !isInside(outDir, resolved)) {
        throw new Error(`zip entry symlink escapes output dir: ${rawName} -> ${linkTarget}`);
      }
      await fsp.symlink(linkTarget, targetPath);
      return;
    }

    await pipeline(stream, fs.createWriteStream(targetPath, { flags: "wx" }));
    if (mode & 0o111) await fsp.chmod(targetPath, mode & 0o777);
  };

  await new Promise<void>((resolve, reject) => {
    let settled = false;
    const done = (err?: unknown) => {
      if (settled) return;
      settled = true;
      if (err) {
        zip.close();
        reject(err);
      } else {
        resolve();
      }
    };

    zip.on("entry", (entry: Entry) => {
      handleEntry(entry).then(
        () => zip.readEntry(),
        (err: unknown) => done(err),
      );
    });
    zip.on("end", () => done());
    zip.on("error", (err: unknown) => done(err));
    zip.readEntry();
  });

  return { entries: entryCount };
};
