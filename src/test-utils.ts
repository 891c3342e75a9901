import fs from "node:fs";
import { mkdtemp } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

import { vi } from "vitest";
import yauzl, { type Entry, type ZipFile } from "yauzl";
import yazl from "yazl";

import type { ForgeLogger } from "./logger.js";
import type { CommandResult, CommandRunner, RunCommandOpts } from "./utils/commandRunner.js";

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies ForgeLogger;
}

export async function makeTmpDir(prefix: string): Promise<string> {
  return await mkdtemp(path.join(os.tmpdir(), `driver-forge-${prefix}-`));
}

export type RecordedCall = { cmd: string; args: string[]; opts?: RunCommandOpts };

export type FakeHandler = (
  call: RecordedCall,
) => Partial<CommandResult> | undefined | Promise<Partial<CommandResult> | undefined>;

/** A CommandRunner that records calls; unhandled commands exit 0 with no output. */
export function createFakeRunner(handler?: FakeHandler): { run: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const run: CommandRunner = async (cmd, args, opts) => {
    const call = { cmd, args, opts };
    calls.push(call);
    const r = (await handler?.(call)) ?? {};
    return { code: r.code ?? 0, stdout: r.stdout ?? "", stderr: r.stderr ?? "" };
  };
  return { run, calls };
}

async function readStream(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  return Buffer.concat(chunks).toString("utf8");
}

export async function readZipEntries(zipFile: string): Promise<Map<string, string>> {
  const zip = await new Promise<ZipFile>((resolve, reject) => {
    yauzl.open(zipFile, { lazyEntries: true, autoClose: true }, (err, z) => {
      if (err || !z) reject(err ?? new Error("zip open failed"));
      else resolve(z);
    });
  });

  const out = new Map<string, string>();
  await new Promise<void>((resolve, reject) => {
    zip.on("error", reject);
    zip.on("end", () => resolve());
    zip.on("entry", (entry: Entry) => {
      zip.openReadStream(entry, (err, stream) => {
        if (err || !stream) {
          reject(err ?? new Error("zip entry open failed"));
          return;
        }
        readStream(stream)
          .then((text) => {
            out.set(entry.fileName, text);
            zip.readEntry();
          })
          .catch(reject);
      });
    });
    zip.readEntry();
  });
  return out;
}

export async function writeZip(
  zipFile: string,
  entries: Array<{ name: string; content: string; mode?: number }>,
): Promise<void> {
  const zip = new yazl.ZipFile();
  for (const e of entries) zip.addBuffer(Buffer.from(e.content, "utf8"), e.name, e.mode ? { mode: e.mode } : {});
  zip.end();
  await pipeline(zip.outputStream, fs.createWriteStream(zipFile));
}
