import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";

import yazl from "yazl";

export type ZipEntry = { absPath: string; name: string };

/** Writes `entries` into `outFile`, replacing any archive already there. */
export async function zipFilesToFile(opts: { entries: ZipEntry[]; outFile: string }): Promise<{ bytes: number }> {
  const outFile = path.resolve(opts.outFile);
  await fsp.mkdir(path.dirname(outFile), { recursive: true });

  const zipfile = new yazl.ZipFile();
  for (const e of opts.entries) {
    // fixed mtime keeps archives of identical inputs identical
    zipfile.addFile(e.absPath, e.name, { mtime: new Date(0) });
  }
  zipfile.end();

  const tmpFile = `${outFile}.tmp-${process.pid}`;
  try {
    await pipeline(zipfile.outputStream, fs.createWriteStream(tmpFile));
    await fsp.rm(outFile, { force: true });
    await fsp.rename(tmpFile, outFile);
  } finally {
    await fsp.rm(tmpFile, { force: true });
  }

  const stat = await fsp.stat(outFile);
  return { bytes: stat.size };
}
