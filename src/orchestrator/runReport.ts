import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { ResolvedToolchain, RunSummary, WorkingCopy } from "../types.js";

export const RUN_REPORT_FILE = "forge-report.json";

export type RunReport = RunSummary & {
  startedAt: string;
  finishedAt: string;
  source: {
    name: string;
    url: string;
    version: string;
    revision: string;
    requestedRevision: string | null;
    pinned: boolean;
  };
  toolchain: ResolvedToolchain;
};

export function buildRunReport(input: {
  summary: RunSummary;
  workingCopy: WorkingCopy;
  toolchain: ResolvedToolchain;
  startedAt: Date;
  finishedAt: Date;
}): RunReport {
  const wc = input.workingCopy;
  return {
    ...input.summary,
    startedAt: input.startedAt.toISOString(),
    finishedAt: input.finishedAt.toISOString(),
    source: {
      name: wc.source.name,
      url: wc.source.url,
      version: wc.version,
      revision: wc.revision,
      requestedRevision: wc.requestedRevision,
      pinned: wc.pinned,
    },
    toolchain: input.toolchain,
  };
}

export async function writeRunReport(outputDir: string, report: RunReport): Promise<string> {
  await mkdir(outputDir, { recursive: true });
  const file = path.join(outputDir, RUN_REPORT_FILE);
  await writeFile(file, `${JSON.stringify(report, null, 2)}\n`, "utf8");
  return file;
}
