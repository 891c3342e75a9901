import { readFile, rm } from "node:fs/promises";
import path from "node:path";

import type { SourceCandidate } from "../config.js";
import { AcquisitionError } from "../errors.js";
import { errorMessage, type ForgeLogger } from "../logger.js";
import type { WarningSink, WorkingCopy } from "../types.js";
import { runWithRetry, type RetryPolicy } from "../utils/retry.js";
import type { GitClient } from "./gitClient.js";

export type SourceAcquirerOpts = {
  git: GitClient;
  log: ForgeLogger;
  chamber: string;
  dirName?: string;
  depth: number;
  pinFetchDepth: number;
  identity: { name: string; email: string };
  retry: RetryPolicy;
  warn?: WarningSink;
  signal?: AbortSignal;
};

export async function readDeclaredVersion(root: string): Promise<string> {
  const raw = await readFile(path.join(root, "VERSION"), "utf8").catch(() => "");
  return raw.trim() || "unknown";
}

export class SourceAcquirer {
  private readonly root: string;

  constructor(private readonly opts: SourceAcquirerOpts) {
    this.root = path.join(opts.chamber, opts.dirName ?? "mesa");
  }

  /**
   * Clones the first reachable candidate, in declared order, then settles on
   * `revision` when it can be checked out and on the fetched tip otherwise.
   */
  async acquire(candidates: SourceCandidate[], revision?: string | null): Promise<WorkingCopy> {
    const { git, log } = this.opts;
    const failures: string[] = [];

    let source: SourceCandidate | null = null;
    for (const candidate of candidates) {
      const outcome = await runWithRetry(
        async () => {
          await rm(this.root, { recursive: true, force: true });
          await git.clone({ url: candidate.url, dest: this.root, depth: this.opts.depth, ref: candidate.ref });
        },
        this.opts.retry,
        { description: `clone from ${candidate.name}`, log, signal: this.opts.signal },
      );
      if (outcome.ok) {
        source = candidate;
        break;
      }
      const message = `${candidate.name} unavailable: ${errorMessage(outcome.error)}`;
      failures.push(message);
      log.warn(message, { event: "source.candidate_failed", url: candidate.url });
      this.opts.warn?.({ event: "source.candidate_failed", message });
    }

    if (!source) {
      throw new AcquisitionError("failed to clone source from all candidates", failures.join("\n"));
    }

    try {
      await git.setIdentity(this.root, this.opts.identity.name, this.opts.identity.email);
    } catch (err) {
      throw new AcquisitionError("failed to configure git identity", errorMessage(err));
    }

    const requested = revision?.trim() ? revision.trim() : null;
    let pinned = false;
    if (requested) {
      log.info(`checking out ${requested}`);
      try {
        await git.fetch(this.root, { remote: "origin", depth: this.opts.pinFetchDepth });
        await git.checkout(this.root, requested);
        pinned = true;
      } catch (err) {
        const message = `could not check out ${requested}, using HEAD`;
        log.warn(message, { event: "source.revision_fallback", err: errorMessage(err) });
        this.opts.warn?.({ event: "source.revision_fallback", message });
      }
    }

    let baseRevision: string;
    let shortRevision: string;
    try {
      baseRevision = await git.revParse(this.root, "HEAD");
      shortRevision = await git.revParse(this.root, "HEAD", { short: true });
    } catch (err) {
      throw new AcquisitionError("could not resolve the checked-out revision", errorMessage(err));
    }
    const version = await readDeclaredVersion(this.root);

    log.info(`source ready: ${version} (${shortRevision}) from ${source.name}`);
    return {
      root: this.root,
      revision: shortRevision,
      baseRevision,
      version,
      source,
      requestedRevision: requested,
      pinned,
    };
  }

  /** Restores the tree to the acquired revision, dropping edits and merges. */
  async reset(workingCopy: WorkingCopy): Promise<void> {
    this.opts.log.info("resetting source tree");
    await this.opts.git.resetHard(workingCopy.root, workingCopy.baseRevision);
  }
}
