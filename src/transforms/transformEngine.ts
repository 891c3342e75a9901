import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";

import { errorMessage, type ForgeLogger } from "../logger.js";
import type { GitClient } from "../source/gitClient.js";
import type { WorkingCopy } from "../types.js";
import { describeFailure } from "../utils/commandRunner.js";
import { isFile } from "../utils/fsUtil.js";
import { applyRules, ensureMarker } from "./textRewrite.js";
import type {
  DiffPatchTransform,
  MergeRequestTransform,
  TextRewriteTransform,
  Transformation,
  TransformOutcome,
} from "./types.js";

export type TransformEngineOpts = {
  git: GitClient;
  spellsDir: string;
  log: ForgeLogger;
};

/**
 * Applies one spell to the working copy. Never throws for a spell that is
 * missing or does not apply; the outcome says what happened.
 */
export class TransformEngine {
  constructor(private readonly opts: TransformEngineOpts) {}

  async apply(workingCopy: WorkingCopy, transform: Transformation): Promise<TransformOutcome> {
    this.opts.log.info(`casting spell: ${transform.id}`);
    try {
      switch (transform.kind) {
        case "text_rewrite":
          return await this.applyTextRewrite(workingCopy, transform);
        case "diff_patch":
          return await this.applyDiffPatch(workingCopy, transform);
        case "merge_request":
          return await this.applyMergeRequest(workingCopy, transform);
      }
    } catch (err) {
      return this.outcome(transform, "partially_applied", errorMessage(err));
    }
  }

  private outcome(
    transform: Transformation,
    status: TransformOutcome["status"],
    detail: string,
    extra?: Pick<TransformOutcome, "matchedRules" | "unmatchedRules">,
  ): TransformOutcome {
    return { id: transform.id, kind: transform.kind, status, detail, ...extra };
  }

  private async applyTextRewrite(workingCopy: WorkingCopy, t: TextRewriteTransform): Promise<TransformOutcome> {
    const file = path.join(workingCopy.root, t.file);
    if (!(await isFile(file))) return this.outcome(t, "not_found", `target file not found: ${t.file}`);

    const original = await readFile(file, "utf8");
    if (original.includes(t.marker)) {
      return this.outcome(t, "already_applied", `marker present in ${t.file}`);
    }

    const rewritten = applyRules(original, t.rules);
    for (const rule of rewritten.unmatched) {
      this.opts.log.debug(`rule did not match in ${t.file}: ${rule}`, { transform: t.id });
    }
    await writeFile(file, ensureMarker(rewritten.content, t.marker), "utf8");

    const detail =
      rewritten.unmatched.length === 0
        ? `${rewritten.matched} rule(s) applied to ${t.file}`
        : `${rewritten.matched}/${t.rules.length} rule(s) matched in ${t.file}`;
    return this.outcome(t, "applied", detail, {
      matchedRules: rewritten.matched,
      unmatchedRules: rewritten.unmatched.length,
    });
  }

  private async applyDiffPatch(workingCopy: WorkingCopy, t: DiffPatchTransform): Promise<TransformOutcome> {
    const { git } = this.opts;
    const patchFile = path.resolve(this.opts.spellsDir, t.patchFile);
    if (!(await isFile(patchFile))) return this.outcome(t, "not_found", `spell not found: ${t.patchFile}`);

    const cwd = workingCopy.root;
    if (await git.applyCheck(cwd, patchFile, { reverse: true })) {
      return this.outcome(t, "already_applied", "patch already present");
    }

    if (await git.applyCheck(cwd, patchFile)) {
      const r = await git.apply(cwd, patchFile);
      if (r.code === 0) return this.outcome(t, "applied", "applied cleanly");
    }

    this.opts.log.warn(`spell may conflict, trying 3-way merge: ${t.id}`);
    const merged = await git.apply(cwd, patchFile, { threeWay: true });
    if (merged.code === 0) return this.outcome(t, "applied", "applied with 3-way merge");
    return this.outcome(t, "partially_applied", describeFailure(merged));
  }

  private async applyMergeRequest(workingCopy: WorkingCopy, t: MergeRequestTransform): Promise<TransformOutcome> {
    const { git } = this.opts;
    const cwd = workingCopy.root;
    try {
      await git.fetch(cwd, { remote: t.remote, ref: t.ref });
    } catch (err) {
      return this.outcome(t, "not_found", `could not fetch ${t.ref}: ${errorMessage(err)}`);
    }

    if (await git.isAncestor(cwd, "FETCH_HEAD", "HEAD")) {
      return this.outcome(t, "already_applied", `${t.ref} already merged`);
    }

    const r = await git.merge(cwd, "FETCH_HEAD");
    if (r.code === 0) return this.outcome(t, "applied", `merged ${t.ref}`);

    await git.mergeAbort(cwd);
    return this.outcome(t, "partially_applied", `merge conflict in ${t.ref}, skipped`);
  }
}
