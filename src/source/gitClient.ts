import { describeFailure, formatCommand, type CommandResult, type CommandRunner } from "../utils/commandRunner.js";

export class GitCommandError extends Error {
  constructor(
    message: string,
    public readonly args: string[],
    public readonly result: CommandResult,
  ) {
    super(message);
  }
}

/**
 * Thin wrapper over the git CLI. Every call goes through the injected
 * CommandRunner, so tests can script the outcomes.
 */
export class GitClient {
  constructor(private readonly run: CommandRunner) {}

  private async git(cwd: string | undefined, args: string[]): Promise<CommandResult> {
    return await this.run("git", args, { cwd, env: { GIT_TERMINAL_PROMPT: "0" } });
  }

  private async gitOrThrow(cwd: string | undefined, args: string[]): Promise<string> {
    const r = await this.git(cwd, args);
    if (r.code !== 0) {
      throw new GitCommandError(`${formatCommand("git", args)} failed: ${describeFailure(r)}`, args, r);
    }
    return r.stdout;
  }

  private async succeeds(cwd: string, args: string[]): Promise<boolean> {
    return (await this.git(cwd, args)).code === 0;
  }

  async clone(opts: { url: string; dest: string; depth: number; ref?: string }): Promise<void> {
    const args = ["clone", `--depth=${opts.depth}`];
    if (opts.ref) args.push("--branch", opts.ref);
    args.push(opts.url, opts.dest);
    await this.gitOrThrow(undefined, args);
  }

  async setIdentity(cwd: string, name: string, email: string): Promise<void> {
    await this.gitOrThrow(cwd, ["config", "user.name", name]);
    await this.gitOrThrow(cwd, ["config", "user.email", email]);
  }

  async fetch(cwd: string, opts: { remote: string; ref?: string; depth?: number }): Promise<void> {
    const args = ["fetch"];
    if (opts.depth) args.push(`--depth=${opts.depth}`);
    args.push(opts.remote);
    if (opts.ref) args.push(opts.ref);
    await this.gitOrThrow(cwd, args);
  }

  async checkout(cwd: string, revision: string): Promise<void> {
    await this.gitOrThrow(cwd, ["checkout", revision]);
  }

  async revParse(cwd: string, rev: string, opts?: { short?: boolean }): Promise<string> {
    const args = opts?.short ? ["rev-parse", "--short", rev] : ["rev-parse", rev];
    return (await this.gitOrThrow(cwd, args)).trim();
  }

  /** Discards tracked edits, commits made after `revision` and untracked files. */
  async resetHard(cwd: string, revision: string): Promise<void> {
    await this.gitOrThrow(cwd, ["reset", "--hard", revision]);
    await this.gitOrThrow(cwd, ["clean", "-fd"]);
  }

  async applyCheck(cwd: string, patchFile: string, opts?: { reverse?: boolean }): Promise<boolean> {
    const args = opts?.reverse ? ["apply", "--reverse", "--check", patchFile] : ["apply", "--check", patchFile];
    return await this.succeeds(cwd, args);
  }

  async apply(cwd: string, patchFile: string, opts?: { threeWay?: boolean }): Promise<CommandResult> {
    const args = opts?.threeWay ? ["apply", "--3way", patchFile] : ["apply", patchFile];
    return await this.git(cwd, args);
  }

  async isAncestor(cwd: string, ancestor: string, descendant: string): Promise<boolean> {
    return await this.succeeds(cwd, ["merge-base", "--is-ancestor", ancestor, descendant]);
  }

  async merge(cwd: string, rev: string): Promise<CommandResult> {
    return await this.git(cwd, ["merge", "--no-edit", rev]);
  }

  async mergeAbort(cwd: string): Promise<void> {
    await this.git(cwd, ["merge", "--abort"]);
  }
}
