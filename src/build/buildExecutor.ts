import { mkdir, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { BuildError } from "../errors.js";
import type { ForgeLogger } from "../logger.js";
import {
  deriveToolchainProfile,
  mesonOptionArgs,
  renderCrossFile,
  renderNativeFile,
  type ProfileSettings,
} from "../toolchain/toolchainProfile.js";
import type { BuildResult, ResolvedToolchain, WorkingCopy } from "../types.js";
import type { CommandRunner } from "../utils/commandRunner.js";
import { slugify } from "../utils/fsUtil.js";
import { readLogTail } from "../utils/logTail.js";

export type BuildExecutorOpts = {
  run: CommandRunner;
  log: ForgeLogger;
  chamber: string;
  buildDir: string;
  target: string;
  jobs?: number;
  configureLogTail: number;
  compileLogTail: number;
  profile: ProfileSettings;
  signal?: AbortSignal;
};

export const CROSS_FILE_NAME = "cross_dragon";
export const NATIVE_FILE_NAME = "native_dragon";

export class BuildExecutor {
  constructor(private readonly opts: BuildExecutorOpts) {}

  async build(workingCopy: WorkingCopy, toolchain: ResolvedToolchain, variantLabel: string): Promise<BuildResult> {
    const { run, log, chamber } = this.opts;
    const profile = deriveToolchainProfile(toolchain, this.opts.profile);

    await mkdir(chamber, { recursive: true });
    const crossFile = path.join(chamber, CROSS_FILE_NAME);
    const nativeFile = path.join(chamber, NATIVE_FILE_NAME);
    await writeFile(crossFile, renderCrossFile(profile), "utf8");
    await writeFile(nativeFile, renderNativeFile(profile), "utf8");

    const env = { ...profile.env, PATH: `${profile.binDir}${path.delimiter}${process.env.PATH ?? ""}` };
    const buildDir = path.join(workingCopy.root, this.opts.buildDir);
    await rm(buildDir, { recursive: true, force: true });

    const slug = slugify(variantLabel);
    const mesonLog = path.join(chamber, `meson_${slug}.log`);
    log.info(`configuring ${variantLabel}`);
    const configured = await run(
      "meson",
      [
        "setup",
        this.opts.buildDir,
        `--cross-file=${crossFile}`,
        `--native-file=${nativeFile}`,
        ...mesonOptionArgs(profile),
      ],
      { cwd: workingCopy.root, env, logFile: mesonLog, signal: this.opts.signal },
    );
    if (configured.code !== 0) {
      const tail = await readLogTail(mesonLog, this.opts.configureLogTail);
      log.error(`meson setup failed for ${variantLabel}`, { log: mesonLog });
      throw new BuildError(`meson setup failed for ${variantLabel}`, "CONFIGURE_FAILED", mesonLog, tail);
    }

    const jobs = this.opts.jobs ?? os.availableParallelism();
    const ninjaLog = path.join(chamber, `ninja_${slug}.log`);
    log.info(`compiling ${variantLabel} with ${jobs} jobs`);
    const compiled = await run("ninja", ["-C", this.opts.buildDir, `-j${jobs}`, this.opts.target], {
      cwd: workingCopy.root,
      env,
      logFile: ninjaLog,
      signal: this.opts.signal,
    });
    if (compiled.code !== 0) {
      const tail = await readLogTail(ninjaLog, this.opts.compileLogTail);
      log.error(`compilation failed for ${variantLabel}`, { log: ninjaLog });
      throw new BuildError(`compilation failed for ${variantLabel}`, "COMPILE_FAILED", ninjaLog, tail);
    }

    return {
      artifactPath: path.join(buildDir, this.opts.target),
      variant: variantLabel,
      logPath: ninjaLog,
    };
  }
}
