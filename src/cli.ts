import { existsSync } from "node:fs";
import path from "node:path";

import { loadConfig } from "./config.js";
import { ForgeError } from "./errors.js";
import { createLogger, errorMessage, toForgeLogger, type ForgeLogger } from "./logger.js";
import { Orchestrator } from "./orchestrator/orchestrator.js";
import type { CommandRunner } from "./utils/commandRunner.js";
import { pickArg, positionalArgs } from "./utils/args.js";

export const USAGE = "usage: driver-forge [variant|all] [revision] [--config <file>] [--profile <name>]";

type RunForgeCliOpts = {
  argv?: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  log?: ForgeLogger;
  run?: CommandRunner;
  signal?: AbortSignal;
};

function defaultConfigPath(cwd: string): string | null {
  for (const name of ["forge.toml", "forge.json"]) {
    if (existsSync(path.join(cwd, name))) return name;
  }
  return null;
}

/** Runs one forge invocation and returns the process exit code. */
export async function runForgeCli(opts?: RunForgeCliOpts): Promise<number> {
  const argv = opts?.argv ?? process.argv.slice(2);
  const cwd = opts?.cwd ?? process.cwd();
  const log = opts?.log ?? toForgeLogger(createLogger());

  if (argv.includes("--help") || argv.includes("-h")) {
    log.info(USAGE);
    return 0;
  }

  const [variant, revision] = positionalArgs(argv, ["--config", "--profile"]);
  const configPath = pickArg(argv, "--config") ?? defaultConfigPath(cwd);
  const profile = pickArg(argv, "--profile") ?? undefined;

  try {
    const config = await loadConfig(configPath, { profile, cwd, env: opts?.env });
    const orchestrator = new Orchestrator({ config, log, run: opts?.run });
    const summary = await orchestrator.run({ variant, revision, signal: opts?.signal });
    return summary.ok ? 0 : 1;
  } catch (err) {
    log.error(`forge failed: ${errorMessage(err)}`, {
      code: err instanceof ForgeError ? err.code : undefined,
      details: err instanceof ForgeError ? err.details : undefined,
    });
    return 1;
  }
}
