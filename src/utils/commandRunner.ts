import { spawn } from "node:child_process";
import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";

export type CommandResult = { code: number | null; stdout: string; stderr: string };

export type RunCommandOpts = {
  cwd?: string;
  env?: Record<string, string>;
  // stdout+stderr go to this file instead of being captured
  logFile?: string;
  signal?: AbortSignal;
};

/**
 * The single seam through which git, meson, ninja and patchelf are invoked.
 * Never rejects on a non-zero exit; callers inspect `code`.
 */
export type CommandRunner = (cmd: string, args: string[], opts?: RunCommandOpts) => Promise<CommandResult>;

export function formatCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].map((a) => (/[\s'"]/.test(a) ? JSON.stringify(a) : a)).join(" ");
}

export const spawnCapture: CommandRunner = async (cmd, args, opts) => {
  let logStream: fs.WriteStream | null = null;
  if (opts?.logFile) {
    await fsp.mkdir(path.dirname(opts.logFile), { recursive: true });
    logStream = fs.createWriteStream(opts.logFile, { flags: "w" });
  }

  const child = spawn(cmd, args, {
    cwd: opts?.cwd,
    env: opts?.env ? { ...process.env, ...opts.env } : process.env,
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
    signal: opts?.signal,
  });

  let stdout = "";
  let stderr = "";
  child.stdout.setEncoding("utf8");
  child.stderr.setEncoding("utf8");
  if (logStream) {
    child.stdout.pipe(logStream, { end: false });
    child.stderr.pipe(logStream, { end: false });
  } else {
    child.stdout.on("data", (d) => (stdout += String(d ?? "")));
    child.stderr.on("data", (d) => (stderr += String(d ?? "")));
  }

  const code = await new Promise<number | null>((resolve) => {
    child.once("close", (c) => resolve(c ?? null));
    child.once("error", (err) => {
      stderr += `${err.message}\n`;
      resolve(127);
    });
  });

  if (logStream) {
    const stream = logStream;
    if (stderr) stream.write(stderr);
    await new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
  }

  return { code, stdout, stderr };
};

export function describeFailure(r: CommandResult): string {
  return `${r.stdout}\n${r.stderr}`.trim() || `exit code ${r.code ?? "null"}`;
}
