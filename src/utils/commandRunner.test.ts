import { readFile, rm } from "node:fs/promises";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { makeTmpDir } from "../test-utils.js";
import { describeFailure, formatCommand, spawnCapture } from "./commandRunner.js";

describe("spawnCapture", () => {
  it("captures stdout, stderr and the exit code", async () => {
    const r = await spawnCapture(process.execPath, [
      "-e",
      "process.stdout.write('hi'); process.stderr.write('warn'); process.exitCode = 3",
    ]);
    expect(r).toEqual({ code: 3, stdout: "hi", stderr: "warn" });
  });

  it("passes extra environment variables to the child", async () => {
    const r = await spawnCapture(process.execPath, ["-e", "process.stdout.write(process.env.FORGE_TEST_VALUE ?? '')"], {
      env: { FORGE_TEST_VALUE: "abc" },
    });
    expect(r.stdout).toBe("abc");
    expect(process.env.FORGE_TEST_VALUE).toBeUndefined();
  });

  it("writes output to the log file instead of capturing it", async () => {
    const dir = await makeTmpDir("runner");
    try {
      const logFile = path.join(dir, "logs", "meson_tiger.log");
      const r = await spawnCapture(process.execPath, ["-e", "console.log('configured')"], { logFile });
      expect(r).toEqual({ code: 0, stdout: "", stderr: "" });
      expect(await readFile(logFile, "utf8")).toBe("configured\n");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it("resolves with 127 when the command does not exist", async () => {
    const r = await spawnCapture("driver-forge-no-such-command", []);
    expect(r.code).toBe(127);
    expect(r.stderr).toMatch(/ENOENT/);
  });
});

describe("formatCommand", () => {
  it("quotes arguments containing spaces", () => {
    expect(formatCommand("git", ["commit", "-m", "a b"])).toBe('git commit -m "a b"');
  });
});

describe("describeFailure", () => {
  it("falls back to the exit code when there is no output", () => {
    expect(describeFailure({ code: 2, stdout: "", stderr: "" })).toBe("exit code 2");
    expect(describeFailure({ code: 1, stdout: "", stderr: "fatal: bad ref\n" })).toBe("fatal: bad ref");
  });
});
