import { describe, expect, it } from "vitest";

import { pickArg, positionalArgs } from "./args.js";

describe("args", () => {
  it("picks flag values in both spellings", () => {
    expect(pickArg(["--config", "forge.toml"], "--config")).toBe("forge.toml");
    expect(pickArg(["--profile=ci"], "--profile")).toBe("ci");
    expect(pickArg(["tiger"], "--config")).toBeNull();
  });

  it("skips flags and their values when collecting positionals", () => {
    expect(
      positionalArgs(["tiger", "--config", "forge.toml", "abc123", "--profile=ci"], ["--config", "--profile"]),
    ).toEqual(["tiger", "abc123"]);
  });
});
