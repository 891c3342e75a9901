import { rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { makeTmpDir } from "../test-utils.js";
import { readLogTail, tailLines } from "./logTail.js";

describe("tailLines", () => {
  it("keeps the last lines and ignores trailing newlines", () => {
    expect(tailLines("a\r\nb\nc\n\n", 2)).toBe("b\nc");
  });

  it("returns everything when the text is shorter than the limit", () => {
    expect(tailLines("one\ntwo", 30)).toBe("one\ntwo");
  });

  it("returns nothing for a non-positive limit", () => {
    expect(tailLines("x\ny", 0)).toBe("");
  });
});

describe("readLogTail", () => {
  it("reads the tail of a log file and tolerates a missing one", async () => {
    const dir = await makeTmpDir("tail");
    try {
      const file = path.join(dir, "ninja.log");
      await writeFile(file, Array.from({ length: 60 }, (_, i) => `line ${i + 1}`).join("\n"), "utf8");

      const tail = await readLogTail(file, 50);
      expect(tail.split("\n")).toHaveLength(50);
      expect(tail.startsWith("line 11\n")).toBe(true);
      expect(tail.endsWith("line 60")).toBe(true);

      expect(await readLogTail(path.join(dir, "missing.log"), 50)).toBe("");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
