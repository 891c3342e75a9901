import { describe, expect, it } from "vitest";

import { applyRule, applyRules, ensureMarker } from "./textRewrite.js";

describe("applyRule", () => {
  it("replaces every literal occurrence without expanding $ patterns", () => {
    const r = applyRule("a.b axb a.b", { kind: "replace", find: "a.b", replace: "$&!" });
    expect(r).toEqual({ content: "$&! axb $&!", matched: true });
  });

  it("supports regex replacement with captures", () => {
    const r = applyRule("bo = tu_bo_init_new_cached(dev);", {
      kind: "replace",
      find: "(tu_bo_init_new)_cached",
      replace: "$1",
      regex: true,
    });
    expect(r.content).toBe("bo = tu_bo_init_new(dev);");
  });

  it("inserts after and before the first anchor only", () => {
    const src = "x();\nx();\n";
    expect(applyRule(src, { kind: "insert_after", anchor: "x();", text: " // first" }).content).toBe(
      "x(); // first\nx();\n",
    );
    expect(applyRule(src, { kind: "insert_before", anchor: "x();", text: "y();\n" }).content).toBe("y();\nx();\nx();\n");
  });

  it("anchors regex patterns at line starts", () => {
    const src = "static bool\nuse_sysmem_rendering(struct cmd *cmd)\n{\n   if (TU_DEBUG(SYSMEM))\n";
    const r = applyRule(src, {
      kind: "insert_before",
      anchor: "^[ \\t]*if \\(TU_DEBUG\\(SYSMEM\\)\\)",
      regex: true,
      text: "   return true;\n",
    });
    expect(r.content).toBe("static bool\nuse_sysmem_rendering(struct cmd *cmd)\n{\n   return true;\n   if (TU_DEBUG(SYSMEM))\n");
  });

  it("applies only the first matching alternative of first_of", () => {
    const r = applyRule("alpha beta", {
      kind: "first_of",
      rules: [
        { kind: "replace", find: "gamma", replace: "G" },
        { kind: "replace", find: "beta", replace: "B" },
        { kind: "replace", find: "alpha", replace: "A" },
      ],
    });
    expect(r).toEqual({ content: "alpha B", matched: true });
  });

  it("leaves content untouched when nothing matches", () => {
    expect(applyRule("abc", { kind: "insert_after", anchor: "zzz", text: "!" })).toEqual({ content: "abc", matched: false });
  });
});

describe("applyRules", () => {
  it("counts matched and unmatched rules in order", () => {
    const r = applyRules("one two", [
      { kind: "replace", find: "one", replace: "1" },
      { kind: "replace", find: "three", replace: "3" },
      { kind: "insert_after", anchor: "1", text: "!" },
    ]);
    expect(r).toEqual({ content: "1! two", matched: 2, unmatched: ["replace three"] });
  });
});

describe("ensureMarker", () => {
  it("appends the marker on its own line once", () => {
    expect(ensureMarker("int x;", "// mark")).toBe("int x;\n// mark\n");
    expect(ensureMarker("int x;\n", "// mark")).toBe("int x;\n// mark\n");
    expect(ensureMarker("int x;\n// mark\n", "// mark")).toBe("int x;\n// mark\n");
  });
});
