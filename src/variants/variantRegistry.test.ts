import { describe, expect, it } from "vitest";

import { VariantDefinitionError } from "../errors.js";
import { buildTransformCatalog } from "../transforms/catalog.js";
import type { Transformation } from "../transforms/types.js";
import { BUILTIN_VARIANTS } from "./builtinVariants.js";
import { VariantRegistry } from "./variantRegistry.js";

const DEMO: Transformation[] = [
  {
    id: "demo/a",
    kind: "text_rewrite",
    file: "src/demo.c",
    marker: "// demo A",
    rules: [{ kind: "insert_after", anchor: "void setup() {", text: "\n   hook_a();" }],
  },
  {
    id: "demo/b",
    kind: "text_rewrite",
    requires: ["demo/a"],
    file: "src/demo.c",
    marker: "// demo B",
    rules: [{ kind: "insert_after", anchor: "hook_a();", text: "\n   hook_b();" }],
  },
];

describe("VariantRegistry", () => {
  const registry = new VariantRegistry(BUILTIN_VARIANTS, buildTransformCatalog(), "tiger");

  it("lists the built-in variants in declaration order", () => {
    expect(registry.list().map((v) => `${v.name}:${v.label}`)).toEqual([
      "tiger:Tiger",
      "tiger-phoenix:Tiger-Phoenix",
      "falcon:Falcon",
      "shadow:Shadow",
      "hawk:Hawk",
    ]);
  });

  it("resolves names case-insensitively with _ and - equivalent", () => {
    const r = registry.resolve("Tiger_Phoenix");
    expect(r.kind).toBe("found");
    if (r.kind === "found") {
      expect(r.variant.transforms.map((t) => t.id)).toEqual(["tiger/velocity", "phoenix/wings_boost"]);
      expect(r.variant.transforms[1]).toMatchObject({ kind: "diff_patch", patchFile: "phoenix/wings_boost.patch" });
    }
  });

  it("falls back to the default for unknown names", () => {
    const r = registry.resolve("eagle");
    expect(r.kind).toBe("unknown");
    if (r.kind === "unknown") {
      expect(r.requested).toBe("eagle");
      expect(r.fallback.name).toBe("tiger");
    }
  });

  it("selects the default, a single variant, or all of them", () => {
    expect(registry.select().variants.map((v) => v.name)).toEqual(["tiger"]);
    expect(registry.select("falcon")).toMatchObject({ unknown: null, variants: [{ name: "falcon" }] });
    expect(registry.select("ALL").variants).toHaveLength(5);
    expect(registry.select("eagle")).toMatchObject({ unknown: "eagle", variants: [{ name: "tiger" }] });
  });

  it("treats ids outside the catalog as spell files", () => {
    const r = new VariantRegistry([{ name: "owl", label: "Owl", transforms: ["owl/night"] }], buildTransformCatalog(), "owl");
    expect(r.defaultVariant.transforms).toEqual([{ id: "owl/night", kind: "diff_patch", patchFile: "owl/night.patch" }]);
  });

  it("lets later definitions replace earlier ones in place", () => {
    const r = new VariantRegistry(
      [...BUILTIN_VARIANTS, { name: "tiger", label: "Tiger-X", transforms: [] }],
      buildTransformCatalog(),
      "tiger",
    );
    expect(r.list()[0]).toEqual({ name: "tiger", label: "Tiger-X", transforms: [] });
  });

  it("accepts dependent transformations declared in order", () => {
    const r = new VariantRegistry(
      [{ name: "demo", label: "Demo", transforms: ["demo/a", "demo/b"] }],
      buildTransformCatalog(DEMO),
      "demo",
    );
    expect(r.defaultVariant.transforms.map((t) => t.id)).toEqual(["demo/a", "demo/b"]);
  });

  it("rejects dependent transformations declared out of order", () => {
    expect(
      () =>
        new VariantRegistry(
          [{ name: "demo", label: "Demo", transforms: ["demo/b", "demo/a"] }],
          buildTransformCatalog(DEMO),
          "demo",
        ),
    ).toThrow(new VariantDefinitionError("variant demo: demo/b requires demo/a to run before it"));
  });

  it("rejects a missing default variant", () => {
    expect(() => new VariantRegistry(BUILTIN_VARIANTS, buildTransformCatalog(), "eagle")).toThrow(
      "default variant not defined: eagle",
    );
  });

  it("rejects spell paths outside the spells directory", () => {
    expect(
      () => new VariantRegistry([{ name: "bad", label: "Bad", transforms: ["../escape"] }], buildTransformCatalog(), "bad"),
    ).toThrow(VariantDefinitionError);
  });

  it("rejects text rewrites targeting files outside the working copy", () => {
    const escaping: Transformation = {
      id: "demo/escape",
      kind: "text_rewrite",
      file: "../../etc/profile",
      marker: "// escape",
      rules: [{ kind: "insert_after", anchor: "x", text: "y" }],
    };
    expect(
      () =>
        new VariantRegistry(
          [{ name: "demo", label: "Demo", transforms: ["demo/escape"] }],
          buildTransformCatalog([escaping]),
          "demo",
        ),
    ).toThrow(new VariantDefinitionError("variant demo: spell demo/escape targets a file outside the working copy"));
  });
});
