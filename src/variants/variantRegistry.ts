import path from "node:path";

import type { VariantDefinition } from "../config.js";
import { VariantDefinitionError } from "../errors.js";
import { lookupTransform, type TransformCatalog } from "../transforms/catalog.js";
import type { Transformation } from "../transforms/types.js";

export type Variant = {
  name: string;
  label: string;
  transforms: Transformation[];
};

export type VariantResolution =
  | { kind: "found"; variant: Variant }
  | { kind: "unknown"; requested: string; fallback: Variant };

export type VariantSelection = {
  variants: Variant[];
  // set when the request matched nothing and the default was used instead
  unknown: string | null;
};

export const ALL_VARIANTS = "all";

export function normalizeVariantName(name: string): string {
  return name.trim().toLowerCase().replaceAll("_", "-");
}

function escapesRoot(rel: string): boolean {
  const normalized = path.posix.normalize(rel.replaceAll("\\", "/"));
  return path.posix.isAbsolute(normalized) || normalized.startsWith("../") || normalized === "..";
}

function checkTransform(variant: string, t: Transformation): void {
  if (t.kind === "diff_patch" && escapesRoot(t.patchFile)) {
    throw new VariantDefinitionError(`variant ${variant}: spell ${t.id} points outside the spells directory`);
  }
  if (t.kind === "text_rewrite" && escapesRoot(t.file)) {
    throw new VariantDefinitionError(`variant ${variant}: spell ${t.id} targets a file outside the working copy`);
  }
}

/**
 * Holds the variants a run may choose from. Definitions are checked up front:
 * the default must exist and every transformation's `requires` must run
 * earlier in the same variant.
 */
export class VariantRegistry {
  private readonly variants = new Map<string, Variant>();
  private readonly defaultKey: string;

  constructor(definitions: VariantDefinition[], catalog: TransformCatalog, defaultVariant: string) {
    for (const def of definitions) {
      const key = normalizeVariantName(def.name);
      if (key === ALL_VARIANTS) throw new VariantDefinitionError(`"${ALL_VARIANTS}" is reserved`);
      // later definitions replace earlier ones but keep their position
      this.variants.set(key, {
        name: key,
        label: def.label,
        transforms: def.transforms.map((id) => lookupTransform(catalog, id)),
      });
    }

    for (const variant of this.variants.values()) {
      const seen = new Set<string>();
      for (const t of variant.transforms) {
        checkTransform(variant.name, t);
        for (const dep of t.requires ?? []) {
          if (!seen.has(dep)) {
            throw new VariantDefinitionError(`variant ${variant.name}: ${t.id} requires ${dep} to run before it`);
          }
        }
        seen.add(t.id);
      }
    }

    this.defaultKey = normalizeVariantName(defaultVariant);
    if (!this.variants.has(this.defaultKey)) {
      throw new VariantDefinitionError(`default variant not defined: ${defaultVariant}`);
    }
  }

  get defaultVariant(): Variant {
    const v = this.variants.get(this.defaultKey);
    if (!v) throw new VariantDefinitionError(`default variant not defined: ${this.defaultKey}`);
    return v;
  }

  list(): Variant[] {
    return [...this.variants.values()];
  }

  resolve(name: string): VariantResolution {
    const found = this.variants.get(normalizeVariantName(name));
    if (found) return { kind: "found", variant: found };
    return { kind: "unknown", requested: name, fallback: this.defaultVariant };
  }

  select(request?: string | null): VariantSelection {
    const requested = request?.trim() ? request.trim() : null;
    if (!requested) return { variants: [this.defaultVariant], unknown: null };
    if (normalizeVariantName(requested) === ALL_VARIANTS) return { variants: this.list(), unknown: null };

    const r = this.resolve(requested);
    return r.kind === "found"
      ? { variants: [r.variant], unknown: null }
      : { variants: [r.fallback], unknown: r.requested };
  }
}
