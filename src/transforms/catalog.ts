import type { Transformation } from "./types.js";

const TIGER_MARKER = "// Dragon: Tiger Velocity";

/** Spells shipped with the forge. Config may add to or replace these by id. */
export const BUILTIN_TRANSFORMS: Transformation[] = [
  {
    id: "tiger/velocity",
    kind: "text_rewrite",
    description: "Force sysmem rendering in the turnip command buffer",
    file: "src/freedreno/vulkan/tu_cmd_buffer.cc",
    marker: TIGER_MARKER,
    rules: [
      {
        kind: "first_of",
        rules: [
          {
            kind: "insert_after",
            regex: true,
            anchor: "^use_sysmem_rendering\\b[^\\n]*\\n(?:[^\\n]*\\n)*?\\{[^\\n]*",
            text: `\n   ${TIGER_MARKER}\n   return true;`,
          },
          {
            kind: "insert_before",
            regex: true,
            anchor: "^[ \\t]*if \\(TU_DEBUG\\(SYSMEM\\)\\)",
            text: `   ${TIGER_MARKER}\n   return true;\n`,
          },
        ],
      },
    ],
  },
  {
    id: "falcon/query-uncached",
    kind: "text_rewrite",
    description: "Allocate query buffers without the cached flag",
    file: "src/freedreno/vulkan/tu_query.cc",
    marker: "// Dragon: Falcon Memory (query)",
    rules: [{ kind: "replace", find: "tu_bo_init_new_cached", replace: "tu_bo_init_new" }],
  },
  {
    id: "falcon/coherent-off",
    kind: "text_rewrite",
    description: "Report no cached coherent memory",
    file: "src/freedreno/vulkan/tu_device.cc",
    marker: "// Dragon: Falcon Memory (device)",
    rules: [
      {
        kind: "replace",
        find: "has_cached_coherent_memory = true",
        replace: "has_cached_coherent_memory = false",
      },
    ],
  },
  {
    id: "phoenix/wings_boost",
    kind: "diff_patch",
    patchFile: "phoenix/wings_boost.patch",
  },
  {
    id: "common/memory_fix",
    kind: "diff_patch",
    patchFile: "common/memory_fix.patch",
  },
  {
    id: "shadow/mr-37802",
    kind: "merge_request",
    description: "Upstream merge request !37802",
    remote: "origin",
    ref: "refs/merge-requests/37802/head",
  },
];

export type TransformCatalog = ReadonlyMap<string, Transformation>;

export function buildTransformCatalog(extra: Transformation[] = [], base: Transformation[] = BUILTIN_TRANSFORMS): TransformCatalog {
  const catalog = new Map<string, Transformation>();
  for (const t of [...base, ...extra]) catalog.set(t.id, t);
  return catalog;
}

/** Ids the catalog does not define are spell files: `<spellsDir>/<id>.patch`. */
export function lookupTransform(catalog: TransformCatalog, id: string): Transformation {
  return catalog.get(id) ?? { id, kind: "diff_patch", patchFile: `${id}.patch` };
}
