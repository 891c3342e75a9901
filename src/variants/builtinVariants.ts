import type { VariantDefinition } from "../config.js";

export const BUILTIN_VARIANTS: VariantDefinition[] = [
  { name: "tiger", label: "Tiger", transforms: ["tiger/velocity"] },
  { name: "tiger-phoenix", label: "Tiger-Phoenix", transforms: ["tiger/velocity", "phoenix/wings_boost"] },
  { name: "falcon", label: "Falcon", transforms: ["falcon/query-uncached", "falcon/coherent-off", "tiger/velocity"] },
  { name: "shadow", label: "Shadow", transforms: ["shadow/mr-37802"] },
  {
    name: "hawk",
    label: "Hawk",
    transforms: [
      "tiger/velocity",
      "falcon/query-uncached",
      "falcon/coherent-off",
      "phoenix/wings_boost",
      "common/memory_fix",
    ],
  },
];
