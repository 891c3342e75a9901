export type RewriteRule =
  | { kind: "replace"; find: string; replace: string; regex?: boolean; flags?: string }
  | { kind: "insert_after"; anchor: string; text: string; regex?: boolean }
  | { kind: "insert_before"; anchor: string; text: string; regex?: boolean }
  // applies only the first sub-rule whose pattern matches
  | { kind: "first_of"; rules: RewriteRule[] };

type TransformBase = {
  id: string;
  description?: string;
  // ids that must run earlier in the same variant
  requires?: string[];
};

export type TextRewriteTransform = TransformBase & {
  kind: "text_rewrite";
  file: string;
  marker: string;
  rules: RewriteRule[];
};

export type DiffPatchTransform = TransformBase & {
  kind: "diff_patch";
  // relative to the spells directory
  patchFile: string;
};

export type MergeRequestTransform = TransformBase & {
  kind: "merge_request";
  remote: string;
  ref: string;
};

export type Transformation = TextRewriteTransform | DiffPatchTransform | MergeRequestTransform;

export type TransformStatus = "applied" | "already_applied" | "partially_applied" | "not_found";

export type TransformOutcome = {
  id: string;
  kind: Transformation["kind"];
  status: TransformStatus;
  detail: string;
  matchedRules?: number;
  unmatchedRules?: number;
};
