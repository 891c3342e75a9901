import type { SourceCandidate } from "./config.js";

export type WorkingCopy = {
  root: string;
  // short hash of the HEAD actually obtained
  revision: string;
  // full hash every variant is reset back to
  baseRevision: string;
  version: string;
  source: SourceCandidate;
  requestedRevision: string | null;
  pinned: boolean;
};

export type ToolchainSource = "system" | "cached" | "downloaded";

export type ResolvedToolchain = {
  root: string;
  version: string;
  source: ToolchainSource;
};

export type BuildResult = {
  artifactPath: string;
  variant: string;
  logPath: string;
};

export type PackageDescriptor = {
  prefix: string;
  variant: string;
  version: string;
  revision: string;
  fileName: string;
};

export type PackagedArtifact = {
  descriptor: PackageDescriptor;
  archivePath: string;
  bytes: number;
};

export type WarningEvent =
  | "source.candidate_failed"
  | "source.revision_fallback"
  | "variant.unknown"
  | "transform.not_found"
  | "transform.partial"
  | "transform.rule_unmatched"
  | "report.write_failed";

export type ForgeWarning = {
  event: WarningEvent;
  message: string;
  variant?: string;
  transform?: string;
};

export type WarningSink = (warning: ForgeWarning) => void;

export type VariantStage = "reset" | "transform" | "build" | "package";

export type VariantFailure = {
  name: string;
  label: string;
  stage: VariantStage;
  message: string;
  code?: string;
};

export type RunSummary = {
  requested: string;
  succeeded: string[];
  failed: VariantFailure[];
  archives: string[];
  warnings: ForgeWarning[];
  ok: boolean;
};
