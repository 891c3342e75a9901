export { runForgeCli } from "./cli.js";
export { loadConfig, type ForgeConfig, type LoadedForgeConfig, type VariantDefinition } from "./config.js";
export * from "./errors.js";
export { createLogger, toForgeLogger, type ForgeLogger } from "./logger.js";
export { Orchestrator, type OrchestratorOpts, type RunRequest } from "./orchestrator/orchestrator.js";
export { BuildExecutor } from "./build/buildExecutor.js";
export { Packager } from "./packaging/packager.js";
export { GitClient } from "./source/gitClient.js";
export { SourceAcquirer } from "./source/sourceAcquirer.js";
export { resolveToolchain } from "./toolchain/toolchainResolver.js";
export { deriveToolchainProfile, type ToolchainProfile } from "./toolchain/toolchainProfile.js";
export { TransformEngine } from "./transforms/transformEngine.js";
export { BUILTIN_TRANSFORMS, buildTransformCatalog } from "./transforms/catalog.js";
export type { RewriteRule, Transformation, TransformOutcome } from "./transforms/types.js";
export { BUILTIN_VARIANTS } from "./variants/builtinVariants.js";
export { VariantRegistry, type Variant } from "./variants/variantRegistry.js";
export { runWithRetry, type RetryPolicy } from "./utils/retry.js";
export type * from "./types.js";
