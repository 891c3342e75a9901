import { mkdir } from "node:fs/promises";

import { BuildExecutor } from "../build/buildExecutor.js";
import type { LoadedForgeConfig } from "../config.js";
import { ForgeError } from "../errors.js";
import { errorMessage, type ForgeLogger } from "../logger.js";
import { Packager } from "../packaging/packager.js";
import { GitClient } from "../source/gitClient.js";
import { SourceAcquirer } from "../source/sourceAcquirer.js";
import type { Downloader } from "../toolchain/httpDownload.js";
import { resolveToolchain } from "../toolchain/toolchainResolver.js";
import type { Extractor } from "../toolchain/zipExtract.js";
import { buildTransformCatalog } from "../transforms/catalog.js";
import { TransformEngine } from "../transforms/transformEngine.js";
import type {
  ForgeWarning,
  RunSummary,
  VariantFailure,
  VariantStage,
  WorkingCopy,
} from "../types.js";
import { spawnCapture, type CommandRunner } from "../utils/commandRunner.js";
import type { RetryPolicy } from "../utils/retry.js";
import { BUILTIN_VARIANTS } from "../variants/builtinVariants.js";
import { VariantRegistry, type Variant } from "../variants/variantRegistry.js";
import { buildRunReport, writeRunReport } from "./runReport.js";

export type OrchestratorOpts = {
  config: LoadedForgeConfig;
  log: ForgeLogger;
  run?: CommandRunner;
  download?: Downloader;
  extract?: Extractor;
  now?: () => Date;
};

export type RunRequest = {
  variant?: string | null;
  revision?: string | null;
  signal?: AbortSignal;
};

export class Orchestrator {
  readonly registry: VariantRegistry;
  private readonly runner: CommandRunner;
  private readonly now: () => Date;

  constructor(private readonly opts: OrchestratorOpts) {
    const { config } = opts;
    this.runner = opts.run ?? spawnCapture;
    this.now = opts.now ?? (() => new Date());
    this.registry = new VariantRegistry(
      [...BUILTIN_VARIANTS, ...config.variants],
      buildTransformCatalog(config.transforms),
      config.default_variant,
    );
  }

  private get retryPolicy(): RetryPolicy {
    const r = this.opts.config.retry;
    return { maxAttempts: r.max_attempts, delayMs: r.delay_seconds * 1000 };
  }

  async run(request: RunRequest = {}): Promise<RunSummary> {
    const { config, log } = this.opts;
    const { signal } = request;
    const startedAt = this.now();
    const warnings: ForgeWarning[] = [];
    const warn = (w: ForgeWarning) => {
      warnings.push(w);
      log.warn(w.message, { event: w.event, variant: w.variant, transform: w.transform });
    };

    await mkdir(config.chamber, { recursive: true });
    await mkdir(config.output_dir, { recursive: true });

    const toolchain = await resolveToolchain({
      chamber: config.chamber,
      version: config.toolchain.version,
      downloadUrl: config.toolchain.download_url,
      systemRoot: config.toolchain.system_root,
      downloadTimeoutMs: config.toolchain.download_timeout_seconds * 1000,
      maxDownloadBytes: config.toolchain.max_download_bytes,
      retry: this.retryPolicy,
      log,
      download: this.opts.download,
      extract: this.opts.extract,
      signal,
    });

    const git = new GitClient(this.runner);
    const acquirer = new SourceAcquirer({
      git,
      log,
      chamber: config.chamber,
      depth: config.source.depth,
      pinFetchDepth: config.source.pin_fetch_depth,
      identity: { name: config.source.git_user_name, email: config.source.git_user_email },
      retry: this.retryPolicy,
      // the acquirer logs these itself
      warn: (w) => warnings.push(w),
      signal,
    });
    const workingCopy = await acquirer.acquire(config.source.candidates, request.revision);

    const selection = this.registry.select(request.variant);
    if (selection.unknown) {
      warn({
        event: "variant.unknown",
        message: `unknown variant ${selection.unknown}, building ${this.registry.defaultVariant.name}`,
        variant: selection.unknown,
      });
    }
    const requested = request.variant?.trim() ? request.variant.trim() : this.registry.defaultVariant.name;

    const engine = new TransformEngine({ git, log, spellsDir: config.spells_dir });
    const builder = new BuildExecutor({
      run: this.runner,
      log,
      chamber: config.chamber,
      buildDir: config.build.dir,
      target: config.build.target,
      jobs: config.build.jobs,
      configureLogTail: config.build.configure_log_tail,
      compileLogTail: config.build.compile_log_tail,
      profile: {
        apiLevel: config.toolchain.api_level,
        hostTag: config.toolchain.host_tag,
        ccache: config.toolchain.ccache,
        mesonOptions: config.build.meson_options,
        env: config.build.env,
      },
      signal,
    });
    const packager = new Packager({
      run: this.runner,
      log,
      chamber: config.chamber,
      outputDir: config.output_dir,
      soname: config.package.soname,
      metadata: {
        prefix: config.package.prefix,
        author: config.package.author,
        vendor: config.package.vendor,
        packageVersion: config.package.package_version,
        minApi: config.package.min_api,
        schemaVersion: config.package.schema_version,
        libraryName: config.package.library_name,
      },
      now: this.now,
    });

    const succeeded: string[] = [];
    const failed: VariantFailure[] = [];
    const archives: string[] = [];

    for (const variant of selection.variants) {
      signal?.throwIfAborted();
      log.info(`=== variant ${variant.label} ===`);
      let stage: VariantStage = "reset";
      try {
        await acquirer.reset(workingCopy);

        stage = "transform";
        await this.applyTransforms(engine, workingCopy, variant, warn);

        stage = "build";
        const built = await builder.build(workingCopy, toolchain, variant.label);

        stage = "package";
        const artifact = await packager.package(built, workingCopy, variant.label);
        archives.push(artifact.archivePath);
        succeeded.push(variant.name);
      } catch (err) {
        if (signal?.aborted) throw err;
        const failure: VariantFailure = {
          name: variant.name,
          label: variant.label,
          stage,
          message: errorMessage(err),
          code: err instanceof ForgeError ? err.code : undefined,
        };
        failed.push(failure);
        log.error(`variant ${variant.label} failed during ${stage}`, {
          code: failure.code,
          err: failure.message,
          details: err instanceof ForgeError ? err.details : undefined,
        });
      }
    }

    const summary: RunSummary = { requested, succeeded, failed, archives, warnings, ok: archives.length > 0 };

    if (config.report) {
      const report = buildRunReport({ summary, workingCopy, toolchain, startedAt, finishedAt: this.now() });
      try {
        const file = await writeRunReport(config.output_dir, report);
        log.info(`run report written: ${file}`);
      } catch (err) {
        warn({ event: "report.write_failed", message: `could not write run report: ${errorMessage(err)}` });
      }
    }
    this.logSummary(summary);
    return summary;
  }

  private async applyTransforms(
    engine: TransformEngine,
    workingCopy: WorkingCopy,
    variant: Variant,
    warn: (w: ForgeWarning) => void,
  ): Promise<void> {
    for (const t of variant.transforms) {
      const outcome = await engine.apply(workingCopy, t);
      const base = { variant: variant.name, transform: t.id };
      switch (outcome.status) {
        case "not_found":
          warn({ ...base, event: "transform.not_found", message: `spell ${t.id} not found: ${outcome.detail}` });
          break;
        case "partially_applied":
          warn({ ...base, event: "transform.partial", message: `spell ${t.id} partially applied: ${outcome.detail}` });
          break;
        default:
          this.opts.log.info(`spell ${t.id}: ${outcome.status}`, { detail: outcome.detail });
      }
      if (outcome.unmatchedRules) {
        warn({
          ...base,
          event: "transform.rule_unmatched",
          message: `spell ${t.id}: ${outcome.unmatchedRules} rule(s) did not match`,
        });
      }
    }
  }

  private logSummary(summary: RunSummary): void {
    const { log } = this.opts;
    log.info(`build complete: ${summary.succeeded.length} succeeded, ${summary.failed.length} failed`);
    if (summary.failed.length) log.warn(`failed variants: ${summary.failed.map((f) => f.name).join(", ")}`);
    for (const archive of summary.archives) log.info(`archive: ${archive}`);
  }
}
