import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseToml } from "@iarna/toml";
import { z } from "zod";

import type { RewriteRule } from "./transforms/types.js";
import { isRecord } from "./utils/validate.js";

export const DEFAULT_SOURCE_CANDIDATES = [
  { name: "gitlab", url: "https://gitlab.freedesktop.org/mesa/mesa.git" },
  { name: "github", url: "https://github.com/mesa3d/mesa.git" },
];

const sourceCandidateSchema = z.object({
  name: z.string().min(1),
  url: z.string().min(1),
  ref: z.string().min(1).optional(),
});

const rewriteRuleSchema: z.ZodType<RewriteRule, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({
      kind: z.literal("replace"),
      find: z.string().min(1),
      replace: z.string(),
      regex: z.boolean().optional(),
      flags: z.string().optional(),
    }),
    z.object({
      kind: z.literal("insert_after"),
      anchor: z.string().min(1),
      text: z.string().min(1),
      regex: z.boolean().optional(),
    }),
    z.object({
      kind: z.literal("insert_before"),
      anchor: z.string().min(1),
      text: z.string().min(1),
      regex: z.boolean().optional(),
    }),
    z.object({
      kind: z.literal("first_of"),
      rules: z.array(rewriteRuleSchema).min(1),
    }),
  ]),
);

const transformBase = {
  id: z.string().min(1),
  description: z.string().optional(),
  requires: z.array(z.string().min(1)).optional(),
};

const transformSchema = z.discriminatedUnion("kind", [
  z.object({
    ...transformBase,
    kind: z.literal("text_rewrite"),
    file: z.string().min(1),
    marker: z.string().min(1),
    rules: z.array(rewriteRuleSchema).min(1),
  }),
  z.object({
    ...transformBase,
    kind: z.literal("diff_patch"),
    patchFile: z.string().min(1),
  }),
  z.object({
    ...transformBase,
    kind: z.literal("merge_request"),
    remote: z.string().min(1).default("origin"),
    ref: z.string().min(1),
  }),
]);

const variantSchema = z.object({
  name: z.string().min(1),
  label: z.string().min(1),
  transforms: z.array(z.string().min(1)),
});

const configCoreSchema = z.object({
  chamber: z.string().min(1).default("driver_chamber"),
  output_dir: z.string().min(1).optional(),
  spells_dir: z.string().min(1).default("spells"),
  default_variant: z.string().min(1).default("tiger"),
  report: z.boolean().default(true),
  source: z
    .object({
      candidates: z.array(sourceCandidateSchema).min(1).default(DEFAULT_SOURCE_CANDIDATES),
      depth: z.coerce.number().int().positive().default(500),
      pin_fetch_depth: z.coerce.number().int().positive().default(100),
      git_user_name: z.string().min(1).default("DragonDriver"),
      git_user_email: z.string().min(1).default("driver@dragon.local"),
    })
    .default({}),
  retry: z
    .object({
      max_attempts: z.coerce.number().int().positive().default(3),
      delay_seconds: z.coerce.number().nonnegative().default(15),
    })
    .default({}),
  toolchain: z
    .object({
      version: z.string().min(1).default("android-ndk-r29"),
      api_level: z.coerce.number().int().positive().default(35),
      system_root: z.string().min(1).optional(),
      download_url: z.string().min(1).optional(),
      host_tag: z.string().min(1).default("linux-x86_64"),
      ccache: z.boolean().default(true),
      download_timeout_seconds: z.coerce.number().int().positive().default(1800),
      // 0 disables the cap
      max_download_bytes: z.coerce.number().int().nonnegative().default(4 * 1024 ** 3),
    })
    .default({}),
  build: z
    .object({
      dir: z.string().min(1).default("build-dragon"),
      target: z.string().min(1).default("src/freedreno/vulkan/libvulkan_freedreno.so"),
      jobs: z.coerce.number().int().positive().optional(),
      configure_log_tail: z.coerce.number().int().positive().default(30),
      compile_log_tail: z.coerce.number().int().positive().default(50),
      meson_options: z.record(z.string()).default({}),
      env: z.record(z.string()).default({}),
    })
    .default({}),
  package: z
    .object({
      prefix: z.string().min(1).default("Dragon"),
      library_name: z.string().min(1).default("vulkan.dragon.so"),
      soname: z.string().min(1).default("vulkan.adreno.so"),
      author: z.string().min(1).default("DragonDriver"),
      vendor: z.string().min(1).default("Mesa"),
      package_version: z.string().min(1).default("1"),
      min_api: z.coerce.number().int().positive().default(27),
      schema_version: z.coerce.number().int().positive().default(1),
    })
    .default({}),
  transforms: z.array(transformSchema).default([]),
  variants: z.array(variantSchema).default([]),
});

const configFileSchema = z
  .object({
    profiles: z.record(z.string().min(1), z.record(z.unknown())).optional(),
  })
  .passthrough();

export type ForgeConfig = z.infer<typeof configCoreSchema>;
export type SourceCandidate = z.infer<typeof sourceCandidateSchema>;
export type VariantDefinition = z.infer<typeof variantSchema>;

export type LoadedForgeConfig = Omit<ForgeConfig, "output_dir" | "toolchain"> & {
  output_dir: string;
  toolchain: ForgeConfig["toolchain"] & { download_url: string };
};

function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const prev = out[key];
    out[key] = isRecord(prev) && isRecord(value) ? deepMerge(prev, value) : value;
  }
  return out;
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const pick = (name: string): string | null => {
    const v = env[name]?.trim();
    return v ? v : null;
  };

  const out: Record<string, unknown> = {};
  const toolchain: Record<string, unknown> = {};
  const build: Record<string, unknown> = {};

  const chamber = pick("FORGE_CHAMBER");
  if (chamber) out.chamber = chamber;
  const outputDir = pick("FORGE_OUTPUT_DIR");
  if (outputDir) out.output_dir = outputDir;
  const spellsDir = pick("FORGE_SPELLS_DIR");
  if (spellsDir) out.spells_dir = spellsDir;

  const ndkVersion = pick("FORGE_NDK_VERSION");
  if (ndkVersion) toolchain.version = ndkVersion;
  const apiLevel = pick("FORGE_API_LEVEL");
  if (apiLevel) toolchain.api_level = apiLevel;
  const systemNdk = pick("ANDROID_NDK_LATEST_HOME");
  if (systemNdk) toolchain.system_root = systemNdk;

  const jobs = pick("FORGE_BUILD_JOBS");
  if (jobs) build.jobs = jobs;

  if (Object.keys(toolchain).length) out.toolchain = toolchain;
  if (Object.keys(build).length) out.build = build;
  return out;
}

async function readConfigFile(abs: string): Promise<unknown> {
  const raw = await readFile(abs, "utf8");
  return path.extname(abs).toLowerCase() === ".toml" ? parseToml(raw) : JSON.parse(raw);
}

export function ndkDownloadUrl(version: string): string {
  return `https://dl.google.com/android/repository/${version}-linux.zip`;
}

export async function loadConfig(
  configPath: string | null,
  opts?: { profile?: string; cwd?: string; env?: NodeJS.ProcessEnv },
): Promise<LoadedForgeConfig> {
  const cwd = opts?.cwd ?? process.cwd();
  const env = opts?.env ?? process.env;

  let fileData: Record<string, unknown> = {};
  let profiles: Record<string, Record<string, unknown>> = {};
  if (configPath) {
    const abs = path.isAbsolute(configPath) ? configPath : path.join(cwd, configPath);
    const { profiles: fileProfiles, ...rest } = configFileSchema.parse(await readConfigFile(abs));
    fileData = rest;
    profiles = fileProfiles ?? {};
  }

  const profile = opts?.profile?.trim() ? opts.profile.trim() : null;
  const override = profile ? (profiles[profile] ?? null) : null;
  if (profile && !override) throw new Error(`config profile not found: ${profile}`);

  const merged = deepMerge(override ? deepMerge(fileData, override) : fileData, envOverrides(env));
  const parsed = configCoreSchema.parse(merged);

  const chamber = path.resolve(cwd, parsed.chamber);
  return {
    ...parsed,
    chamber,
    output_dir: parsed.output_dir ? path.resolve(cwd, parsed.output_dir) : chamber,
    spells_dir: path.resolve(cwd, parsed.spells_dir),
    toolchain: {
      ...parsed.toolchain,
      download_url: parsed.toolchain.download_url ?? ndkDownloadUrl(parsed.toolchain.version),
    },
  };
}
