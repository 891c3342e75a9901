import path from "node:path";

import type { ResolvedToolchain } from "../types.js";

export type ToolchainProfile = {
  platform: "android";
  arch: "aarch64";
  cpu: "armv8";
  endian: "little";
  apiLevel: number;
  binDir: string;
  launcher: string[];
  cc: string;
  cxx: string;
  ar: string;
  strip: string;
  cLinker: string;
  cppLinker: string;
  cppCompilerFlags: string[];
  cArgs: string[];
  cppArgs: string[];
  pkgConfig: string;
  native: { cc: string; cxx: string; pkgConfig: string };
  mesonOptions: Record<string, string>;
  env: Record<string, string>;
};

export type ProfileSettings = {
  apiLevel: number;
  hostTag: string;
  ccache: boolean;
  mesonOptions?: Record<string, string>;
  env?: Record<string, string>;
};

const TARGET_TRIPLE = "aarch64-linux-android";

// Only the freedreno Vulkan driver is wanted; everything else is switched off.
export function baseMesonOptions(apiLevel: number): Record<string, string> {
  return {
    buildtype: "release",
    platforms: "android",
    "platform-sdk-version": String(apiLevel),
    "android-stub": "true",
    "gallium-drivers": "",
    "vulkan-drivers": "freedreno",
    "vulkan-beta": "true",
    "freedreno-kmds": "kgsl",
    b_lto: "true",
    b_ndebug: "true",
    cpp_rtti: "false",
    egl: "disabled",
    gbm: "disabled",
    glx: "disabled",
    opengl: "false",
    llvm: "disabled",
    libunwind: "disabled",
    zstd: "disabled",
    "spirv-tools": "disabled",
    werror: "false",
    valgrind: "disabled",
    "build-tests": "false",
  };
}

export function deriveToolchainProfile(toolchain: ResolvedToolchain, settings: ProfileSettings): ToolchainProfile {
  const binDir = path.join(toolchain.root, "toolchains", "llvm", "prebuilt", settings.hostTag, "bin");
  const launcher = settings.ccache ? ["ccache"] : [];
  return {
    platform: "android",
    arch: "aarch64",
    cpu: "armv8",
    endian: "little",
    apiLevel: settings.apiLevel,
    binDir,
    launcher,
    cc: path.join(binDir, `${TARGET_TRIPLE}${settings.apiLevel}-clang`),
    cxx: path.join(binDir, `${TARGET_TRIPLE}${settings.apiLevel}-clang++`),
    ar: path.join(binDir, "llvm-ar"),
    strip: path.join(binDir, "llvm-strip"),
    cLinker: "lld",
    cppLinker: "lld",
    cppCompilerFlags: ["-fno-exceptions", "-fno-unwind-tables", "-fno-asynchronous-unwind-tables", "-static-libstdc++"],
    cArgs: ["-w", "-Wno-error"],
    cppArgs: ["-w", "-Wno-error"],
    pkgConfig: "/bin/false",
    native: { cc: "clang", cxx: "clang++", pkgConfig: "/usr/bin/pkg-config" },
    mesonOptions: { ...baseMesonOptions(settings.apiLevel), ...(settings.mesonOptions ?? {}) },
    env: { ANDROID_NDK_HOME: toolchain.root, ...(settings.env ?? {}) },
  };
}

function quote(value: string): string {
  return `'${value.replace(/\\/g, "\\\\").replace(/'/g, "\\'")}'`;
}

function list(values: string[]): string {
  return `[${values.map(quote).join(", ")}]`;
}

export function renderCrossFile(profile: ToolchainProfile): string {
  return [
    "[binaries]",
    `ar = ${quote(profile.ar)}`,
    `c = ${list([...profile.launcher, profile.cc])}`,
    `cpp = ${list([...profile.launcher, profile.cxx, ...profile.cppCompilerFlags])}`,
    `c_ld = ${quote(profile.cLinker)}`,
    `cpp_ld = ${quote(profile.cppLinker)}`,
    `strip = ${quote(profile.strip)}`,
    `pkg-config = ${quote(profile.pkgConfig)}`,
    "[host_machine]",
    `system = ${quote(profile.platform)}`,
    `cpu_family = ${quote(profile.arch)}`,
    `cpu = ${quote(profile.cpu)}`,
    `endian = ${quote(profile.endian)}`,
    "[built-in options]",
    `c_args = ${list(profile.cArgs)}`,
    `cpp_args = ${list(profile.cppArgs)}`,
    "",
  ].join("\n");
}

export function renderNativeFile(profile: ToolchainProfile): string {
  return [
    "[binaries]",
    `c = ${list([...profile.launcher, profile.native.cc])}`,
    `cpp = ${list([...profile.launcher, profile.native.cxx])}`,
    `pkg-config = ${quote(profile.native.pkgConfig)}`,
    "",
  ].join("\n");
}

export function mesonOptionArgs(profile: ToolchainProfile): string[] {
  return Object.entries(profile.mesonOptions).map(([key, value]) => `-D${key}=${value}`);
}
