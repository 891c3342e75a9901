import { mkdir, readdir, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { PackagingError } from "../errors.js";
import { createFakeRunner, createTestLogger, makeTmpDir, readZipEntries, type FakeHandler } from "../test-utils.js";
import type { BuildResult, WorkingCopy } from "../types.js";
import { pathExists } from "../utils/fsUtil.js";
import { Packager } from "./packager.js";

describe("Packager", () => {
  let dir = "";
  let chamber = "";
  let outputDir = "";
  let built: BuildResult;
  const wc: WorkingCopy = {
    root: "/unused",
    revision: "0123456",
    baseRevision: "0123456789abcdef",
    version: "25.3.0-devel",
    source: { name: "gitlab", url: "https://example.test/mesa.git" },
    requestedRevision: null,
    pinned: false,
  };

  beforeEach(async () => {
    dir = await makeTmpDir("package");
    chamber = path.join(dir, "chamber");
    outputDir = path.join(dir, "out");
    const artifactPath = path.join(dir, "build", "libvulkan_freedreno.so");
    await mkdir(path.dirname(artifactPath), { recursive: true });
    await writeFile(artifactPath, "ELF-bytes", "utf8");
    built = { artifactPath, variant: "Tiger", logPath: path.join(chamber, "ninja_tiger.log") };
  });

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  function createPackager(handler?: FakeHandler) {
    const runner = createFakeRunner(handler);
    const packager = new Packager({
      run: runner.run,
      log: createTestLogger(),
      chamber,
      outputDir,
      soname: "vulkan.adreno.so",
      metadata: {
        prefix: "Dragon",
        author: "Forge Bot",
        vendor: "Mesa",
        packageVersion: "1",
        minApi: 27,
        schemaVersion: 1,
        libraryName: "vulkan.dragon.so",
      },
      now: () => new Date(2025, 5, 7, 8, 9),
    });
    return { packager, calls: runner.calls };
  }

  it("zips exactly the renamed library and its metadata", async () => {
    const { packager, calls } = createPackager();

    const artifact = await packager.package(built, wc, "Tiger");

    expect(artifact.archivePath).toBe(path.join(outputDir, "Dragon-Tiger-25.3.0-devel-0123456.zip"));
    expect(artifact.descriptor.fileName).toBe("Dragon-Tiger-25.3.0-devel-0123456.zip");
    expect(artifact.bytes).toBeGreaterThan(0);

    const entries = await readZipEntries(artifact.archivePath);
    expect([...entries.keys()]).toEqual(["vulkan.dragon.so", "meta.json"]);
    expect(entries.get("vulkan.dragon.so")).toBe("ELF-bytes");
    expect(JSON.parse(entries.get("meta.json") ?? "{}")).toEqual({
      schemaVersion: 1,
      name: "Dragon Tiger",
      description: "Mesa 25.3.0-devel - Tiger variant - Built: 2025-06-07 08:09",
      author: "Forge Bot",
      packageVersion: "1",
      vendor: "Mesa",
      driverVersion: "25.3.0-devel",
      minApi: 27,
      libraryName: "vulkan.dragon.so",
    });

    expect(calls).toHaveLength(1);
    expect(calls[0].cmd).toBe("patchelf");
    expect(calls[0].args).toEqual([
      "--set-soname",
      "vulkan.adreno.so",
      path.join(chamber, "staging-tiger", "libvulkan_freedreno.so"),
    ]);
    expect(await pathExists(path.join(chamber, "staging-tiger"))).toBe(false);
  });

  it("replaces an archive left by an earlier run", async () => {
    await mkdir(outputDir, { recursive: true });
    const archive = path.join(outputDir, "Dragon-Tiger-25.3.0-devel-0123456.zip");
    await writeFile(archive, "stale", "utf8");
    const { packager } = createPackager();

    await packager.package(built, wc, "Tiger");

    expect((await readZipEntries(archive)).get("vulkan.dragon.so")).toBe("ELF-bytes");
    expect(await readdir(outputDir)).toEqual(["Dragon-Tiger-25.3.0-devel-0123456.zip"]);
  });

  it("fails with ARTIFACT_MISSING when the build output is absent", async () => {
    const { packager, calls } = createPackager();

    const err = await packager
      .package({ ...built, artifactPath: path.join(dir, "nope.so") }, wc, "Tiger")
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PackagingError);
    expect(err).toHaveProperty("code", "ARTIFACT_MISSING");
    expect(calls).toEqual([]);
  });

  it("cleans up and produces nothing when patchelf fails", async () => {
    const { packager } = createPackager(() => ({ code: 1, stderr: "patchelf: not an ELF executable" }));

    const err = await packager.package(built, wc, "Tiger").catch((e: unknown) => e);

    expect(err).toMatchObject({ code: "PACKAGING_FAILED", details: "patchelf: not an ELF executable" });
    expect(await pathExists(path.join(chamber, "staging-tiger"))).toBe(false);
    expect(await pathExists(path.join(outputDir, "Dragon-Tiger-25.3.0-devel-0123456.zip"))).toBe(false);
  });
});
