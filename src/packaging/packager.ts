import { copyFile, mkdir, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";

import { PackagingError } from "../errors.js";
import { errorMessage, type ForgeLogger } from "../logger.js";
import type { BuildResult, PackagedArtifact, WorkingCopy } from "../types.js";
import { describeFailure, type CommandRunner } from "../utils/commandRunner.js";
import { isFile, slugify } from "../utils/fsUtil.js";
import { buildMetadata, describePackage, type MetadataSettings } from "./packageDescriptor.js";
import { zipFilesToFile } from "./zipArchive.js";

export type PackagerOpts = {
  run: CommandRunner;
  log: ForgeLogger;
  chamber: string;
  outputDir: string;
  soname: string;
  metadata: MetadataSettings;
  now?: () => Date;
};

export const METADATA_FILE = "meta.json";

export class Packager {
  constructor(private readonly opts: PackagerOpts) {}

  async package(buildResult: BuildResult, workingCopy: WorkingCopy, variantLabel: string): Promise<PackagedArtifact> {
    const { log, metadata } = this.opts;

    if (!(await isFile(buildResult.artifactPath))) {
      throw new PackagingError(`build artifact missing: ${buildResult.artifactPath}`, "ARTIFACT_MISSING");
    }

    const descriptor = describePackage(metadata.prefix, variantLabel, workingCopy);
    const stagingDir = path.join(this.opts.chamber, `staging-${slugify(variantLabel)}`);
    const archivePath = path.join(this.opts.outputDir, descriptor.fileName);

    await rm(stagingDir, { recursive: true, force: true });
    try {
      await mkdir(stagingDir, { recursive: true });
      const staged = path.join(stagingDir, path.basename(buildResult.artifactPath));
      await copyFile(buildResult.artifactPath, staged);

      const r = await this.opts.run("patchelf", ["--set-soname", this.opts.soname, staged]);
      if (r.code !== 0) {
        throw new PackagingError(`patchelf failed for ${variantLabel}`, "PACKAGING_FAILED", describeFailure(r));
      }

      const library = path.join(stagingDir, metadata.libraryName);
      if (staged !== library) await rename(staged, library);

      const meta = buildMetadata(metadata, variantLabel, workingCopy.version, (this.opts.now ?? (() => new Date()))());
      const metaFile = path.join(stagingDir, METADATA_FILE);
      await writeFile(metaFile, `${JSON.stringify(meta, null, 2)}\n`, "utf8");

      const { bytes } = await zipFilesToFile({
        entries: [
          { absPath: library, name: metadata.libraryName },
          { absPath: metaFile, name: METADATA_FILE },
        ],
        outFile: archivePath,
      });
      log.info(`packaged ${descriptor.fileName}`, { bytes });
      return { descriptor, archivePath, bytes };
    } catch (err) {
      if (err instanceof PackagingError) throw err;
      throw new PackagingError(`packaging failed for ${variantLabel}`, "PACKAGING_FAILED", errorMessage(err));
    } finally {
      await rm(stagingDir, { recursive: true, force: true });
    }
  }
}
