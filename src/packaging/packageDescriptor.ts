import { z } from "zod";

import type { PackageDescriptor, WorkingCopy } from "../types.js";

export const packageMetadataSchema = z.object({
  schemaVersion: z.number().int().positive(),
  name: z.string().min(1),
  description: z.string().min(1),
  author: z.string().min(1),
  packageVersion: z.string().min(1),
  vendor: z.string().min(1),
  driverVersion: z.string().min(1),
  minApi: z.number().int().positive(),
  libraryName: z.string().min(1),
});

export type PackageMetadata = z.infer<typeof packageMetadataSchema>;

export type MetadataSettings = {
  prefix: string;
  author: string;
  vendor: string;
  packageVersion: string;
  minApi: number;
  schemaVersion: number;
  libraryName: string;
};

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatBuildTime(d: Date): string {
  return `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())} ${pad2(d.getHours())}:${pad2(d.getMinutes())}`;
}

export function describePackage(
  prefix: string,
  variantLabel: string,
  workingCopy: Pick<WorkingCopy, "version" | "revision">,
): PackageDescriptor {
  return {
    prefix,
    variant: variantLabel,
    version: workingCopy.version,
    revision: workingCopy.revision,
    fileName: `${prefix}-${variantLabel}-${workingCopy.version}-${workingCopy.revision}.zip`,
  };
}

export function buildMetadata(
  settings: MetadataSettings,
  variantLabel: string,
  version: string,
  builtAt: Date,
): PackageMetadata {
  return packageMetadataSchema.parse({
    schemaVersion: settings.schemaVersion,
    name: `${settings.prefix} ${variantLabel}`,
    description: `Mesa ${version} - ${variantLabel} variant - Built: ${formatBuildTime(builtAt)}`,
    author: settings.author,
    packageVersion: settings.packageVersion,
    vendor: settings.vendor,
    driverVersion: version,
    minApi: settings.minApi,
    libraryName: settings.libraryName,
  });
}
