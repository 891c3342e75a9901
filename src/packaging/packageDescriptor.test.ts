import { describe, expect, it } from "vitest";

import { buildMetadata, describePackage, formatBuildTime } from "./packageDescriptor.js";

const SETTINGS = {
  prefix: "Dragon",
  author: "Forge Bot",
  vendor: "Mesa",
  packageVersion: "1",
  minApi: 27,
  schemaVersion: 1,
  libraryName: "vulkan.dragon.so",
};

describe("describePackage", () => {
  it("names the archive from prefix, label, version and revision", () => {
    expect(describePackage("Dragon", "Tiger-Phoenix", { version: "25.3.0-devel", revision: "0123456" })).toEqual({
      prefix: "Dragon",
      variant: "Tiger-Phoenix",
      version: "25.3.0-devel",
      revision: "0123456",
      fileName: "Dragon-Tiger-Phoenix-25.3.0-devel-0123456.zip",
    });
  });
});

describe("buildMetadata", () => {
  it("fills every field of meta.json", () => {
    expect(buildMetadata(SETTINGS, "Falcon", "25.3.0", new Date(2025, 0, 2, 3, 4))).toEqual({
      schemaVersion: 1,
      name: "Dragon Falcon",
      description: "Mesa 25.3.0 - Falcon variant - Built: 2025-01-02 03:04",
      author: "Forge Bot",
      packageVersion: "1",
      vendor: "Mesa",
      driverVersion: "25.3.0",
      minApi: 27,
      libraryName: "vulkan.dragon.so",
    });
  });

  it("pads the build time", () => {
    expect(formatBuildTime(new Date(2024, 10, 30, 23, 59))).toBe("2024-11-30 23:59");
  });
});
