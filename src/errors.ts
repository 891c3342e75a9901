export type ForgeErrorCode =
  | "ACQUISITION_FAILED"
  | "TOOLCHAIN_UNAVAILABLE"
  | "CONFIGURE_FAILED"
  | "COMPILE_FAILED"
  | "ARTIFACT_MISSING"
  | "PACKAGING_FAILED"
  | "INVALID_VARIANT_DEFINITION";

export class ForgeError extends Error {
  constructor(
    message: string,
    public readonly code: ForgeErrorCode,
    public readonly details?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** No candidate source could be checked out. Fatal to the whole run. */
export class AcquisitionError extends ForgeError {
  constructor(message: string, details?: string) {
    super(message, "ACQUISITION_FAILED", details);
  }
}

export class ToolchainError extends ForgeError {
  constructor(message: string, details?: string) {
    super(message, "TOOLCHAIN_UNAVAILABLE", details);
  }
}

/**
 * Configure or compile failed. Carries the tail of the tool log so the
 * failure can be read without opening the log file.
 */
export class BuildError extends ForgeError {
  constructor(
    message: string,
    code: "CONFIGURE_FAILED" | "COMPILE_FAILED",
    public readonly logPath: string,
    public readonly logTail: string,
  ) {
    super(message, code, logTail);
  }
}

export class PackagingError extends ForgeError {
  constructor(message: string, code: "ARTIFACT_MISSING" | "PACKAGING_FAILED" = "PACKAGING_FAILED", details?: string) {
    super(message, code, details);
  }
}

export class VariantDefinitionError extends ForgeError {
  constructor(message: string) {
    super(message, "INVALID_VARIANT_DEFINITION");
  }
}
