/*
Purpose: core error types raised by the compile pipeline and surfaced by the CLI.
Assumptions: UserFacingError instances are safe to display in staging output.
Usage: throw new ArtifactUnavailableError("..."); throw new UserFacingError({ code, title, message, hint, cause }).
*/

import type { BuildError } from "../builder/build-errors.js";

// =============================================================================
// PIPELINE ERRORS
// =============================================================================

export class BuildpackError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "BuildpackError";
  }
}

export class ConfigurationMissingError extends BuildpackError {
  constructor(
    public readonly missing: string[],
    cause?: unknown,
  ) {
    super(`Missing required configuration: ${missing.join(", ")}`, cause);
    this.name = "ConfigurationMissingError";
  }
}

export class VersionUnavailableError extends BuildpackError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "VersionUnavailableError";
  }
}

export class ArtifactUnavailableError extends BuildpackError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ArtifactUnavailableError";
  }
}

export class CompileFailedError extends BuildpackError {
  constructor(
    public readonly errors: BuildError[],
    public readonly errorFile: string,
    cause?: unknown,
  ) {
    super(`Model compiler failed with ${errors.length} problem(s)`, cause);
    this.name = "CompileFailedError";
  }
}

export class AssemblyFailedError extends BuildpackError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "AssemblyFailedError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  version: "VERSION_ERROR",
  artifact: "ARTIFACT_ERROR",
  compile: "COMPILE_ERROR",
  assembly: "ASSEMBLY_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

// =============================================================================
// MAPPING
// =============================================================================

export function toUserFacingError(error: unknown): unknown {
  if (error instanceof UserFacingError) return error;

  if (error instanceof ConfigurationMissingError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Required configuration missing.",
      message: error.message,
      hint: "Bind a database service or set DATABASE_URL, and set ADMIN_PASSWORD.",
      cause: error,
    });
  }

  if (error instanceof VersionUnavailableError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.version,
      title: "Runtime version could not be determined.",
      message: error.message,
      hint: "Push a deployment package with model/metadata.json or a project with one .mpr file.",
      cause: error,
    });
  }

  if (error instanceof ArtifactUnavailableError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.artifact,
      title: "Artifact download failed.",
      message: error.message,
      hint: "Check BLOBSTORE and any FORCED_*_URL overrides.",
      cause: error,
    });
  }

  if (error instanceof CompileFailedError) {
    const first = error.errors[0];
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.compile,
      title: "Model compilation failed.",
      message: first ? `${error.message}: ${first.message}` : error.message,
      hint: "Fix the reported problems in the project and push again.",
      cause: error,
    });
  }

  if (error instanceof AssemblyFailedError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.assembly,
      title: "Target directory assembly failed.",
      message: error.message,
      cause: error,
    });
  }

  return error;
}
