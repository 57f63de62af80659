import type { Diagnostic } from "./types/manifest.js";

export type ManifestErrorCode =
  | "DIRECTORY_NOT_FOUND"
  | "VERSION_NOT_FOUND"
  | "SIGNING_FAILED"
  | "NO_PLATFORMS_RESOLVED";

export class ManifestError extends Error {
  constructor(
    readonly code: ManifestErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "ManifestError";
  }
}

export class DirectoryNotFoundError extends ManifestError {
  constructor(readonly directory: string) {
    super("DIRECTORY_NOT_FOUND", `Bundle directory not found: ${directory}`);
    this.name = "DirectoryNotFoundError";
  }
}

export class VersionNotFoundError extends ManifestError {
  constructor(
    readonly projectRoot: string,
    readonly reasons: string[],
  ) {
    const detail = reasons.length > 0 ? ` (${reasons.join("; ")})` : "";
    super("VERSION_NOT_FOUND", `Could not resolve a release version in ${projectRoot}${detail}`);
    this.name = "VersionNotFoundError";
  }
}

export class SigningFailedError extends ManifestError {
  constructor(
    readonly artifact: string,
    readonly reason: string,
  ) {
    super("SIGNING_FAILED", `Failed to sign ${artifact}: ${reason}`);
    this.name = "SigningFailedError";
  }
}

export class NoPlatformsResolvedError extends ManifestError {
  constructor(readonly diagnostics: Diagnostic[]) {
    super("NO_PLATFORMS_RESOLVED", "No artifact was classified and signed; refusing to emit an empty manifest");
    this.name = "NoPlatformsResolvedError";
  }
}

export function isManifestError(err: unknown): err is ManifestError {
  return err instanceof ManifestError;
}

/** Best-effort message for an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
