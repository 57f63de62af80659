import type { PlatformKey } from "./platform.js";

/** Update manifest consumed by the auto-update client (`latest.json`). */
export type PlatformEntry = {
  /** Base64 signature over the installer bytes. */
  signature: string;
  url: string;
};

export type PlatformMap = Partial<Record<PlatformKey, PlatformEntry>>;

export type ReleaseManifest = {
  version: string;
  notes: string;
  /** RFC 3339, UTC, second precision. */
  pub_date: string;
  platforms: PlatformMap;
};

export type Artifact = {
  path: string;
  filename: string;
  platform: PlatformKey | null;
};

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type AssemblyResult = {
  manifest: ReleaseManifest;
  diagnostics: Diagnostic[];
};
