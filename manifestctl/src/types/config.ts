import type { VersionSource } from "./version.js";

/** Configuration types — layered config system (base.yaml ← env.yaml ← env vars ← flags). */
export type SigningMode = "key" | "sidecar";

export type ManifestctlConfig = {
  schema_version: string;
  bundle_dir: string;
  project_root: string;
  output: string;
  download_base_url?: string;
  notes: string;
  version_precedence: VersionSource[];
  signing_mode: SigningMode;
  private_key_path?: string;
  private_key_password?: string;
  signing_concurrency: number;
  exclude: string[];
};
