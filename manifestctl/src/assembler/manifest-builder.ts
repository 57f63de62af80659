import type { PlatformEntry, PlatformMap, ReleaseManifest } from "../types/manifest.js";
import type { PlatformKey } from "../types/platform.js";

export type ManifestBuildInput = {
  version: string;
  notes: string;
  pubDate: Date;
  platforms: ReadonlyMap<PlatformKey, PlatformEntry>;
};

/** RFC 3339 in UTC with second precision, e.g. 2025-08-10T14:15:22Z. */
export function formatPubDate(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/** Join a download base URL and a filename with exactly one slash. */
export function buildDownloadUrl(baseUrl: string, filename: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/${filename}`;
}

/**
 * Build the manifest document.
 * Field order is fixed and platform keys are emitted sorted, so identical
 * inputs always serialize to identical JSON.
 */
export function buildManifest(input: ManifestBuildInput): ReleaseManifest {
  const platforms: PlatformMap = {};
  for (const key of [...input.platforms.keys()].sort()) {
    const entry = input.platforms.get(key);
    if (entry) platforms[key] = { signature: entry.signature, url: entry.url };
  }

  return {
    version: input.version,
    notes: input.notes,
    pub_date: formatPubDate(input.pubDate),
    platforms,
  };
}

/** Serialize a manifest the way it is written to disk. */
export function serializeManifest(manifest: ReleaseManifest): string {
  return JSON.stringify(manifest, null, 2) + "\n";
}
