/** Where a release version can be read from. */
export type VersionSource = "native" | "js";

export const DEFAULT_VERSION_PRECEDENCE: readonly VersionSource[] = ["native", "js"];

export type MetadataVersion = {
  /** Descriptor the value came from, relative to the project root. */
  file: string;
  version?: string;
  /** Set when the descriptor exists but could not be read or parsed. */
  error?: string;
};

/** Reads version fields from project descriptors. Missing descriptors yield undefined. */
export interface MetadataReader {
  readNativeVersion(projectRoot: string): Promise<MetadataVersion | undefined>;
  readJsVersion(projectRoot: string): Promise<MetadataVersion | undefined>;
}
