export { classify, describeClassification, CLASSIFICATION_RULES } from "./platform/classifier.js";
export { resolveVersion, resolveVersionDetailed } from "./version/resolver.js";
export type { ResolveVersionOptions, ResolvedVersion } from "./version/resolver.js";
export { createFsMetadataReader } from "./version/metadata-reader.js";
export { signArtifact, createKeySigner, nodeSigningPrimitive } from "./signer/signer.js";
export type { ArtifactSigner, SigningPrimitive } from "./signer/signer.js";
export { loadSigningKey } from "./signer/keys.js";
export type { SigningKeySource } from "./signer/keys.js";
export { createSidecarSigner } from "./signer/sidecar.js";
export { scanBundleDir, scanAll, fsDirectoryLister } from "./scanner/scanner.js";
export type { DirectoryLister, DirEntry } from "./scanner/scanner.js";
export { assemble, systemClock } from "./assembler/assembler.js";
export type { AssembleOptions, Clock } from "./assembler/assembler.js";
export { buildManifest, formatPubDate, serializeManifest } from "./assembler/manifest-builder.js";
export { generate } from "./commands/generate.js";
export type { GenerateOptions, GenerateResult } from "./commands/generate.js";
export {
  ManifestError,
  DirectoryNotFoundError,
  VersionNotFoundError,
  SigningFailedError,
  NoPlatformsResolvedError,
} from "./errors.js";
export { PLATFORM_KEYS } from "./types/platform.js";
export type { PlatformKey } from "./types/platform.js";
export type { ReleaseManifest, PlatformEntry, PlatformMap, Artifact, Diagnostic, AssemblyResult } from "./types/manifest.js";
export type { VersionSource, MetadataReader, MetadataVersion } from "./types/version.js";
export type { ManifestctlConfig, SigningMode } from "./types/config.js";
