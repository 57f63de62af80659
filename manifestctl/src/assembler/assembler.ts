import path from "node:path";
import { minimatch } from "minimatch";
import pMap from "p-map";
import { NoPlatformsResolvedError, SigningFailedError } from "../errors.js";
import { classify } from "../platform/classifier.js";
import { scanBundleDir, type DirectoryLister } from "../scanner/scanner.js";
import type { ArtifactSigner } from "../signer/signer.js";
import type { Artifact, AssemblyResult, Diagnostic, PlatformEntry } from "../types/manifest.js";
import type { PlatformKey } from "../types/platform.js";
import type { MetadataReader, VersionSource } from "../types/version.js";
import { resolveVersion } from "../version/resolver.js";
import { buildDownloadUrl, buildManifest } from "./manifest-builder.js";

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };

export const DEFAULT_SIGNING_CONCURRENCY = 4;

/** Whole number of signatures in flight: at least 1, the default when not finite. */
export function signingConcurrency(requested?: number): number {
  if (requested === undefined || !Number.isFinite(requested)) return DEFAULT_SIGNING_CONCURRENCY;
  return Math.max(1, Math.floor(requested));
}

export type AssembleOptions = {
  bundleDir: string;
  downloadBaseUrl: string;
  notes: string;
  /** Where project descriptors are looked up. */
  projectRoot: string;
  signer: ArtifactSigner;
  versionPrecedence?: readonly VersionSource[];
  metadataReader?: MetadataReader;
  lister?: DirectoryLister;
  clock?: Clock;
  /** Maximum signatures in flight. 1 signs sequentially. */
  concurrency?: number;
  /** Glob patterns (matched against the filename) to leave out before classification. */
  exclude?: string[];
};

type Candidate = Artifact & { platform: PlatformKey };

type SignOutcome =
  | { ok: true; artifact: Candidate; signature: string }
  | { ok: false; artifact: Candidate; error: SigningFailedError };

function byFilename(a: Artifact, b: Artifact): number {
  if (a.filename < b.filename) return -1;
  if (a.filename > b.filename) return 1;
  return 0;
}

async function discoverArtifacts(opts: AssembleOptions): Promise<Artifact[]> {
  const exclude = opts.exclude ?? [];
  const artifacts: Artifact[] = [];

  for await (const filePath of scanBundleDir(opts.bundleDir, opts.lister)) {
    const filename = path.basename(filePath);
    if (exclude.some((pattern) => minimatch(filename, pattern, { dot: true }))) continue;
    artifacts.push({ path: filePath, filename, platform: classify(filename) });
  }

  return artifacts.sort(byFilename);
}

async function signOne(signer: ArtifactSigner, artifact: Candidate): Promise<SignOutcome> {
  try {
    return { ok: true, artifact, signature: await signer(artifact.path) };
  } catch (e) {
    if (e instanceof SigningFailedError) return { ok: false, artifact, error: e };
    throw e;
  }
}

/**
 * Assemble the update manifest for one bundle directory.
 *
 * Algorithm:
 * 1. Resolve the version (fatal on failure)
 * 2. Scan the bundle directory (fatal when missing) and sort by filename
 * 3. Group recognized artifacts by platform key, keeping sorted order
 * 4. Sign in rounds: each round signs the next candidate of every platform
 *    still without an entry. The first candidate in sorted order that signs
 *    successfully wins; later candidates are dropped as duplicates.
 * 5. Stamp pub_date and build the document; fail if no platform resolved
 */
export async function assemble(opts: AssembleOptions): Promise<AssemblyResult> {
  const version = await resolveVersion(opts.projectRoot, {
    reader: opts.metadataReader,
    precedence: opts.versionPrecedence,
  });

  const artifacts = await discoverArtifacts(opts);
  const diagnostics: Diagnostic[] = [];
  const candidates = new Map<PlatformKey, Candidate[]>();

  for (const artifact of artifacts) {
    const { platform } = artifact;
    if (!platform) {
      diagnostics.push({
        level: "info",
        code: "UNRECOGNIZED_ARTIFACT",
        message: `Skipping unrecognized artifact: ${artifact.filename}`,
        path: artifact.path,
      });
      continue;
    }
    const queue = candidates.get(platform) ?? [];
    queue.push({ ...artifact, platform });
    candidates.set(platform, queue);
  }

  const entries = new Map<PlatformKey, PlatformEntry>();
  const attempted = new Set<Candidate>();
  const concurrency = signingConcurrency(opts.concurrency);

  for (let round = 0; ; round++) {
    const batch: Candidate[] = [];
    for (const [platform, queue] of candidates) {
      if (!entries.has(platform) && round < queue.length) batch.push(queue[round]);
    }
    if (batch.length === 0) break;

    // Merge in sorted-filename order, never completion order.
    batch.sort(byFilename);
    for (const artifact of batch) attempted.add(artifact);
    const outcomes = await pMap(batch, (artifact) => signOne(opts.signer, artifact), { concurrency });

    for (const outcome of outcomes) {
      const { artifact } = outcome;
      if (!outcome.ok) {
        diagnostics.push({
          level: "warn",
          code: "SIGNING_FAILED",
          message: outcome.error.message,
          path: artifact.path,
          details: { platform: artifact.platform, reason: outcome.error.reason },
        });
        continue;
      }
      entries.set(artifact.platform, {
        signature: outcome.signature,
        url: buildDownloadUrl(opts.downloadBaseUrl, artifact.filename),
      });
    }
  }

  for (const [platform, queue] of candidates) {
    for (const artifact of queue) {
      if (attempted.has(artifact)) continue;
      diagnostics.push({
        level: "info",
        code: "DUPLICATE_PLATFORM",
        message: `Dropping ${artifact.filename}: ${platform} already provided by an earlier artifact`,
        path: artifact.path,
        details: { platform },
      });
    }
  }

  if (entries.size === 0) {
    throw new NoPlatformsResolvedError(diagnostics);
  }

  const manifest = buildManifest({
    version,
    notes: opts.notes,
    pubDate: (opts.clock ?? systemClock).now(),
    platforms: entries,
  });

  return { manifest, diagnostics };
}
