import { valid } from "semver";
import { VersionNotFoundError } from "../errors.js";
import { DEFAULT_VERSION_PRECEDENCE } from "../types/version.js";
import type { MetadataReader, MetadataVersion, VersionSource } from "../types/version.js";
import { createFsMetadataReader } from "./metadata-reader.js";

export type ResolveVersionOptions = {
  reader?: MetadataReader;
  /** Sources in the order they are consulted. Defaults to native, then js. */
  precedence?: readonly VersionSource[];
};

export type ResolvedVersion = {
  version: string;
  source: VersionSource;
  file: string;
};

function readSource(reader: MetadataReader, source: VersionSource, projectRoot: string) {
  return source === "native" ? reader.readNativeVersion(projectRoot) : reader.readJsVersion(projectRoot);
}

function checkVersion(found: MetadataVersion): { version: string } | { reason: string } {
  if (found.error) return { reason: `${found.file}: ${found.error}` };
  const version = found.version?.trim();
  if (!version) return { reason: `${found.file}: no version field` };
  if (!valid(version)) return { reason: `${found.file}: malformed version '${version}'` };
  return { version };
}

/**
 * Resolve the release version, reporting which descriptor it came from.
 *
 * Sources are tried in precedence order; the first one with a valid semantic
 * version wins. Empty and malformed values are skipped rather than emitted.
 */
export async function resolveVersionDetailed(
  projectRoot: string,
  opts: ResolveVersionOptions = {},
): Promise<ResolvedVersion> {
  const reader = opts.reader ?? createFsMetadataReader();
  const precedence = opts.precedence ?? DEFAULT_VERSION_PRECEDENCE;
  const reasons: string[] = [];

  for (const source of precedence) {
    const found = await readSource(reader, source, projectRoot);
    if (!found) {
      reasons.push(`${source}: no descriptor`);
      continue;
    }

    const checked = checkVersion(found);
    if ("reason" in checked) {
      reasons.push(`${source}: ${checked.reason}`);
      continue;
    }

    return { version: checked.version, source, file: found.file };
  }

  throw new VersionNotFoundError(projectRoot, reasons);
}

export async function resolveVersion(projectRoot: string, opts: ResolveVersionOptions = {}): Promise<string> {
  const resolved = await resolveVersionDetailed(projectRoot, opts);
  return resolved.version;
}
