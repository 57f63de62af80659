import path from "node:path";
import { errorMessage, isManifestError } from "../errors.js";
import type { MetadataReader, VersionSource } from "../types/version.js";
import { resolveVersionDetailed, type ResolvedVersion } from "../version/resolver.js";

export type ResolveVersionResult =
  | { ok: true; resolved: ResolvedVersion }
  | { ok: false; code: string; error: string };

const SOURCES: readonly VersionSource[] = ["native", "js"];

function isVersionSource(value: string): value is VersionSource {
  return (SOURCES as readonly string[]).includes(value);
}

/** Parse "js,native" into a precedence list, or null if any entry is unknown. */
export function parsePrecedence(value: string): VersionSource[] | null {
  const parts = value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  if (parts.length === 0) return null;

  const out: VersionSource[] = [];
  for (const part of parts) {
    if (!isVersionSource(part)) return null;
    out.push(part);
  }
  return out;
}

export async function resolveVersionCommand(opts: {
  projectRoot: string;
  precedence?: VersionSource[];
  reader?: MetadataReader;
}): Promise<ResolveVersionResult> {
  try {
    const resolved = await resolveVersionDetailed(path.resolve(opts.projectRoot), {
      precedence: opts.precedence,
      reader: opts.reader,
    });
    return { ok: true, resolved };
  } catch (e) {
    if (isManifestError(e)) return { ok: false, code: e.code, error: e.message };
    return { ok: false, code: "RESOLVE_FAILED", error: errorMessage(e) };
  }
}
