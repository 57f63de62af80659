import fs from "node:fs";
import path from "node:path";
import { parse as parseToml } from "smol-toml";
import { errorMessage } from "../errors.js";
import type { MetadataReader, MetadataVersion } from "../types/version.js";

/** Native descriptors, checked in order. Tauri keeps its crate under src-tauri/. */
const NATIVE_DESCRIPTORS = ["Cargo.toml", path.join("src-tauri", "Cargo.toml")];
const JS_DESCRIPTOR = "package.json";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Extract the crate version from a parsed Cargo.toml.
 * `version.workspace = true` defers to `[workspace.package]` in the same file.
 */
export function cargoVersion(doc: Record<string, unknown>): string | undefined {
  const pkg = doc.package;
  if (isRecord(pkg) && typeof pkg.version === "string") return pkg.version;

  const workspace = doc.workspace;
  if (isRecord(workspace) && isRecord(workspace.package) && typeof workspace.package.version === "string") {
    return workspace.package.version;
  }
  return undefined;
}

export function packageJsonVersion(doc: unknown): string | undefined {
  if (isRecord(doc) && typeof doc.version === "string") return doc.version;
  return undefined;
}

async function readDescriptor(
  projectRoot: string,
  file: string,
  extract: (raw: string) => string | undefined,
): Promise<MetadataVersion | undefined> {
  const fullPath = path.join(projectRoot, file);
  if (!fs.existsSync(fullPath)) return undefined;

  try {
    const raw = await fs.promises.readFile(fullPath, "utf8");
    return { file, version: extract(raw) };
  } catch (e) {
    return { file, error: errorMessage(e) };
  }
}

/** Metadata reader backed by Cargo.toml and package.json on disk. */
export function createFsMetadataReader(): MetadataReader {
  return {
    // A workspace-only root Cargo.toml carries no version; keep looking under src-tauri/.
    async readNativeVersion(projectRoot) {
      let last: MetadataVersion | undefined;
      for (const file of NATIVE_DESCRIPTORS) {
        const found = await readDescriptor(projectRoot, file, (raw) => cargoVersion(parseToml(raw)));
        if (!found) continue;
        if (found.version?.trim()) return found;
        last = found;
      }
      return last;
    },

    async readJsVersion(projectRoot) {
      return readDescriptor(projectRoot, JS_DESCRIPTOR, (raw) => packageJsonVersion(JSON.parse(raw)));
    },
  };
}
