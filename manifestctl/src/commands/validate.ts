import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { errorMessage } from "../errors.js";
import { MANIFEST_SCHEMA, createRegistry } from "../schema/registry.js";
import type { Diagnostic } from "../types/manifest.js";
import { diag } from "./output.js";

export type ValidateResult = { ok: true } | { ok: false; errors: Diagnostic[] };

async function validateManifestFile(manifestPath: string, schemaDir?: string): Promise<Diagnostic[]> {
  if (!fs.existsSync(manifestPath)) {
    return [diag("error", "MANIFEST_MISSING", `Manifest not found: ${manifestPath}`, { path: manifestPath })];
  }

  let manifest: unknown;
  try {
    manifest = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
  } catch (e) {
    return [
      diag(
        "error",
        "MANIFEST_JSON_INVALID",
        `Invalid JSON manifest (${path.relative(process.cwd(), manifestPath)}): ${errorMessage(e)}`,
        { path: manifestPath },
      ),
    ];
  }

  const registry = await createRegistry(schemaDir);
  const { valid, errors } = await registry.validate(MANIFEST_SCHEMA, manifest);
  if (valid) return [];
  return [
    diag(
      "error",
      "MANIFEST_INVALID",
      `Manifest invalid (${path.relative(process.cwd(), manifestPath)}): ${errors}`,
      { path: manifestPath },
    ),
  ];
}

async function validateConfigLayers(configDir: string, env?: string): Promise<Diagnostic[]> {
  if (!fs.existsSync(configDir)) {
    return [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`, { path: configDir })];
  }

  try {
    const checked = await validateConfig(loadConfig(env, configDir));
    if (checked.valid) return [];
    return [diag("error", "CONFIG_INVALID", `Config invalid: ${checked.errors}`, { path: configDir })];
  } catch (e) {
    return [diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${errorMessage(e)}`, { path: configDir })];
  }
}

/** Validate a manifest file and/or a config directory. */
export async function validateAll(opts: {
  manifestPath?: string;
  configDir?: string;
  env?: string;
  schemaDir?: string;
}): Promise<ValidateResult> {
  const errors: Diagnostic[] = [];

  if (opts.configDir) {
    errors.push(...(await validateConfigLayers(path.resolve(opts.configDir), opts.env)));
  }
  if (opts.manifestPath) {
    errors.push(...(await validateManifestFile(path.resolve(opts.manifestPath), opts.schemaDir)));
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true };
}
