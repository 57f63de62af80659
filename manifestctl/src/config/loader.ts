import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

export const ENV_PREFIX = "MANIFESTCTL_";

/** Config keys that may be set through the environment; other MANIFESTCTL_* variables are ignored. */
export const ENV_KEYS: ReadonlySet<string> = new Set([
  "schema_version",
  "bundle_dir",
  "project_root",
  "output",
  "download_base_url",
  "notes",
  "version_precedence",
  "signing_mode",
  "private_key_path",
  "private_key_password",
  "signing_concurrency",
  "exclude",
]);

/** Keys whose environment override is parsed rather than taken verbatim. */
const NUMERIC_KEYS = new Set(["signing_concurrency"]);
const LIST_KEYS = new Set(["version_precedence", "exclude"]);

export type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: RawConfig, override: RawConfig): RawConfig {
  const result: RawConfig = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isRecord(val) && isRecord(prev)) {
      result[key] = deepMerge(prev, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file as an object; missing or empty files yield {}. */
function loadYaml(filePath: string): RawConfig {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

function parseEnvValue(key: string, value: string): unknown {
  if (NUMERIC_KEYS.has(key)) return Number(value);
  if (LIST_KEYS.has(key)) {
    return value
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  }
  return value;
}

/** MANIFESTCTL_PRIVATE_KEY_PATH → private_key_path. */
function envOverrides(env: NodeJS.ProcessEnv): RawConfig {
  const out: RawConfig = {};
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const configKey = key.slice(ENV_PREFIX.length).toLowerCase();
    if (!ENV_KEYS.has(configKey)) continue;
    out[configKey] = parseEnvValue(configKey, value);
  }
  return out;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← MANIFESTCTL_* variables.
 * The result is unvalidated; see validateConfig.
 */
export function loadConfig(envName?: string, configDir: string = CONFIG_DIR, env: NodeJS.ProcessEnv = process.env): RawConfig {
  let merged = loadYaml(path.join(configDir, "base.yaml"));

  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(configDir, `${envName}.yaml`)));
  }

  return deepMerge(merged, envOverrides(env));
}
