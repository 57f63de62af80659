import { createSchemaCompiler, type CompiledSchema } from "../schema/registry.js";
import type { ManifestctlConfig } from "../types/config.js";

const CONFIG_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: [
    "schema_version",
    "bundle_dir",
    "project_root",
    "output",
    "notes",
    "version_precedence",
    "signing_mode",
    "signing_concurrency",
    "exclude",
  ],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    bundle_dir: { type: "string", minLength: 1 },
    project_root: { type: "string", minLength: 1 },
    output: { type: "string", minLength: 1 },
    download_base_url: { type: "string", format: "uri" },
    notes: { type: "string" },
    version_precedence: {
      type: "array",
      items: { type: "string", enum: ["native", "js"] },
      minItems: 1,
      uniqueItems: true,
    },
    signing_mode: { type: "string", enum: ["key", "sidecar"] },
    private_key_path: { type: "string", minLength: 1 },
    private_key_password: { type: "string" },
    signing_concurrency: { type: "integer", minimum: 1 },
    exclude: { type: "array", items: { type: "string", minLength: 1 } },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: ManifestctlConfig; errors: null }
  | { valid: false; errors: string };

function isConfig(validate: CompiledSchema, data: unknown): data is ManifestctlConfig {
  return validate(data);
}

/** Validate a loaded config and narrow it to ManifestctlConfig. */
export async function validateConfig(raw: unknown): Promise<ConfigValidationResult> {
  const compiler = createSchemaCompiler();
  const validate = compiler.compile(CONFIG_SCHEMA);
  if (isConfig(validate, raw)) {
    return { valid: true, config: raw, errors: null };
  }
  return { valid: false, errors: compiler.errorsText(validate.errors) };
}
