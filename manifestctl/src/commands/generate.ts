import fs from "node:fs";
import path from "node:path";
import { assemble, type Clock } from "../assembler/assembler.js";
import { serializeManifest } from "../assembler/manifest-builder.js";
import { deepMerge, loadConfig, type RawConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { NoPlatformsResolvedError, errorMessage, isManifestError } from "../errors.js";
import { MANIFEST_SCHEMA, createRegistry, type SchemaCheck } from "../schema/registry.js";
import { createSidecarSigner } from "../signer/sidecar.js";
import { createKeySigner, type ArtifactSigner, type SigningPrimitive } from "../signer/signer.js";
import type { ManifestctlConfig } from "../types/config.js";
import type { AssemblyResult, Diagnostic, ReleaseManifest } from "../types/manifest.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { diag } from "./output.js";

export type GenerateOptions = {
  configDir?: string;
  env?: string;
  /** Values from command-line flags; they win over every config layer. */
  overrides?: Partial<ManifestctlConfig>;
  notesFile?: string;
  /** Return the manifest without writing the output file. */
  dryRun?: boolean;
  /** Base for relative paths in config. Defaults to process.cwd(). */
  cwd?: string;
  environment?: NodeJS.ProcessEnv;
  clock?: Clock;
  primitive?: SigningPrimitive;
  schemaDir?: string;
};

export type GenerateResult =
  | { ok: true; manifest: ReleaseManifest; outputPath: string | null; diagnostics: Diagnostic[] }
  | { ok: false; error: Diagnostic; diagnostics: Diagnostic[]; exitCode: ExitCode };

function fail(error: Diagnostic, exitCode: ExitCode, diagnostics: Diagnostic[] = []): GenerateResult {
  return { ok: false, error, diagnostics, exitCode };
}

function definedOnly(values: Partial<ManifestctlConfig>): RawConfig {
  return Object.fromEntries(Object.entries(values).filter(([, v]) => v !== undefined));
}

function buildSigner(config: ManifestctlConfig, cwd: string, primitive?: SigningPrimitive): ArtifactSigner | Diagnostic {
  if (config.signing_mode === "sidecar") return createSidecarSigner();

  if (!config.private_key_path) {
    return diag("error", "KEY_MISSING", "A private key is required in key signing mode (--key or private_key_path)");
  }
  return createKeySigner(
    { path: path.resolve(cwd, config.private_key_path), password: config.private_key_password },
    primitive,
  );
}

/**
 * Generate the update manifest: load config, assemble, validate against the
 * manifest schema, then write it.
 */
export async function generate(opts: GenerateOptions = {}): Promise<GenerateResult> {
  const cwd = opts.cwd ?? process.cwd();

  let raw: RawConfig;
  try {
    raw = deepMerge(loadConfig(opts.env, opts.configDir, opts.environment), definedOnly(opts.overrides ?? {}));
  } catch (e) {
    return fail(diag("error", "CONFIG_READ_FAILED", `Failed to read config: ${errorMessage(e)}`), EXIT.INVALID_ARGS);
  }

  const checked = await validateConfig(raw);
  if (!checked.valid) {
    return fail(diag("error", "CONFIG_INVALID", `Config invalid: ${checked.errors}`), EXIT.INVALID_ARGS);
  }
  const config = checked.config;

  if (!config.download_base_url) {
    return fail(
      diag("error", "BASE_URL_MISSING", "A download base URL is required (--base-url or download_base_url)"),
      EXIT.INVALID_ARGS,
    );
  }

  let notes = config.notes;
  if (opts.notesFile) {
    try {
      notes = fs.readFileSync(path.resolve(cwd, opts.notesFile), "utf8").trim();
    } catch (e) {
      return fail(
        diag("error", "NOTES_READ_FAILED", `Failed to read notes file: ${errorMessage(e)}`, { path: opts.notesFile }),
        EXIT.INVALID_ARGS,
      );
    }
  }

  const signer = buildSigner(config, cwd, opts.primitive);
  if (typeof signer !== "function") return fail(signer, EXIT.INVALID_ARGS);

  let assembled: AssemblyResult;
  try {
    assembled = await assemble({
      bundleDir: path.resolve(cwd, config.bundle_dir),
      downloadBaseUrl: config.download_base_url,
      notes,
      projectRoot: path.resolve(cwd, config.project_root),
      signer,
      versionPrecedence: config.version_precedence,
      concurrency: config.signing_concurrency,
      exclude: config.exclude,
      clock: opts.clock,
    });
  } catch (e) {
    if (e instanceof NoPlatformsResolvedError) {
      return fail(diag("error", e.code, e.message), EXIT.NO_PLATFORMS, e.diagnostics);
    }
    if (isManifestError(e)) {
      return fail(diag("error", e.code, e.message), EXIT.GENERATION_FAILED);
    }
    return fail(diag("error", "GENERATE_FAILED", errorMessage(e)), EXIT.GENERATION_FAILED);
  }

  const { manifest, diagnostics } = assembled;
  let check: SchemaCheck;
  try {
    const registry = await createRegistry(opts.schemaDir);
    check = await registry.validate(MANIFEST_SCHEMA, manifest);
  } catch (e) {
    return fail(
      diag("error", "SCHEMA_LOAD_FAILED", `Failed to load manifest schema: ${errorMessage(e)}`),
      EXIT.GENERATION_FAILED,
      diagnostics,
    );
  }
  if (!check.valid) {
    return fail(
      diag("error", "MANIFEST_INVALID", `Generated manifest failed validation: ${check.errors}`),
      EXIT.GENERATION_FAILED,
      diagnostics,
    );
  }

  if (opts.dryRun) {
    return { ok: true, manifest, outputPath: null, diagnostics };
  }

  const outputPath = path.resolve(cwd, config.output);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, serializeManifest(manifest), "utf8");

  return { ok: true, manifest, outputPath, diagnostics };
}
