#!/usr/bin/env node

import { Command } from "commander";
import { serializeManifest } from "./assembler/manifest-builder.js";
import { classifyFiles } from "./commands/classify.js";
import { EXIT } from "./commands/exit-codes.js";
import { generate } from "./commands/generate.js";
import { reportDiagnostics, reportOk, type OutputFormat } from "./commands/output.js";
import { parsePrecedence, resolveVersionCommand } from "./commands/resolve-version.js";
import { validateAll } from "./commands/validate.js";
import type { VersionSource } from "./types/version.js";

const program = new Command();

program
  .name("manifestctl")
  .description("Assemble signed auto-update manifests from installer bundles")
  .version("0.1.0");

function parseInteger(value: string): number {
  return Number.parseInt(value, 10);
}

function precedenceOrExit(value: string | undefined): VersionSource[] | undefined {
  if (value === undefined) return undefined;
  const parsed = parsePrecedence(value);
  if (!parsed) {
    console.error(`Invalid --version-precedence '${value}': expected a comma-separated list of native, js`);
    process.exit(EXIT.INVALID_ARGS);
  }
  return parsed;
}

program
  .command("generate")
  .description("Scan a bundle directory, sign installers and write latest.json")
  .option("--config <path>", "Path to config directory (default: bundled config)")
  .option("--env <name>", "Config environment overlay (config/<name>.yaml)")
  .option("--bundle-dir <path>", "Directory containing built installers")
  .option("--project-root <path>", "Directory holding Cargo.toml / package.json")
  .option("--base-url <url>", "Download base URL for installers")
  .option("--notes <text>", "Release notes")
  .option("--notes-file <path>", "Read release notes from a file")
  .option("--key <path>", "Private signing key (PEM)")
  .option("--sidecar", "Use <installer>.sig files instead of signing with a key")
  .option("--version-precedence <list>", "Version sources in order, e.g. js,native")
  .option("--concurrency <n>", "Maximum signatures in flight", parseInteger)
  .option("--output <path>", "Where to write the manifest")
  .option("--stdout", "Print the manifest to stdout instead of writing it")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .option("--verbose", "Show informational diagnostics")
  .action(
    async (opts: {
      config?: string;
      env?: string;
      bundleDir?: string;
      projectRoot?: string;
      baseUrl?: string;
      notes?: string;
      notesFile?: string;
      key?: string;
      sidecar?: boolean;
      versionPrecedence?: string;
      concurrency?: number;
      output?: string;
      stdout?: boolean;
      format: OutputFormat;
      verbose?: boolean;
    }) => {
      // Diagnostics go to stderr when stdout carries the manifest.
      const format: OutputFormat = opts.stdout ? "human" : opts.format;

      const res = await generate({
        configDir: opts.config,
        env: opts.env,
        notesFile: opts.notesFile,
        dryRun: opts.stdout,
        overrides: {
          bundle_dir: opts.bundleDir,
          project_root: opts.projectRoot,
          download_base_url: opts.baseUrl,
          notes: opts.notes,
          private_key_path: opts.key,
          signing_mode: opts.sidecar ? "sidecar" : undefined,
          version_precedence: precedenceOrExit(opts.versionPrecedence),
          signing_concurrency: opts.concurrency,
          output: opts.output,
        },
      });

      reportDiagnostics(res.diagnostics, { format, verbose: opts.verbose });

      if (!res.ok) {
        reportDiagnostics([res.error], { format });
        process.exit(res.exitCode);
      }

      if (opts.stdout) {
        process.stdout.write(serializeManifest(res.manifest));
        return;
      }

      const platforms = Object.keys(res.manifest.platforms);
      if (format === "jsonl") {
        reportOk({ version: res.manifest.version, platforms, output: res.outputPath }, format);
      } else {
        console.log(`Wrote ${res.outputPath} (version ${res.manifest.version}; ${platforms.join(", ")})`);
      }
    },
  );

program
  .command("classify")
  .description("Show the platform key each installer filename maps to")
  .argument("<files...>", "Installer filenames or paths")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action((files: string[], opts: { format: OutputFormat }) => {
    for (const item of classifyFiles(files)) {
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify(item) + "\n");
      } else {
        console.log(`${item.file}\t${item.platform ?? "unrecognized"}`);
      }
    }
  });

program
  .command("resolve-version")
  .description("Print the release version resolved from project metadata")
  .option("--project-root <path>", "Project root", ".")
  .option("--version-precedence <list>", "Version sources in order, e.g. js,native")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (opts: { projectRoot: string; versionPrecedence?: string; format: OutputFormat }) => {
    const res = await resolveVersionCommand({
      projectRoot: opts.projectRoot,
      precedence: precedenceOrExit(opts.versionPrecedence),
    });

    if (!res.ok) {
      reportDiagnostics([{ level: "error", code: res.code, message: res.error }], { format: opts.format });
      process.exit(EXIT.GENERATION_FAILED);
    }

    if (opts.format === "jsonl") {
      reportOk({ ...res.resolved }, opts.format);
    } else {
      console.log(res.resolved.version);
    }
  });

program
  .command("validate")
  .description("Validate a manifest file and/or a config directory")
  .argument("[manifest]", "Path to a manifest JSON file")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config environment overlay")
  .option("--format <format>", "Output format: human|jsonl", "human")
  .action(async (manifest: string | undefined, opts: { config?: string; env?: string; format: OutputFormat }) => {
    if (!manifest && !opts.config) {
      console.error("Nothing to validate: pass a manifest path and/or --config");
      process.exit(EXIT.INVALID_ARGS);
    }

    const res = await validateAll({ manifestPath: manifest, configDir: opts.config, env: opts.env });
    if (!res.ok) {
      reportDiagnostics(res.errors, { format: opts.format });
      process.exit(EXIT.GENERATION_FAILED);
    }

    if (opts.format === "jsonl") {
      reportOk({ message: "OK" }, opts.format);
    } else {
      console.log("OK");
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.GENERATION_FAILED);
});
