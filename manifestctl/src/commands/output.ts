import type { Diagnostic } from "../types/manifest.js";

export type OutputFormat = "human" | "jsonl";

export type ReportOptions = {
  format: OutputFormat;
  /** Include info-level diagnostics in human output. */
  verbose?: boolean;
};

export function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">,
): Diagnostic {
  return { level, code, message, ...extra };
}

/** Print diagnostics: one JSON object per line, or messages on stderr. */
export function reportDiagnostics(diagnostics: Diagnostic[], opts: ReportOptions): void {
  for (const d of diagnostics) {
    if (opts.format === "jsonl") {
      process.stdout.write(JSON.stringify(d) + "\n");
    } else if (d.level !== "info" || opts.verbose) {
      console.error(`${d.level}: ${d.message}`);
    }
  }
}

/** Final status line in jsonl mode. */
export function reportOk(fields: Record<string, unknown>, format: OutputFormat): void {
  if (format === "jsonl") {
    process.stdout.write(JSON.stringify({ level: "info", code: "OK", ...fields }) + "\n");
  }
}
