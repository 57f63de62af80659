import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";

export const SCHEMA_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../schemas");

export const MANIFEST_SCHEMA = "update-manifest";

export type CompiledSchema = ((data: unknown) => boolean) & { errors?: unknown };

/** The slice of Ajv this package relies on. */
export type SchemaCompiler = {
  compile: (schema: unknown) => CompiledSchema;
  errorsText: (errors: unknown) => string;
};

export type SchemaCheck = {
  valid: boolean;
  errors: string | null;
};

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: Record<string, unknown>;
};

/** Strict draft 2020-12 compiler with the date-time and uri formats. */
export function createSchemaCompiler(): SchemaCompiler {
  // Both packages are CommonJS with a `default` export; model the shape we use.
  const Compiler = Ajv2020 as unknown as { new (opts: unknown): SchemaCompiler };
  const withFormats = addFormats as unknown as (ajv: SchemaCompiler) => void;

  const compiler = new Compiler({ allErrors: true, strict: true });
  withFormats(compiler);
  return compiler;
}

export function check(compiler: SchemaCompiler, validate: CompiledSchema, data: unknown): SchemaCheck {
  if (validate(data)) return { valid: true, errors: null };
  return { valid: false, errors: compiler.errorsText(validate.errors) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** "…/update-manifest@1.0.0" → "1.0.0" */
function versionFromId(schema: Record<string, unknown>): string | undefined {
  if (typeof schema.$id !== "string") return undefined;
  return /@(\d+\.\d+\.\d+)$/.exec(schema.$id)?.[1];
}

/** Schemas found as `<name>.schema.json` in one directory, compiled on first use. */
export class SchemaRegistry {
  private readonly entries = new Map<string, SchemaEntry>();
  private readonly compiled = new Map<string, CompiledSchema>();
  private readonly compiler = createSchemaCompiler();

  constructor(private readonly schemaDir: string) {}

  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = (await fs.promises.readdir(this.schemaDir)).filter((f) => f.endsWith(".schema.json")).sort();
    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(await fs.promises.readFile(filePath, "utf8"));
      if (!isRecord(schema)) throw new Error(`Schema must be a JSON object: ${filePath}`);

      const name = file.slice(0, -".schema.json".length);
      this.entries.set(name, { name, version: versionFromId(schema) ?? "1.0.0", filePath, schema });
    }
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  async getValidator(name: string): Promise<CompiledSchema> {
    const cached = this.compiled.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);

    const validate = this.compiler.compile(entry.schema);
    this.compiled.set(name, validate);
    return validate;
  }

  async validate(name: string, data: unknown): Promise<SchemaCheck> {
    return check(this.compiler, await this.getValidator(name), data);
  }
}

export async function createRegistry(schemaDir: string = SCHEMA_DIR): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir);
  await registry.load();
  return registry;
}
