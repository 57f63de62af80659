import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { MANIFEST_SCHEMA, SchemaRegistry, createRegistry } from "../src/schema/registry.js";
import { PLATFORM_KEYS } from "../src/index.js";

const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

describe("schema registry", () => {
  it("discovers the update manifest schema", async () => {
    const registry = await createRegistry(SCHEMA_DIR);
    expect(registry.names()).toEqual([MANIFEST_SCHEMA]);
    expect(registry.get(MANIFEST_SCHEMA)?.version).toBe("1.0.0");
    expect(registry.get(MANIFEST_SCHEMA)?.filePath).toBe(path.join(SCHEMA_DIR, "update-manifest.schema.json"));
  });

  it("resolves the schema directory by default", async () => {
    const registry = await createRegistry();
    expect(registry.names()).toContain(MANIFEST_SCHEMA);
  });

  it("caches compiled validators", async () => {
    const registry = await createRegistry(SCHEMA_DIR);
    const first = await registry.getValidator(MANIFEST_SCHEMA);
    const second = await registry.getValidator(MANIFEST_SCHEMA);
    expect(second).toBe(first);
  });

  it("rejects unknown schema names", async () => {
    const registry = await createRegistry(SCHEMA_DIR);
    await expect(registry.validate("release-history", {})).rejects.toThrow("Schema not found: release-history");
  });

  it("fails to load a missing directory", async () => {
    const registry = new SchemaRegistry(path.join(SCHEMA_DIR, "missing"));
    await expect(registry.load()).rejects.toThrow(/Schema directory not found/);
  });

  it("rejects a schema file that is not a JSON object", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "manifestctl-schemas-"));
    try {
      fs.writeFileSync(path.join(dir, "broken.schema.json"), "[1, 2]");
      await expect(createRegistry(dir)).rejects.toThrow(
        `Schema must be a JSON object: ${path.join(dir, "broken.schema.json")}`,
      );
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("reports validation errors as text", async () => {
    const registry = await createRegistry(SCHEMA_DIR);
    const { valid, errors } = await registry.validate(MANIFEST_SCHEMA, { version: "1.0.0" });
    expect(valid).toBe(false);
    expect(errors).toContain("must have required property 'notes'");
  });

  it("accepts every platform key the classifier can produce", async () => {
    const registry = await createRegistry(SCHEMA_DIR);
    for (const key of PLATFORM_KEYS) {
      const manifest = {
        version: "1.0.0",
        notes: "",
        pub_date: "2025-08-10T14:15:22Z",
        platforms: { [key]: { signature: "c2ln", url: `https://example.com/${key}` } },
      };
      expect(await registry.validate(MANIFEST_SCHEMA, manifest)).toEqual({ valid: true, errors: null });
    }
  });
});
