import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { validateAll } from "../src/commands/validate.js";
import { CONFIG_DIR } from "../src/config/loader.js";

const VALID_MANIFEST = {
  version: "1.0.0",
  notes: "Initial release",
  pub_date: "2025-08-10T14:15:22Z",
  platforms: {
    "windows-x86_64": { signature: "c2ln", url: "https://example.com/downloads/app.msi" },
  },
};

describe("manifestctl validate", () => {
  let tmpDir: string;

  function writeManifest(content: unknown): string {
    const file = path.join(tmpDir, "latest.json");
    fs.writeFileSync(file, typeof content === "string" ? content : JSON.stringify(content));
    return file;
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "manifestctl-validate-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("accepts a well-formed manifest", async () => {
    const res = await validateAll({ manifestPath: writeManifest(VALID_MANIFEST) });
    expect(res.ok).toBe(true);
  });

  it("fails when the manifest is missing", async () => {
    const res = await validateAll({ manifestPath: path.join(tmpDir, "missing.json") });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors.map((e) => e.code)).toEqual(["MANIFEST_MISSING"]);
  });

  it("fails on invalid JSON", async () => {
    const res = await validateAll({ manifestPath: writeManifest("{ not json") });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors.map((e) => e.code)).toEqual(["MANIFEST_JSON_INVALID"]);
  });

  it("rejects platform keys outside the closed set", async () => {
    const res = await validateAll({
      manifestPath: writeManifest({
        ...VALID_MANIFEST,
        platforms: { "windows-aarch64": { signature: "c2ln", url: "https://example.com/a.msi" } },
      }),
    });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors.map((e) => e.code)).toEqual(["MANIFEST_INVALID"]);
  });

  it("rejects an empty platforms map", async () => {
    const res = await validateAll({ manifestPath: writeManifest({ ...VALID_MANIFEST, platforms: {} }) });
    expect(res.ok).toBe(false);
  });

  it("rejects a pub_date that is not RFC 3339", async () => {
    const res = await validateAll({ manifestPath: writeManifest({ ...VALID_MANIFEST, pub_date: "yesterday" }) });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors[0].message).toMatch(/pub_date/);
  });

  it("rejects entries without a signature", async () => {
    const res = await validateAll({
      manifestPath: writeManifest({
        ...VALID_MANIFEST,
        platforms: { "linux-x86_64": { url: "https://example.com/app.AppImage" } },
      }),
    });
    expect(res.ok).toBe(false);
  });

  it("validates the bundled config directory", async () => {
    const res = await validateAll({ configDir: CONFIG_DIR, env: "ci" });
    expect(res.ok).toBe(true);
  });

  it("fails when the config dir is missing", async () => {
    const res = await validateAll({ configDir: path.join(tmpDir, "definitely-not-exist") });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors.map((e) => e.message).join("\n")).toMatch(/Config directory not found/);
  });

  it("reports an invalid config file", async () => {
    fs.writeFileSync(path.join(tmpDir, "base.yaml"), "bundle_dir: bundle\nsigning_mode: gpg\n");
    const res = await validateAll({ configDir: tmpDir });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.errors.map((e) => e.code)).toEqual(["CONFIG_INVALID"]);
  });
});
