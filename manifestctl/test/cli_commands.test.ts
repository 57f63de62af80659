import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { classifyFiles } from "../src/commands/classify.js";
import { EXIT } from "../src/commands/exit-codes.js";
import { diag } from "../src/commands/output.js";
import { parsePrecedence, resolveVersionCommand } from "../src/commands/resolve-version.js";

describe("exit-codes", () => {
  it("defines all exit codes", () => {
    expect(EXIT.SUCCESS).toBe(0);
    expect(EXIT.GENERATION_FAILED).toBe(1);
    expect(EXIT.INVALID_ARGS).toBe(2);
    expect(EXIT.NO_PLATFORMS).toBe(3);
  });
});

describe("classify command", () => {
  it("classifies by basename", () => {
    expect(classifyFiles(["out/dmg/app_arm64.dmg", "notes.txt"])).toEqual([
      { file: "out/dmg/app_arm64.dmg", platform: "darwin-aarch64", rule: "macos-dmg" },
      { file: "notes.txt", platform: null, rule: null },
    ]);
  });
});

describe("version precedence parsing", () => {
  it("parses a comma-separated list", () => {
    expect(parsePrecedence("js,native")).toEqual(["js", "native"]);
    expect(parsePrecedence(" native ")).toEqual(["native"]);
  });

  it("rejects unknown or empty lists", () => {
    expect(parsePrecedence("js,python")).toBeNull();
    expect(parsePrecedence(",")).toBeNull();
  });
});

describe("resolve-version command", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "manifestctl-resolve-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("returns the version and its source", async () => {
    fs.writeFileSync(path.join(root, "package.json"), JSON.stringify({ version: "5.0.0-beta.1" }));

    const res = await resolveVersionCommand({ projectRoot: root });
    expect(res).toEqual({ ok: true, resolved: { version: "5.0.0-beta.1", source: "js", file: "package.json" } });
  });

  it("returns VERSION_NOT_FOUND for an empty project", async () => {
    const res = await resolveVersionCommand({ projectRoot: root });
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.code).toBe("VERSION_NOT_FOUND");
  });
});

describe("diagnostics", () => {
  it("builds diagnostic records", () => {
    expect(diag("warn", "SIGNING_FAILED", "boom", { path: "/a.msi" })).toEqual({
      level: "warn",
      code: "SIGNING_FAILED",
      message: "boom",
      path: "/a.msi",
    });
  });
});
