import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { DirectoryNotFoundError } from "../src/errors.js";
import { scanAll, scanBundleDir, type DirectoryLister } from "../src/scanner/scanner.js";

describe("artifact scanner", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "manifestctl-scan-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("yields every file one level deep without filtering", async () => {
    fs.writeFileSync(path.join(tmpDir, "app.msi"), "x");
    fs.writeFileSync(path.join(tmpDir, "notes.txt"), "x");
    fs.mkdirSync(path.join(tmpDir, "dmg"));
    fs.writeFileSync(path.join(tmpDir, "dmg", "app.dmg"), "x");

    const files = (await scanAll(tmpDir)).sort();
    expect(files).toEqual([path.join(tmpDir, "app.msi"), path.join(tmpDir, "notes.txt")]);
  });

  it("follows symlinks to files and skips dangling ones", async () => {
    const outside = fs.mkdtempSync(path.join(os.tmpdir(), "manifestctl-target-"));
    try {
      fs.writeFileSync(path.join(outside, "app_1.0.0_x64_en-US.msi"), "x");
      fs.symlinkSync(path.join(outside, "app_1.0.0_x64_en-US.msi"), path.join(tmpDir, "app_1.0.0_x64_en-US.msi"));
      fs.symlinkSync(path.join(outside, "gone.dmg"), path.join(tmpDir, "gone.dmg"));
      fs.symlinkSync(outside, path.join(tmpDir, "linked-dir"));

      expect(await scanAll(tmpDir)).toEqual([path.join(tmpDir, "app_1.0.0_x64_en-US.msi")]);
    } finally {
      fs.rmSync(outside, { recursive: true, force: true });
    }
  });

  it("yields nothing for an empty directory", async () => {
    expect(await scanAll(tmpDir)).toEqual([]);
  });

  it("fails with DirectoryNotFound for a missing path", async () => {
    const missing = path.join(tmpDir, "nope");
    const err = await scanAll(missing).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DirectoryNotFoundError);
    if (err instanceof DirectoryNotFoundError) {
      expect(err.code).toBe("DIRECTORY_NOT_FOUND");
      expect(err.directory).toBe(missing);
    }
  });

  it("fails with DirectoryNotFound when the path is a file", async () => {
    const file = path.join(tmpDir, "app.msi");
    fs.writeFileSync(file, "x");

    await expect(scanAll(file)).rejects.toBeInstanceOf(DirectoryNotFoundError);
  });

  it("is lazy and uses the injected lister", async () => {
    const listed: string[] = [];
    const lister: DirectoryLister = {
      async *list() {
        for (const name of ["b.exe", "sub", "a.dmg"]) {
          listed.push(name);
          yield { name, isFile: name !== "sub" };
        }
      },
    };

    const iter = scanBundleDir("/bundle", lister);
    const first = await iter.next();
    expect(first.value).toBe(path.join("/bundle", "b.exe"));
    expect(listed).toEqual(["b.exe"]);

    const rest: string[] = [];
    for await (const file of iter) rest.push(file);
    expect(rest).toEqual([path.join("/bundle", "a.dmg")]);
  });
});
