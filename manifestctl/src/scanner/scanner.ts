import fs from "node:fs";
import path from "node:path";
import { DirectoryNotFoundError } from "../errors.js";

export type DirEntry = {
  name: string;
  isFile: boolean;
};

/** Lists the immediate entries of a directory. */
export interface DirectoryLister {
  /** Throws DirectoryNotFoundError when the path is missing or not a directory. */
  list(directory: string): AsyncIterable<DirEntry>;
}

function isMissingOrNotDir(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return err.code === "ENOENT" || err.code === "ENOTDIR";
}

/** Whether a symlink resolves to a regular file. Dangling links do not. */
async function isFileTarget(linkPath: string): Promise<boolean> {
  try {
    return (await fs.promises.stat(linkPath)).isFile();
  } catch (e) {
    if (isMissingOrNotDir(e)) return false;
    throw e;
  }
}

/** Lazily reads a directory with fs.opendir; symlinks count as what they point to. */
export const fsDirectoryLister: DirectoryLister = {
  async *list(directory) {
    let dir: fs.Dir;
    try {
      dir = await fs.promises.opendir(directory);
    } catch (e) {
      if (isMissingOrNotDir(e)) throw new DirectoryNotFoundError(directory);
      throw e;
    }

    for await (const entry of dir) {
      const isFile = entry.isSymbolicLink()
        ? await isFileTarget(path.join(directory, entry.name))
        : entry.isFile();
      yield { name: entry.name, isFile };
    }
  },
};

/**
 * Yield the path of every regular file directly inside `directory`.
 *
 * Subdirectories are not entered and nothing is filtered by extension.
 * Order follows the lister; callers sort when order matters.
 */
export async function* scanBundleDir(
  directory: string,
  lister: DirectoryLister = fsDirectoryLister,
): AsyncGenerator<string> {
  for await (const entry of lister.list(directory)) {
    if (!entry.isFile) continue;
    yield path.join(directory, entry.name);
  }
}

/** Collect the whole scan into an array. */
export async function scanAll(directory: string, lister?: DirectoryLister): Promise<string[]> {
  const out: string[] = [];
  for await (const file of scanBundleDir(directory, lister)) {
    out.push(file);
  }
  return out;
}
