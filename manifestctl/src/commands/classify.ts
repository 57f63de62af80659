import path from "node:path";
import { describeClassification } from "../platform/classifier.js";
import type { PlatformKey } from "../types/platform.js";

export type ClassifiedFile = {
  file: string;
  platform: PlatformKey | null;
  rule: string | null;
};

/** Classify each file by its basename; nothing is read from disk. */
export function classifyFiles(files: string[]): ClassifiedFile[] {
  return files.map((file) => ({ file, ...describeClassification(path.basename(file)) }));
}
