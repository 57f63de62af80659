import type { PlatformKey } from "../types/platform.js";

/** Architecture markers that identify an Apple-silicon build. */
const ARM_MARKERS = ["aarch64", "arm64"];

export type ClassificationRule = {
  id: string;
  description: string;
  match: (filename: string) => PlatformKey | null;
};

function hasArmMarker(filename: string): boolean {
  return ARM_MARKERS.some((marker) => filename.includes(marker));
}

/**
 * Classification rules, in precedence order (first match wins).
 * Extensions are matched case-sensitively, as bundlers emit them.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    id: "windows-installer",
    description: ".msi or .exe",
    match: (f) => (f.endsWith(".msi") || f.endsWith(".exe") ? "windows-x86_64" : null),
  },
  {
    id: "linux-appimage",
    description: ".AppImage",
    match: (f) => (f.endsWith(".AppImage") ? "linux-x86_64" : null),
  },
  {
    id: "macos-dmg",
    description: ".dmg (arm64/aarch64 marker selects Apple silicon)",
    match: (f) => {
      if (!f.endsWith(".dmg")) return null;
      return hasArmMarker(f) ? "darwin-aarch64" : "darwin-x86_64";
    },
  },
  {
    id: "macos-arm-tarball",
    description: ".tar.gz with arm64/aarch64 marker",
    match: (f) => (f.endsWith(".tar.gz") && hasArmMarker(f) ? "darwin-aarch64" : null),
  },
];

export type ClassificationResult = {
  platform: PlatformKey | null;
  rule: string | null;
};

/** Classify a filename and report which rule matched. */
export function describeClassification(filename: string): ClassificationResult {
  for (const rule of CLASSIFICATION_RULES) {
    const platform = rule.match(filename);
    if (platform) return { platform, rule: rule.id };
  }
  return { platform: null, rule: null };
}

/**
 * Map an installer filename to its platform key.
 * Returns null for anything that is not a recognized installer.
 */
export function classify(filename: string): PlatformKey | null {
  return describeClassification(filename).platform;
}
