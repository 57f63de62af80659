/** Canonical platform identifiers understood by the update client. */
export const PLATFORM_KEYS = [
  "windows-x86_64",
  "darwin-x86_64",
  "darwin-aarch64",
  "linux-x86_64",
] as const;

export type PlatformKey = (typeof PLATFORM_KEYS)[number];

