/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  GENERATION_FAILED: 1,
  INVALID_ARGS: 2,
  NO_PLATFORMS: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
