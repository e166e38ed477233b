/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  RESOLUTION_FAILED: 1,
  INVALID_INPUT: 2,
  INVALID_ARGS: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
