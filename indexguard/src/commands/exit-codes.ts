/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  REPORT_FAILED: 1,
  FATAL: 2,
  INVALID_ARGS: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
