/**
 * CLI exit codes. Policy violations never change the exit code: the tool
 * reports, it does not gate.
 */
export const EXIT = {
  SUCCESS: 0,
  NO_STABLE_BRANCHES: 1,
  INVALID_ARGS: 3,
  REPOSITORY_ACCESS: 4,
  HOSTING_API: 5,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
