/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  POLICY_FAILED: 1,
  OPERATION_FAILED: 2,
  INVALID_ARGS: 3,
  REGISTRY_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
