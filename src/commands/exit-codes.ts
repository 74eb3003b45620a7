/**
 * CLI exit codes. Anything that keeps the branch from being pushed is 1.
 */
export const EXIT = {
  READY: 0,
  NOT_READY: 1,
  GATE_FAILED: 1,
  CONFIG_INVALID: 1,
} as const;
