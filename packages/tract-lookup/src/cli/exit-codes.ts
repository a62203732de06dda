/**
 * Process exit codes shared by the CLI commands
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  NOT_FOUND: 1,
  ERRORS: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
