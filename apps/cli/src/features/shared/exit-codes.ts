/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Resource not found (file, currency, rate) */
  NOT_FOUND: 4,

  /** Validation error (data validation failed) */
  VALIDATION_ERROR: 8,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];
