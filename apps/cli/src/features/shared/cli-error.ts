import pc from 'picocolors';

import { createErrorResponse, exitCodeToErrorCode } from './cli-response.js';
import type { ExitCode } from './exit-codes.js';

/**
 * Error raised for bad command input, reported with INVALID_ARGS
 */
export class InvalidArgumentsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentsError';
  }
}

/**
 * Error raised when the rates file fails validation, reported with VALIDATION_ERROR
 */
export class RatesFileValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RatesFileValidationError';
  }
}

/**
 * Tips shown after error messages, keyed by error code.
 */
const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'No usable rate was found. Check the currency codes, or widen the window with --lookback.',
  VALIDATION_ERROR: 'The rates file must be JSON of the form { "rates": [{ "currency", "date", "rate" }], "pegs"?: [...] }.',
};

/**
 * Display a CLI error and exit.
 * - Text mode: formatted error to stderr with contextual tips
 * - JSON mode: structured JSON error to stdout
 */
export function displayCliError(command: string, error: Error, exitCode: ExitCode, format: 'json' | 'text'): never {
  const code = exitCodeToErrorCode(exitCode);

  if (format === 'json') {
    console.log(JSON.stringify(createErrorResponse(command, error, code), undefined, 2));
  } else {
    process.stderr.write(`\n${pc.red('✗')} Error: ${error.message}\n`);

    const tip = ERROR_TIPS[code];
    if (tip) {
      process.stderr.write(`\n${pc.dim(tip)}\n`);
    }

    // In development, show full stack trace
    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      process.stderr.write(`\n${pc.dim(error.stack)}\n\n`);
    }
  }

  process.exit(exitCode);
}
