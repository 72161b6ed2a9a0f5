// Rate command - resolve an FX rate from a rates file

import { CircularPegError, NoFxRateFoundError, UnsupportedCurrencyError } from '@ratewise/exchange-rates';
import type { Command } from 'commander';

import { displayCliError, InvalidArgumentsError, RatesFileValidationError } from '../shared/cli-error.js';
import { createSuccessResponse } from '../shared/cli-response.js';
import { ExitCodes, type ExitCode } from '../shared/exit-codes.js';

import { RateHandler } from './rate-handler.js';
import { formatRateResult } from './rate-utils.js';

interface RateCommandOptions {
  amount?: string | undefined;
  date: string;
  from: string;
  json?: boolean | undefined;
  lookback?: string | undefined;
  provider: string;
  rates: string;
  to: string;
}

/**
 * Map a handler error to the exit code reported for it
 */
export function exitCodeForError(error: Error): ExitCode {
  if (error instanceof InvalidArgumentsError) return ExitCodes.INVALID_ARGS;
  if (error instanceof RatesFileValidationError) return ExitCodes.VALIDATION_ERROR;
  if (
    error instanceof UnsupportedCurrencyError ||
    error instanceof NoFxRateFoundError ||
    error instanceof CircularPegError
  ) {
    return ExitCodes.NOT_FOUND;
  }
  return ExitCodes.GENERAL_ERROR;
}

/**
 * Register rate command
 */
export function registerRateCommand(program: Command): void {
  program
    .command('rate')
    .description('Resolve the FX rate between two currencies from a provider rates file')
    .requiredOption('--rates <file>', 'JSON rates file ({ "rates": [...], "pegs": [...] })')
    .requiredOption('--provider <name>', 'Provider that published the rates (ecb, bank-of-canada, banxico)')
    .requiredOption('--from <currency>', 'Source currency (e.g., EUR)')
    .requiredOption('--to <currency>', 'Target currency (e.g., USD)')
    .requiredOption('--date <date>', 'Calendar date (YYYY-MM-DD)')
    .option('--lookback <days>', 'Days before --date a published rate is still acceptable')
    .option('--amount <value>', 'Amount of the source currency to convert')
    .option('--json', 'Output results in JSON format')
    .action(async (options: RateCommandOptions) => {
      const format = options.json ? 'json' : 'text';

      try {
        const handler = new RateHandler();
        const result = await handler.execute({
          ratesFile: options.rates,
          provider: options.provider,
          from: options.from,
          to: options.to,
          date: options.date,
          lookback: options.lookback,
          amount: options.amount,
        });

        if (result.isErr()) {
          displayCliError('rate', result.error, exitCodeForError(result.error), format);
        }

        if (format === 'json') {
          console.log(JSON.stringify(createSuccessResponse('rate', result.value), undefined, 2));
        } else {
          console.log(formatRateResult(result.value));
        }
        process.exit(ExitCodes.SUCCESS);
      } catch (error) {
        displayCliError(
          'rate',
          error instanceof Error ? error : new Error(String(error)),
          ExitCodes.GENERAL_ERROR,
          format
        );
      }
    });
}
