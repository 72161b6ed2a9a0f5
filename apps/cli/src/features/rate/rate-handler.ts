// Handler for the rate command
// Loads a rates file and resolves one conversion through ExchangeRateService

import fs from 'node:fs/promises';

import { wrapError } from '@ratewise/core';
import { ExchangeRateService, formatCalendarDate } from '@ratewise/exchange-rates';
import { getLogger } from '@ratewise/logger';
import { err, ok, type Result } from 'neverthrow';

import { RatesFileValidationError } from '../shared/cli-error.js';

import { parseRatesFile, validateRateInput, type RateCommandInput, type RateCommandResult } from './rate-utils.js';

const logger = getLogger('RateHandler');

export interface RateHandlerOptions extends RateCommandInput {
  /** Path to the JSON rates file */
  ratesFile: string;
}

/**
 * Handler for the rate command
 */
export class RateHandler {
  async execute(options: RateHandlerOptions): Promise<Result<RateCommandResult, Error>> {
    const inputResult = validateRateInput(options);
    if (inputResult.isErr()) {
      return err(inputResult.error);
    }
    const input = inputResult.value;

    const contentResult = await this.readRatesFile(options.ratesFile);
    if (contentResult.isErr()) {
      return err(contentResult.error);
    }

    const fileResult = parseRatesFile(contentResult.value);
    if (fileResult.isErr()) {
      return err(fileResult.error);
    }

    logger.debug(
      { ratesFile: options.ratesFile, records: fileResult.value.rates.length, provider: input.provider.name },
      'Loaded rates file'
    );

    const serviceResult = ExchangeRateService.fromRecords(input.provider, fileResult.value.rates, {
      lookbackDays: input.lookbackDays,
      pegs: fileResult.value.pegs,
    });
    // Table building rejects file content (base currency rows, conflicts, self pegs)
    if (serviceResult.isErr()) {
      return err(new RatesFileValidationError(`Invalid rates file: ${serviceResult.error.message}`));
    }

    const rateResult = serviceResult.value.getFxRate(input.from, input.to, input.date);
    if (rateResult.isErr()) {
      return err(rateResult.error);
    }

    const resolution = rateResult.value;
    const result: RateCommandResult = {
      provider: input.provider.name,
      from: input.from,
      to: input.to,
      date: formatCalendarDate(input.date),
      rate: resolution.rate.toFixed(),
      lookupCurrency: resolution.lookupCurrency,
      via: resolution.via,
    };

    if (input.amount !== undefined) {
      result.amount = input.amount.toFixed();
      result.converted = input.amount.times(resolution.rate).toFixed();
    }

    return ok(result);
  }

  private async readRatesFile(path: string): Promise<Result<string, Error>> {
    try {
      return ok(await fs.readFile(path, 'utf8'));
    } catch (error) {
      return wrapError(error, `Failed to read rates file ${path}`);
    }
  }
}
