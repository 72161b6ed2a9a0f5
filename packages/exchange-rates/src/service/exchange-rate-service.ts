/**
 * Exchange rate service over one provider's materialized tables
 */

import type { Currency } from '@ratewise/core';
import { getLogger } from '@ratewise/logger';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { resolveFxRate } from '../calculator/exchange-rate-calculator.js';
import { formatCalendarDate, subtractDays } from '../shared/calendar-date-utils.js';
import type { FxRateError } from '../shared/errors.js';
import type { FxProviderDescriptor, FxRateResolution, PegTable, PeggedCurrency, RateTable } from '../shared/types/index.js';
import { DEFAULT_PEGGED_CURRENCIES } from '../tables/pegged-currencies.js';
import { buildPegTable, buildRateTable, mergePegDefinitions } from '../tables/rate-table-builder.js';
import type { ExchangeRateRecord } from '../tables/schemas.js';

import { validateExchangeRateEnv } from './env.schema.js';

const logger = getLogger('ExchangeRateService');

export interface ExchangeRateServiceOptions {
  /** Days before the requested date a rate is still acceptable (default: FX_RATE_LOOKBACK_DAYS) */
  lookbackDays?: number | undefined;
}

export interface ExchangeRateServiceFromRecordsOptions extends ExchangeRateServiceOptions {
  /** Peg definitions layered over DEFAULT_PEGGED_CURRENCIES */
  pegs?: readonly PeggedCurrency[] | undefined;
}

/**
 * Resolves rates for any currency pair against a single provider
 *
 * Pairs that include the provider's base currency go straight to the
 * calculator. Other pairs are crossed through the base currency.
 */
export class ExchangeRateService {
  private readonly lookbackDays: number;

  constructor(
    private readonly provider: FxProviderDescriptor,
    private readonly rates: RateTable,
    private readonly pegs: PegTable,
    options: ExchangeRateServiceOptions = {}
  ) {
    this.lookbackDays = options.lookbackDays ?? validateExchangeRateEnv(process.env).FX_RATE_LOOKBACK_DAYS;
  }

  /**
   * Build a service from raw records, adding the default peg definitions
   */
  static fromRecords(
    provider: FxProviderDescriptor,
    records: readonly ExchangeRateRecord[],
    options: ExchangeRateServiceFromRecordsOptions = {}
  ): Result<ExchangeRateService, Error> {
    const ratesResult = buildRateTable(records, { providerCurrency: provider.currency });
    if (ratesResult.isErr()) {
      return err(ratesResult.error);
    }

    const pegsResult = mergePegDefinitions(DEFAULT_PEGGED_CURRENCIES, options.pegs ?? []).andThen(buildPegTable);
    if (pegsResult.isErr()) {
      return err(pegsResult.error);
    }

    return ok(new ExchangeRateService(provider, ratesResult.value, pegsResult.value, options));
  }

  /**
   * Rate to convert one unit of `from` into `to` on `date`
   *
   * @param minDate - Earliest acceptable day (default: date minus the lookback window)
   */
  getFxRate(from: Currency, to: Currency, date: Date, minDate?: Date): Result<FxRateResolution, FxRateError> {
    const windowStart = minDate ?? subtractDays(date, this.lookbackDays);
    const base = this.provider.currency;

    const result =
      from === to || from === base || to === base
        ? this.resolve(from, to, date, windowStart)
        : this.resolveCross(from, to, date, windowStart);

    if (result.isErr()) {
      logger.warn(
        {
          from,
          to,
          date: formatCalendarDate(date),
          minDate: formatCalendarDate(windowStart),
          code: result.error.code,
          error: result.error.message,
        },
        'FX rate resolution failed'
      );
      return result;
    }

    logger.debug(
      {
        from,
        to,
        date: formatCalendarDate(date),
        rate: result.value.rate.toFixed(),
        lookupCurrency: result.value.lookupCurrency,
        via: result.value.via,
      },
      'Resolved FX rate'
    );

    return result;
  }

  /**
   * Convert an amount of `from` into `to` using the rate for `date`
   */
  convert(amount: Decimal, from: Currency, to: Currency, date: Date): Result<Decimal, FxRateError> {
    return this.getFxRate(from, to, date).map((resolution) => amount.times(resolution.rate));
  }

  private resolve(from: Currency, to: Currency, date: Date, minDate: Date): Result<FxRateResolution, FxRateError> {
    return resolveFxRate({
      rates: this.rates,
      pegs: this.pegs,
      date,
      minDate,
      provider: this.provider,
      from,
      to,
    });
  }

  private resolveCross(
    from: Currency,
    to: Currency,
    date: Date,
    minDate: Date
  ): Result<FxRateResolution, FxRateError> {
    const base = this.provider.currency;

    const fromLeg = this.resolve(from, base, date, minDate);
    if (fromLeg.isErr()) {
      return err(fromLeg.error);
    }

    const toLeg = this.resolve(base, to, date, minDate);
    if (toLeg.isErr()) {
      return err(toLeg.error);
    }

    return ok({
      rate: fromLeg.value.rate.times(toLeg.value.rate),
      lookupCurrency: toLeg.value.lookupCurrency,
      via: base,
    });
  }
}
