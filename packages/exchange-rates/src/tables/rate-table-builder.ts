/**
 * Builders that materialize in-memory rate and peg tables from records
 *
 * Pure functions - all inputs explicitly passed
 */

import type { Currency } from '@ratewise/core';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { CalendarDate, PegTable, PeggedCurrency, RateTable } from '../shared/types/index.js';

import type { ExchangeRateRecord } from './schemas.js';

export interface BuildRateTableOptions {
  /** Base currency of the provider; rejected as a row key */
  providerCurrency?: Currency | undefined;
}

/**
 * Group rate records by currency and calendar day
 *
 * Duplicate (currency, date) records are accepted only when their rates agree.
 */
export function buildRateTable(
  records: readonly ExchangeRateRecord[],
  options: BuildRateTableOptions = {}
): Result<RateTable, Error> {
  const table = new Map<Currency, Map<CalendarDate, Decimal>>();

  for (const record of records) {
    if (options.providerCurrency !== undefined && record.currency === options.providerCurrency) {
      return err(new Error(`Rate table cannot contain the provider base currency ${record.currency}`));
    }

    if (record.rate.lessThanOrEqualTo(0)) {
      return err(new Error(`Invalid exchange rate for ${record.currency} on ${record.date}: ${record.rate.toFixed()}`));
    }

    let series = table.get(record.currency);
    if (!series) {
      series = new Map<CalendarDate, Decimal>();
      table.set(record.currency, series);
    }

    const existing = series.get(record.date);
    if (existing !== undefined && !existing.equals(record.rate)) {
      return err(
        new Error(
          `Conflicting rates for ${record.currency} on ${record.date}: ${existing.toFixed()} and ${record.rate.toFixed()}`
        )
      );
    }

    series.set(record.date, record.rate);
  }

  return ok(table);
}

/**
 * Index peg definitions by pegged currency
 */
export function buildPegTable(pegs: readonly PeggedCurrency[]): Result<PegTable, Error> {
  const table = new Map<Currency, PeggedCurrency>();

  for (const peg of pegs) {
    if (peg.currency === peg.peggedTo) {
      return err(new Error(`Currency ${peg.currency} cannot be pegged to itself`));
    }

    if (peg.rate.lessThanOrEqualTo(0)) {
      return err(new Error(`Invalid peg rate for ${peg.currency}: ${peg.rate.toFixed()}`));
    }

    const existing = table.get(peg.currency);
    if (existing && (existing.peggedTo !== peg.peggedTo || !existing.rate.equals(peg.rate))) {
      return err(new Error(`Conflicting peg definitions for ${peg.currency}`));
    }

    table.set(peg.currency, peg);
  }

  return ok(table);
}

/**
 * Layer override definitions over a base list
 *
 * Overrides replace base definitions for the same pegged currency. Within the
 * overrides themselves, two different definitions for one currency are an error.
 */
export function mergePegDefinitions(
  base: readonly PeggedCurrency[],
  overrides: readonly PeggedCurrency[]
): Result<PeggedCurrency[], Error> {
  return buildPegTable(overrides).map((overrideTable) => [
    ...base.filter((peg) => !overrideTable.has(peg.currency)),
    ...overrideTable.values(),
  ]);
}
