/**
 * Exchange rate resolution
 *
 * Pure domain logic: quote type inversion, pegged currency resolution and
 * date fallback. No state, no I/O, no side effects.
 */

import { parseDecimal, type Currency } from '@ratewise/core';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { formatCalendarDate, startOfUtcDay, subtractDays } from '../shared/calendar-date-utils.js';
import {
  CircularPegError,
  FxRateInvariantError,
  NoFxRateFoundError,
  UnsupportedCurrencyError,
  type FxRateError,
} from '../shared/errors.js';
import type { FxProviderDescriptor, FxRateQuery, FxRateResolution } from '../shared/types/index.js';

const ONE = parseDecimal(1);

/**
 * Resolve the rate to convert one unit of `from` into `to`
 *
 * The provider's base currency never has a row in the rate table, so the
 * currency looked up is whichever side is not the base. Currencies without a
 * row are resolved through their peg, recursively.
 *
 * @throws FxRateInvariantError when a directly rated currency is paired with
 * something other than the provider's base currency
 */
export function resolveFxRate(query: FxRateQuery): Result<FxRateResolution, FxRateError> {
  return resolveAlongPegChain(query, []);
}

function resolveAlongPegChain(
  query: FxRateQuery,
  pegChain: readonly Currency[]
): Result<FxRateResolution, FxRateError> {
  const { rates, pegs, date, minDate, provider, from, to } = query;

  // Same-currency conversion (happens in recursive pegged currency lookups)
  if (from === to) {
    return ok({ rate: ONE, lookupCurrency: from });
  }

  const toIsBase = to === provider.currency;
  const lookupCurrency = toIsBase ? from : to;
  const anchorCurrency = toIsBase ? to : from;

  const series = rates.get(lookupCurrency);
  if (!series) {
    const peg = pegs.get(lookupCurrency);
    if (!peg) {
      return err(new UnsupportedCurrencyError(lookupCurrency));
    }

    if (pegChain.includes(lookupCurrency)) {
      return err(new CircularPegError([...pegChain, lookupCurrency]));
    }

    const anchorResult = resolveAlongPegChain({ ...query, from: anchorCurrency, to: peg.peggedTo }, [
      ...pegChain,
      lookupCurrency,
    ]);
    if (anchorResult.isErr()) {
      return err(anchorResult.error);
    }

    const anchorRate = anchorResult.value.rate;

    return ok({
      rate: toIsBase ? peg.rate.dividedBy(anchorRate) : anchorRate.dividedBy(peg.rate),
      lookupCurrency,
    });
  }

  assertPairIncludesBase(provider, from, to);

  // Walk back one day at a time, but only until minDate
  const floor = startOfUtcDay(minDate).getTime();
  for (let day = startOfUtcDay(date); day.getTime() >= floor; day = subtractDays(day, 1)) {
    const fxRate = series.get(formatCalendarDate(day));
    if (fxRate !== undefined) {
      return ok({ rate: applyQuoteType(fxRate, provider, from), lookupCurrency });
    }
  }

  return err(new NoFxRateFoundError(lookupCurrency, formatCalendarDate(date), formatCalendarDate(minDate)));
}

/**
 * QuoteType    Base    From    To     Rate
 * direct       EUR     USD     EUR    fxRate
 * direct       EUR     EUR     USD    1/fxRate
 * indirect     EUR     USD     EUR    1/fxRate
 * indirect     EUR     EUR     USD    fxRate
 */
function applyQuoteType(fxRate: Decimal, provider: FxProviderDescriptor, from: Currency): Decimal {
  const fromIsBase = from === provider.currency;

  switch (provider.quoteType) {
    case 'direct':
      return fromIsBase ? ONE.dividedBy(fxRate) : fxRate;
    case 'indirect':
      return fromIsBase ? fxRate : ONE.dividedBy(fxRate);
  }
}

function assertPairIncludesBase(provider: FxProviderDescriptor, from: Currency, to: Currency): void {
  if (from !== provider.currency && to !== provider.currency) {
    throw new FxRateInvariantError(
      `Cannot classify ${from}->${to}: neither side is the provider base currency ${provider.currency}`
    );
  }
}

