import type { Currency } from '@ratewise/core';
import type { Decimal } from 'decimal.js';

/**
 * How a provider publishes rates relative to its own base currency
 *
 * If your base currency is EUR:
 * - direct: 1 USD = 0.92819 EUR
 * - indirect: 1 EUR = 1.08238 USD
 */
export type QuoteType = 'direct' | 'indirect';

/**
 * Calendar day in YYYY-MM-DD format (UTC, no time component)
 */
export type CalendarDate = string;

/**
 * The part of a rate provider the resolver needs: its base currency and quoting convention
 */
export interface FxProviderDescriptor {
  /** Base currency; never appears as a row in the provider's rate table */
  readonly currency: Currency;
  readonly quoteType: QuoteType;
}

/**
 * Descriptor plus identification of a known publisher
 */
export interface FxProviderMetadata extends FxProviderDescriptor {
  readonly name: string;
  readonly displayName: string;
}

/**
 * Rates keyed by currency, then calendar day, expressed relative to the provider's base currency
 */
export type RateTable = ReadonlyMap<Currency, ReadonlyMap<CalendarDate, Decimal>>;

/**
 * Fixed-rate relationship: 1 unit of `currency` = `rate` units of `peggedTo`
 */
export interface PeggedCurrency {
  currency: Currency;
  peggedTo: Currency;
  rate: Decimal;
}

export type PegTable = ReadonlyMap<Currency, PeggedCurrency>;

/**
 * Input to a single rate resolution
 */
export interface FxRateQuery {
  rates: RateTable;
  pegs: PegTable;
  /** Requested day; the search starts here */
  date: Date;
  /** Earliest acceptable day; the search stops here (inclusive) */
  minDate: Date;
  provider: FxProviderDescriptor;
  from: Currency;
  to: Currency;
}

/**
 * Successful resolution
 */
export interface FxRateResolution {
  /** Units of `to` per unit of `from` */
  rate: Decimal;
  /** The non-base currency that was looked up in the rate table (diagnostic) */
  lookupCurrency: Currency;
  /** Set when the rate was crossed through the provider's base currency */
  via?: Currency | undefined;
}
