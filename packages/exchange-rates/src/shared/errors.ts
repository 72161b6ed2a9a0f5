/**
 * Errors that can occur while resolving an FX rate
 */

import type { Currency } from '@ratewise/core';

import type { CalendarDate } from './types/index.js';

/**
 * The currency has neither a rate series nor a peg definition
 */
export class UnsupportedCurrencyError extends Error {
  readonly code = 'UNSUPPORTED_CURRENCY';

  constructor(public readonly currency: Currency) {
    super(`Not supported currency: ${currency}`);
    this.name = 'UnsupportedCurrencyError';
  }
}

/**
 * The currency has a rate series, but nothing on any day within [minDate, date]
 */
export class NoFxRateFoundError extends Error {
  readonly code = 'NO_FX_RATE_FOUND';

  constructor(
    public readonly currency: Currency,
    public readonly date: CalendarDate,
    public readonly minDate: CalendarDate
  ) {
    super(`No fx rate found for ${currency} between ${minDate} and ${date}`);
    this.name = 'NoFxRateFoundError';
  }
}

/**
 * Peg definitions loop back on themselves (e.g. A pegged to B, B pegged to A)
 */
export class CircularPegError extends Error {
  readonly code = 'CIRCULAR_PEG';

  constructor(public readonly chain: readonly Currency[]) {
    super(`Circular peg definition: ${chain.join(' -> ')}`);
    this.name = 'CircularPegError';
  }
}

export type FxRateError = UnsupportedCurrencyError | NoFxRateFoundError | CircularPegError;

/**
 * Thrown, never returned: neither side of the pair is the provider's base currency
 * when a direct lookup is classified. Indicates a caller bug.
 */
export class FxRateInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FxRateInvariantError';
  }
}
