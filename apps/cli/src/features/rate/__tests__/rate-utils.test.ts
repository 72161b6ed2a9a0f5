import type { Currency } from '@ratewise/core';
import { describe, expect, it } from 'vitest';

import { InvalidArgumentsError, RatesFileValidationError } from '../../shared/cli-error.js';
import { formatRateResult, parseRatesFile, validateRateInput, type RateCommandResult } from '../rate-utils.js';

describe('validateRateInput', () => {
  const valid = { provider: 'ecb', from: 'eur', to: 'usd', date: '2024-01-15' };

  it('normalizes currencies and resolves the provider', () => {
    const input = validateRateInput(valid)._unsafeUnwrap();

    expect(input.provider.currency).toBe('EUR');
    expect(input.from).toBe('EUR');
    expect(input.to).toBe('USD');
    expect(input.date.toISOString()).toBe('2024-01-15T00:00:00.000Z');
    expect(input.lookbackDays).toBeUndefined();
    expect(input.amount).toBeUndefined();
  });

  it('parses lookback and amount', () => {
    const input = validateRateInput({ ...valid, lookback: '3', amount: '250.50' })._unsafeUnwrap();

    expect(input.lookbackDays).toBe(3);
    expect(input.amount?.toFixed()).toBe('250.5');
  });

  it('rejects unknown providers', () => {
    const error = validateRateInput({ ...valid, provider: 'nope' })._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(InvalidArgumentsError);
    expect(error.message).toBe('Unknown exchange rate provider: nope. Available: ecb, bank-of-canada, banxico');
  });

  it('rejects malformed currencies', () => {
    expect(validateRateInput({ ...valid, to: 'dollars' })._unsafeUnwrapErr().message).toBe(
      '--to: Invalid ISO 4217 currency code: dollars'
    );
  });

  it('rejects malformed dates', () => {
    expect(validateRateInput({ ...valid, date: '2024-13-01' })._unsafeUnwrapErr().message).toBe(
      '--date: Invalid calendar date: 2024-13-01'
    );
  });

  it('rejects negative or fractional lookback', () => {
    expect(validateRateInput({ ...valid, lookback: '-1' }).isErr()).toBe(true);
    expect(validateRateInput({ ...valid, lookback: '1.5' })._unsafeUnwrapErr().message).toBe(
      '--lookback must be a non-negative integer, got 1.5'
    );
  });

  it('rejects lookback beyond 366 days', () => {
    expect(validateRateInput({ ...valid, lookback: '366' })._unsafeUnwrap().lookbackDays).toBe(366);
    expect(validateRateInput({ ...valid, lookback: '1000000' })._unsafeUnwrapErr().message).toBe(
      '--lookback must be at most 366 days, got 1000000'
    );
  });

  it('rejects non-numeric and empty amounts', () => {
    expect(validateRateInput({ ...valid, amount: 'ten' })._unsafeUnwrapErr().message).toBe(
      '--amount must be a decimal number, got ten'
    );
    expect(validateRateInput({ ...valid, amount: '' }).isErr()).toBe(true);
  });
});

describe('parseRatesFile', () => {
  it('parses rates and pegs', () => {
    const file = parseRatesFile(
      JSON.stringify({
        rates: [{ currency: 'USD', date: '2024-01-15', rate: '1.10' }],
        pegs: [{ currency: 'AED', peggedTo: 'USD', rate: '0.27229' }],
      })
    )._unsafeUnwrap();

    expect(file.rates[0]?.rate.toFixed()).toBe('1.1');
    expect(file.pegs?.[0]?.peggedTo).toBe('USD');
  });

  it('reports invalid JSON', () => {
    const error = parseRatesFile('{ not json')._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(RatesFileValidationError);
    expect(error.message.startsWith('Rates file is not valid JSON: ')).toBe(true);
  });

  it('reports schema issues with their path', () => {
    const error = parseRatesFile(
      JSON.stringify({ rates: [{ currency: 'USD', date: '2024-01-15', rate: '0' }] })
    )._unsafeUnwrapErr();

    expect(error.message).toBe('Invalid rates file: rates.0.rate: Rate must be a positive decimal, got 0');
  });
});

describe('formatRateResult', () => {
  const base: RateCommandResult = {
    provider: 'ecb',
    from: 'EUR' as Currency,
    to: 'USD' as Currency,
    date: '2024-01-15',
    rate: '1.0856',
    lookupCurrency: 'USD' as Currency,
  };

  it('prints the rate line', () => {
    expect(formatRateResult(base)).toBe('1 EUR = 1.0856 USD on 2024-01-15 (ecb)');
  });

  it('adds the converted amount when present', () => {
    expect(formatRateResult({ ...base, amount: '250', converted: '271.4' })).toBe(
      '1 EUR = 1.0856 USD on 2024-01-15 (ecb)\n250 EUR = 271.4 USD'
    );
  });

  it('mentions the cross currency', () => {
    expect(
      formatRateResult({
        ...base,
        from: 'USD' as Currency,
        to: 'GBP' as Currency,
        rate: '0.7818181818181818181818181818',
        via: 'EUR' as Currency,
      })
    ).toBe('1 USD = 0.7818181818 GBP on 2024-01-15 (ecb via EUR)');
  });
});
