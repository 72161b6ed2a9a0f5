import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';

/**
 * Branded string type for currency codes (e.g. 'USD', 'EUR', 'MXN')
 * Normalized to uppercase; created via parseCurrency() or cast with `'USD' as Currency`
 */
export type Currency = string & { readonly _brand: 'Currency' };

/**
 * Parse a raw string into a Currency, normalizing to uppercase.
 * Returns Err for empty or whitespace-only strings.
 */
export function parseCurrency(code: string): Result<Currency, Error> {
  const normalized = code.toUpperCase().trim();
  if (normalized.length === 0) {
    return err(new Error('Currency code cannot be empty'));
  }
  return ok(normalized as Currency);
}

/**
 * Parse a currency code, additionally requiring a three-letter ISO 4217 shape.
 * Used at input boundaries (rate files, CLI options) where codes come from users.
 */
export function parseIsoCurrency(code: string): Result<Currency, Error> {
  return parseCurrency(code).andThen((currency) =>
    /^[A-Z]{3}$/.test(currency) ? ok(currency) : err(new Error(`Invalid ISO 4217 currency code: ${code}`))
  );
}
