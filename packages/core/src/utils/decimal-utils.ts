import { Decimal } from 'decimal.js';

// Configure Decimal.js for exchange rate precision
// Inverted and compounded rates need more digits than any published rate carries
Decimal.set({
  maxE: 9e15, // Maximum exponent
  minE: -9e15, // Minimum exponent
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28, // Matches 128-bit decimal arithmetic
  rounding: Decimal.ROUND_HALF_UP, // Standard rounding
  toExpNeg: -7, // Use exponential notation for numbers smaller than 1e-7
  toExpPos: 21, // Use exponential notation for numbers larger than 1e+21
});

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(value: string | number | Decimal | undefined | null, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string or number to a Decimal with fallback to zero
 */
export function parseDecimal(value: string | number | Decimal | undefined | null): Decimal {
  const result = { value: new Decimal(0) };
  tryParseDecimal(value, result);
  return result.value;
}

/**
 * Convert Decimal to string with appropriate precision for display
 */
export function formatDecimal(decimal: Decimal, maxDecimalPlaces = 8): string {
  return decimal.toFixed(maxDecimalPlaces).replace(/\.?0+$/, '');
}
