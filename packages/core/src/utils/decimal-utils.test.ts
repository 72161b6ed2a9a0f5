import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import { formatDecimal, parseDecimal, tryParseDecimal } from './decimal-utils.js';

describe('Decimal Utilities', () => {
  describe('tryParseDecimal', () => {
    it('should parse valid string to Decimal', () => {
      const out = { value: new Decimal(0) };
      const result = tryParseDecimal('1.0856', out);

      expect(result).toBe(true);
      expect(out.value.toString()).toBe('1.0856');
    });

    it('should parse Decimal instance', () => {
      const input = new Decimal('17.5');
      const out = { value: new Decimal(0) };
      const result = tryParseDecimal(input, out);

      expect(result).toBe(true);
      expect(out.value.toString()).toBe('17.5');
    });

    it('should handle undefined as zero', () => {
      const out = { value: new Decimal(1) };
      const result = tryParseDecimal(undefined, out);

      expect(result).toBe(true);
      expect(out.value.isZero()).toBe(true);
    });

    it('should return false for invalid input', () => {
      expect(tryParseDecimal('not-a-number')).toBe(false);
    });
  });

  describe('parseDecimal', () => {
    it('should fall back to zero for invalid input', () => {
      expect(parseDecimal('abc').isZero()).toBe(true);
    });

    it('should parse numbers', () => {
      expect(parseDecimal(0.27229).toString()).toBe('0.27229');
    });
  });

  describe('precision', () => {
    it('should carry 28 significant digits through division', () => {
      expect(new Decimal(1).dividedBy(3).toString()).toBe('0.3333333333333333333333333333');
    });
  });

  describe('formatDecimal', () => {
    it('should trim trailing zeros', () => {
      expect(formatDecimal(new Decimal('1.50000000'))).toBe('1.5');
    });

    it('should round to the requested places', () => {
      expect(formatDecimal(new Decimal('0.921149594694178'), 5)).toBe('0.92115');
    });

    it('should drop the decimal point for integers', () => {
      expect(formatDecimal(new Decimal('17'))).toBe('17');
    });
  });
});
