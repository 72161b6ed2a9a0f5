/**
 * Zod schemas for exchange rate records and peg definitions
 */

import { parseIsoCurrency, tryParseDecimal } from '@ratewise/core';
import { Decimal } from 'decimal.js';
import { z } from 'zod';

import { parseCalendarDate } from '../shared/calendar-date-utils.js';

export const CurrencyCodeSchema = z.string().transform((value, ctx) => {
  const result = parseIsoCurrency(value);
  if (result.isErr()) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: result.error.message });
    return z.NEVER;
  }
  return result.value;
});

export const CalendarDateSchema = z.string().refine((value) => parseCalendarDate(value).isOk(), {
  message: 'Expected a calendar date in YYYY-MM-DD format',
});

/**
 * Rates arrive as strings (preferred, exact) or numbers and must be finite and > 0
 */
export const PositiveRateSchema = z.union([z.string(), z.number()]).transform((value, ctx) => {
  const out = { value: new Decimal(0) };
  if (!tryParseDecimal(value, out) || !out.value.isFinite() || out.value.lessThanOrEqualTo(0)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Rate must be a positive decimal, got ${String(value)}` });
    return z.NEVER;
  }
  return out.value;
});

export const ExchangeRateRecordSchema = z.object({
  currency: CurrencyCodeSchema,
  date: CalendarDateSchema,
  rate: PositiveRateSchema,
  source: z.string().optional(),
});

export const PeggedCurrencySchema = z.object({
  currency: CurrencyCodeSchema,
  peggedTo: CurrencyCodeSchema,
  rate: PositiveRateSchema,
});

/**
 * Rates file consumed by the CLI
 */
export const ExchangeRateFileSchema = z.object({
  rates: z.array(ExchangeRateRecordSchema),
  pegs: z.array(PeggedCurrencySchema).optional(),
});

export type ExchangeRateRecord = z.infer<typeof ExchangeRateRecordSchema>;
export type ExchangeRateFile = z.infer<typeof ExchangeRateFileSchema>;
