// Pure helpers for the rate command: input validation, rates file parsing, text formatting

import { formatDecimal, getErrorMessage, parseIsoCurrency, tryParseDecimal, type Currency } from '@ratewise/core';
import {
  ExchangeRateFileSchema,
  getProviderDescriptor,
  MAX_LOOKBACK_DAYS,
  parseCalendarDate,
  type CalendarDate,
  type ExchangeRateFile,
  type FxProviderMetadata,
} from '@ratewise/exchange-rates';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { InvalidArgumentsError, RatesFileValidationError } from '../shared/cli-error.js';

/**
 * Raw options as received from the command line
 */
export interface RateCommandInput {
  provider: string;
  from: string;
  to: string;
  date: string;
  lookback?: string | undefined;
  amount?: string | undefined;
}

export interface ValidatedRateInput {
  provider: FxProviderMetadata;
  from: Currency;
  to: Currency;
  date: Date;
  lookbackDays: number | undefined;
  amount: Decimal | undefined;
}

/**
 * Result of the rate command
 */
export interface RateCommandResult {
  provider: string;
  from: Currency;
  to: Currency;
  date: CalendarDate;
  rate: string;
  lookupCurrency: Currency;
  via?: Currency | undefined;
  amount?: string | undefined;
  converted?: string | undefined;
}

export function validateRateInput(input: RateCommandInput): Result<ValidatedRateInput, InvalidArgumentsError> {
  const provider = getProviderDescriptor(input.provider);
  if (provider.isErr()) {
    return err(new InvalidArgumentsError(provider.error.message));
  }

  const from = parseIsoCurrency(input.from);
  if (from.isErr()) {
    return err(new InvalidArgumentsError(`--from: ${from.error.message}`));
  }

  const to = parseIsoCurrency(input.to);
  if (to.isErr()) {
    return err(new InvalidArgumentsError(`--to: ${to.error.message}`));
  }

  const date = parseCalendarDate(input.date);
  if (date.isErr()) {
    return err(new InvalidArgumentsError(`--date: ${date.error.message}`));
  }

  let lookbackDays: number | undefined;
  if (input.lookback !== undefined) {
    lookbackDays = Number(input.lookback);
    if (!Number.isInteger(lookbackDays) || lookbackDays < 0) {
      return err(new InvalidArgumentsError(`--lookback must be a non-negative integer, got ${input.lookback}`));
    }
    if (lookbackDays > MAX_LOOKBACK_DAYS) {
      return err(
        new InvalidArgumentsError(`--lookback must be at most ${MAX_LOOKBACK_DAYS} days, got ${input.lookback}`)
      );
    }
  }

  let amount: Decimal | undefined;
  if (input.amount !== undefined) {
    const out = { value: new Decimal(0) };
    if (input.amount.trim() === '' || !tryParseDecimal(input.amount, out) || !out.value.isFinite()) {
      return err(new InvalidArgumentsError(`--amount must be a decimal number, got ${input.amount}`));
    }
    amount = out.value;
  }

  return ok({
    provider: provider.value,
    from: from.value,
    to: to.value,
    date: date.value,
    lookbackDays,
    amount,
  });
}

/**
 * Parse and validate the JSON content of a rates file
 */
export function parseRatesFile(content: string): Result<ExchangeRateFile, RatesFileValidationError> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    return err(new RatesFileValidationError(`Rates file is not valid JSON: ${getErrorMessage(error)}`));
  }

  const parsed = ExchangeRateFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return err(new RatesFileValidationError(`Invalid rates file: ${issues.join('; ')}`));
  }

  return ok(parsed.data);
}

/**
 * Human-readable summary line(s) for text output
 */
export function formatRateResult(result: RateCommandResult): string {
  const via = result.via ? ` via ${result.via}` : '';
  const lines = [`1 ${result.from} = ${formatDecimal(new Decimal(result.rate), 10)} ${result.to} on ${result.date} (${result.provider}${via})`];

  if (result.amount !== undefined && result.converted !== undefined) {
    lines.push(`${result.amount} ${result.from} = ${formatDecimal(new Decimal(result.converted), 4)} ${result.to}`);
  }

  return lines.join('\n');
}
