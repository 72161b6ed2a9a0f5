/**
 * Calendar day helpers
 *
 * Rate tables are keyed by UTC calendar day. All helpers work in UTC so that
 * stepping one day back never lands on the same day twice around DST changes.
 */

import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { CalendarDate } from './types/index.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Format date as YYYY-MM-DD using its UTC calendar day
 */
export function formatCalendarDate(date: Date): CalendarDate {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse YYYY-MM-DD into a Date at UTC midnight
 * Rejects days that do not exist (e.g. 2024-02-30)
 */
export function parseCalendarDate(value: string): Result<Date, Error> {
  if (!CALENDAR_DATE_PATTERN.test(value)) {
    return err(new Error(`Invalid calendar date: ${value} (expected YYYY-MM-DD)`));
  }

  const date = new Date(`${value}T00:00:00.000Z`);
  if (Number.isNaN(date.getTime()) || formatCalendarDate(date) !== value) {
    return err(new Error(`Invalid calendar date: ${value}`));
  }

  return ok(date);
}

/**
 * Truncate to UTC midnight
 */
export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function subtractDays(date: Date, days: number): Date {
  return new Date(date.getTime() - days * MS_PER_DAY);
}
