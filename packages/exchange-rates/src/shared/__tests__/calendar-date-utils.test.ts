import { describe, expect, it } from 'vitest';

import { formatCalendarDate, parseCalendarDate, startOfUtcDay, subtractDays } from '../calendar-date-utils.js';

describe('formatCalendarDate', () => {
  it('formats date to YYYY-MM-DD', () => {
    expect(formatCalendarDate(new Date('2024-01-15T14:30:00Z'))).toBe('2024-01-15');
  });

  it('pads single-digit month and day', () => {
    expect(formatCalendarDate(new Date('2024-03-05T00:00:00Z'))).toBe('2024-03-05');
  });

  it('uses the UTC calendar day', () => {
    expect(formatCalendarDate(new Date('2023-12-31T23:59:59Z'))).toBe('2023-12-31');
  });
});

describe('parseCalendarDate', () => {
  it('parses to UTC midnight', () => {
    expect(parseCalendarDate('2024-01-15')._unsafeUnwrap().toISOString()).toBe('2024-01-15T00:00:00.000Z');
  });

  it('accepts leap days', () => {
    expect(parseCalendarDate('2024-02-29').isOk()).toBe(true);
  });

  it('rejects days that do not exist', () => {
    expect(parseCalendarDate('2023-02-29')._unsafeUnwrapErr().message).toBe('Invalid calendar date: 2023-02-29');
  });

  it('rejects other formats', () => {
    expect(parseCalendarDate('15/01/2024')._unsafeUnwrapErr().message).toBe(
      'Invalid calendar date: 15/01/2024 (expected YYYY-MM-DD)'
    );
  });
});

describe('startOfUtcDay', () => {
  it('drops the time component', () => {
    expect(startOfUtcDay(new Date('2024-01-15T18:45:12.345Z')).toISOString()).toBe('2024-01-15T00:00:00.000Z');
  });
});

describe('subtractDays', () => {
  it('steps back across month and year boundaries', () => {
    expect(formatCalendarDate(subtractDays(new Date('2024-01-01T00:00:00Z'), 1))).toBe('2023-12-31');
    expect(formatCalendarDate(subtractDays(new Date('2024-03-01T00:00:00Z'), 1))).toBe('2024-02-29');
  });
});
