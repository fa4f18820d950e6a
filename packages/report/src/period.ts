/**
 * Period resolution: turns the month/day arguments into a validated
 * Period and its UTC bounds.
 */

import { ValidationError, pad2, type Period, type PeriodRange } from '@worklog/core';

const MONTH_PATTERN = /^(\d{4})-(\d{2})$/;
const DAY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

export interface PeriodInput {
  /** Positional `YYYY-MM` argument */
  positional?: string;
  /** `--month YYYY-MM` */
  month?: string;
  /** `--day YYYY-MM-DD` */
  day?: string;
  /** Reference time for the default period */
  now: Date;
}

// Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not
function utcDate(year: number, monthIndex: number, day: number): Date {
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, day);
  return date;
}

function pad4(year: number): string {
  return String(year).padStart(4, '0');
}

/** Number of days in a month (month is 1-12) */
export function daysInMonth(year: number, month: number): number {
  return utcDate(year, month, 0).getUTCDate();
}

function parseMonthToken(token: string): Period {
  const match = MONTH_PATTERN.exec(token);
  if (!match) {
    throw new ValidationError(`Expected a month as YYYY-MM, got "${token}"`, token);
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  if (month < 1 || month > 12) {
    throw new ValidationError(`Month must be between 01 and 12, got "${token}"`, token);
  }
  return { year, month };
}

function parseDayToken(token: string): Required<Period> {
  const match = DAY_PATTERN.exec(token);
  if (!match) {
    throw new ValidationError(`Expected a day as YYYY-MM-DD, got "${token}"`, token);
  }
  const { year, month } = parseMonthToken(`${match[1]}-${match[2]}`);
  const day = Number(match[3]);
  if (day < 1 || day > daysInMonth(year, month)) {
    throw new ValidationError(`"${token}" is not a valid date`, token);
  }
  return { year, month, day };
}

/**
 * Resolve the target period. With no arguments the current UTC month of
 * `now` is used; a day narrows the period to that day.
 */
export function resolvePeriod(input: PeriodInput): Period {
  const { positional, month, day, now } = input;

  if (positional !== undefined && month !== undefined && positional !== month) {
    throw new ValidationError(
      `Conflicting months: "${positional}" and --month "${month}"`,
      month
    );
  }

  const monthToken = positional ?? month;
  const monthPeriod = monthToken !== undefined ? parseMonthToken(monthToken) : undefined;

  if (day !== undefined) {
    const dayPeriod = parseDayToken(day);
    if (
      monthPeriod &&
      (monthPeriod.year !== dayPeriod.year || monthPeriod.month !== dayPeriod.month)
    ) {
      throw new ValidationError(`Day ${day} is not in month ${monthToken}`, day);
    }
    return dayPeriod;
  }

  return monthPeriod ?? { year: now.getUTCFullYear(), month: now.getUTCMonth() + 1 };
}

/** Half-open UTC bounds covering the month, or the single day */
export function periodRange(period: Period): PeriodRange {
  const { year, month, day } = period;
  if (day !== undefined) {
    return {
      start: utcDate(year, month - 1, day),
      end: utcDate(year, month - 1, day + 1),
    };
  }
  return {
    start: utcDate(year, month - 1, 1),
    end: utcDate(year, month, 1),
  };
}

/** `YYYY-MM`, the key used for the output file and asset directory */
export function periodKey(period: Period): string {
  return `${pad4(period.year)}-${pad2(period.month)}`;
}

/** `YYYY-MM` for a month, `YYYY-MM-DD` for a day */
export function periodLabel(period: Period): string {
  const key = periodKey(period);
  return period.day !== undefined ? `${key}-${pad2(period.day)}` : key;
}

/** UTC calendar day of a timestamp as `YYYY-MM-DD` */
export function dayKey(date: Date): string {
  return `${pad4(date.getUTCFullYear())}-${pad2(date.getUTCMonth() + 1)}-${pad2(date.getUTCDate())}`;
}

/** e.g. "January 2026" */
export function formatMonthName(period: Period): string {
  return `${MONTH_NAMES[period.month - 1]} ${period.year}`;
}

/** Every day key covered by the period, ascending */
export function enumerateDays(period: Period): string[] {
  const key = periodKey(period);
  if (period.day !== undefined) return [`${key}-${pad2(period.day)}`];
  const count = daysInMonth(period.year, period.month);
  return Array.from({ length: count }, (_, i) => `${key}-${pad2(i + 1)}`);
}

/** Return the value when it is a `YYYY-MM-DD` string naming a real date */
export function parseDayKey(value: string): string | undefined {
  const match = DAY_PATTERN.exec(value);
  if (!match) return undefined;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  return value;
}
