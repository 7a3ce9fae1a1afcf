/**
 * Reporting period helpers.
 *
 * Periods are expressed as inclusive unix-second bounds. Month shorthands
 * ("YYYY-MM") resolve against UTC so the same month yields the same bounds on
 * every host.
 */

import { getUnixTime, isValid, parseISO } from 'date-fns';

export interface PeriodBounds {
  period_start: bigint;
  period_end: bigint;
}

const MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

/**
 * Validates if a string is in YYYY-MM format
 */
export function isValidReportMonth(month: string): boolean {
  if (!MONTH_PATTERN.test(month)) {
    return false;
  }
  return isValid(parseISO(`${month}-01T00:00:00Z`));
}

/**
 * Resolves a YYYY-MM month to its first and last second in UTC.
 * @throws Error when the month is not in YYYY-MM format
 */
export function monthToPeriod(month: string): PeriodBounds {
  if (!isValidReportMonth(month)) {
    throw new Error('Invalid month format. Expected YYYY-MM');
  }

  const year = Number(month.slice(0, 4));
  const monthIndex = Number(month.slice(5, 7));
  const followingMonth =
    monthIndex === 12
      ? `${String(year + 1).padStart(4, '0')}-01`
      : `${String(year).padStart(4, '0')}-${String(monthIndex + 1).padStart(2, '0')}`;

  const start = parseISO(`${month}-01T00:00:00Z`);
  const nextMonth = parseISO(`${followingMonth}-01T00:00:00Z`);

  return {
    period_start: BigInt(getUnixTime(start)),
    period_end: BigInt(getUnixTime(nextMonth)) - 1n,
  };
}

/**
 * Current time in whole unix seconds.
 */
export function currentUnixSeconds(now: Date = new Date()): bigint {
  return BigInt(getUnixTime(now));
}
