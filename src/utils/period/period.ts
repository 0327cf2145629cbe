import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { AccountingPeriod } from '../../data/report/types';

dayjs.extend(utc);

/**
 * The 28th is the last day of the month that every month has, so a period
 * anchored on it never needs clamping.
 */
export const DEFAULT_ANCHOR_DAY = 28;

/**
 * Computes the accounting period containing `today`.
 *
 * Periods run from the anchor day of one month up to, but not including, the
 * anchor day of the next. On the anchor day itself the new period has begun.
 *
 * @param today - Calendar date (UTC midnight)
 * @param anchorDay - Day of month the period starts on ("1" through "28")
 * @returns Half-open period `[start, end)`
 *
 * @example
 * ```typescript
 * currentPeriod(new Date('2024-03-15'));
 * // { start: 2024-02-28, end: 2024-03-28 }
 * currentPeriod(new Date('2024-03-28'));
 * // { start: 2024-03-28, end: 2024-04-28 }
 * ```
 */
export function currentPeriod(today: Date, anchorDay: number = DEFAULT_ANCHOR_DAY): AccountingPeriod {
  if (!Number.isInteger(anchorDay) || anchorDay < 1 || anchorDay > 28) {
    throw new RangeError(`Period anchor day must be between 1 and 28, got ${anchorDay}`);
  }

  const day = dayjs.utc(today).startOf('day');
  let start: dayjs.Dayjs;
  let end: dayjs.Dayjs;
  if (day.date() >= anchorDay) {
    start = day.date(anchorDay);
    end = start.add(1, 'month');
  } else {
    end = day.date(anchorDay);
    start = end.subtract(1, 'month');
  }

  return Object.freeze({ start: start.toDate(), end: end.toDate() });
}

/**
 * Whether a calendar date falls in `[period.start, period.end)`.
 */
export function isInPeriod(date: Date, period: AccountingPeriod): boolean {
  const d = dayjs.utc(date);
  return !d.isBefore(period.start, 'day') && d.isBefore(period.end, 'day');
}
