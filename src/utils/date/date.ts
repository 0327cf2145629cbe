import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import customParseFormat from 'dayjs/plugin/customParseFormat';
import { DateString } from './types';

dayjs.extend(utc);
dayjs.extend(customParseFormat);

// Formats written to the store. Reads also accept the legacy dash-separated variants.
export const SHEET_DATE_FORMAT = 'M/D/YYYY';
export const TIMESTAMP_FORMAT = 'MM/DD/YYYY HH:mm:ss';

const SHEET_DATE_PATTERN = /^(\d{1,2})([/-])(\d{1,2})\2(\d{4})$/;
const TIMESTAMP_PATTERN = /^(\d{1,2})([/-])(\d{1,2})\2(\d{4})[ T](\d{1,2}):(\d{2})(?::(\d{2}))?$/;

function pad(value: string): string {
  return value.padStart(2, '0');
}

/**
 * Calendar dates are carried as Dates at UTC midnight so that day arithmetic
 * never crosses a timezone boundary.
 */
export function formatDate(date: Date): DateString {
  return date.toISOString().split('T')[0];
}

export function isValidDate(date: string): boolean {
  return dayjs.utc(date, 'YYYY-MM-DD', true).isValid();
}

/**
 * Parses a YYYY-MM-DD string into a calendar date.
 *
 * @throws Error if the string is not a real date in that format
 */
export function parseDate(date: DateString): Date {
  const d = dayjs.utc(date, 'YYYY-MM-DD', true);
  if (!d.isValid()) {
    throw new Error(`Invalid date '${date}'`);
  }
  return d.toDate();
}

/**
 * Today's calendar date in the server's local timezone.
 */
export function today(): Date {
  return dayjs.utc(dayjs().format('YYYY-MM-DD'), 'YYYY-MM-DD', true).toDate();
}

/**
 * Reads a month/day/year cell. Zero padding is optional and `/` or `-` may
 * separate the parts, as long as both separators match.
 *
 * @returns The calendar date, or null when the value is not a real month/day/year date
 *
 * @example
 * ```typescript
 * parseSheetDate('3/5/2024'); // 2024-03-05
 * parseSheetDate('03-05-2024'); // 2024-03-05
 * parseSheetDate('2/30/2024'); // null
 * ```
 */
export function parseSheetDate(value: string): Date | null {
  const match = SHEET_DATE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, month, , day, year] = match;
  const d = dayjs.utc(`${year}-${pad(month)}-${pad(day)}`, 'YYYY-MM-DD', true);
  return d.isValid() ? d.toDate() : null;
}

/**
 * Reads a Timestamp cell (`MM/DD/YYYY HH:mm:ss`, legacy `MM-DD-YYYY HH:mm:ss`).
 * Seconds are optional. Timestamps are wall-clock values and are compared as such.
 *
 * @returns The instant, or null when the value is not a timestamp in those formats
 */
export function parseTimestamp(value: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const [, month, , day, year, hour, minute, second] = match;
  const d = dayjs.utc(
    `${year}-${pad(month)}-${pad(day)} ${pad(hour)}:${minute}:${second ?? '00'}`,
    'YYYY-MM-DD HH:mm:ss',
    true,
  );
  return d.isValid() ? d.toDate() : null;
}

export function formatSheetDate(date: Date): string {
  return dayjs.utc(date).format(SHEET_DATE_FORMAT);
}

export function formatTimestamp(date: Date): string {
  return dayjs.utc(date).format(TIMESTAMP_FORMAT);
}

/**
 * Timestamp for a row written now, in the server's local wall-clock time.
 */
export function nowTimestamp(): string {
  return dayjs().format(TIMESTAMP_FORMAT);
}
