import { parse as parseSync } from 'csv-parse/sync';
import * as csv from 'fast-csv';
import { formatSheetDate, formatTimestamp, parseSheetDate, parseTimestamp } from '../date/date';

/**
 * Rewrites a readable timestamp in the canonical `MM/DD/YYYY HH:mm:ss` form.
 * Unreadable values are returned unchanged.
 */
export function canonicalTimestamp(value: string): string {
  const timestamp = parseTimestamp(value);
  return timestamp ? formatTimestamp(timestamp) : value;
}

/**
 * Rewrites a readable date in the canonical `M/D/YYYY` form. Unreadable values are
 * returned unchanged.
 */
export function canonicalDate(value: string): string {
  const date = parseSheetDate(value);
  return date ? formatSheetDate(date) : value;
}

function isGrid(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'));
}

/**
 * Rewrites the Timestamp column and one date column of a table file into the
 * formats the store writes today.
 *
 * @param text - CSV text with a header row
 * @param dateColumn - `Purchase Date` for Expenses, `Date` for Income
 * @returns The rewritten CSV and the number of cells that changed
 */
export async function migrateCsv(text: string, dateColumn: string): Promise<{ text: string; changed: number }> {
  const grid: unknown = parseSync(text, { skip_empty_lines: true, relax_column_count: true });
  if (!isGrid(grid) || grid.length === 0) {
    return { text, changed: 0 };
  }

  const [header, ...rows] = grid;
  const timestampIndex = header.indexOf('Timestamp');
  const dateIndex = header.indexOf(dateColumn);
  let changed = 0;

  const migrated = rows.map((row) =>
    row.map((cell, i) => {
      let next = cell;
      if (i === timestampIndex) {
        next = canonicalTimestamp(cell);
      } else if (i === dateIndex) {
        next = canonicalDate(cell);
      }
      if (next !== cell) {
        changed++;
      }
      return next;
    }),
  );

  return {
    text: await csv.writeToString([header, ...migrated], { includeEndRowDelimiter: true }),
    changed,
  };
}
