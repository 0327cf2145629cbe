import { BudgetRow, Expense, IncomeRecord } from '../../data/transaction/types';
import { BUDGET_CATEGORY_COLUMN, BUDGET_TOTAL_COLUMN } from '../../data/tables';
import { CellValue, RawRow } from '../store/types';
import { DataFormatError } from '../errors/errors';
import { parseSheetDate, parseTimestamp } from '../date/date';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type CoercedRows<T> = {
  rows: T[];
  dropped: number;
  errors: DataFormatError[];
};

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// Row 1 of every table is its header
const FIRST_DATA_ROW = 2;

function ok<T>(value: T): Result<T, DataFormatError> {
  return { ok: true, value };
}

function fail<T>(index: number, column: string, value: CellValue | undefined): Result<T, DataFormatError> {
  return { ok: false, error: new DataFormatError(index + FIRST_DATA_ROW, column, value) };
}

/**
 * Renders a cell as trimmed text. Blank cells read as ''.
 */
export function cellText(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value).trim();
}

/**
 * True when every cell of the row is empty. Stores keep blank rows in place so a
 * row's position still gives its row number.
 */
export function isBlankRow(row: RawRow): boolean {
  return Object.values(row).every((cell) => cellText(cell) === '');
}

/**
 * Reads a numeric cell. Accepts numbers and plain decimal strings; anything else
 * (currency symbols, thousands separators, hex, Infinity) is unreadable.
 *
 * @returns The number, or null when the cell does not hold a finite number
 */
export function coerceNumber(value: CellValue | undefined): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }
  const text = value.trim();
  if (!NUMBER_PATTERN.test(text)) {
    return null;
  }
  const n = Number(text);
  return Number.isFinite(n) ? n : null;
}

/**
 * Reads a transaction amount, which must be strictly positive.
 */
export function coerceAmount(value: CellValue | undefined): number | null {
  const n = coerceNumber(value);
  return n !== null && n > 0 ? n : null;
}

function coerceDateCell(value: CellValue | undefined): Date | null {
  return typeof value === 'string' ? parseSheetDate(value) : null;
}

function coerceTimestampCell(value: CellValue | undefined): Date | null {
  return typeof value === 'string' ? parseTimestamp(value) : null;
}

/**
 * Coerces one Expenses row.
 *
 * @param row - Store row keyed by header
 * @param index - Zero-based position among the data rows
 */
export function coerceExpense(row: RawRow, index: number): Result<Expense, DataFormatError> {
  const amount = coerceAmount(row['Amount']);
  if (amount === null) {
    return fail(index, 'Amount', row['Amount']);
  }
  const purchaseDate = coerceDateCell(row['Purchase Date']);
  if (purchaseDate === null) {
    return fail(index, 'Purchase Date', row['Purchase Date']);
  }
  return ok({
    timestamp: coerceTimestampCell(row['Timestamp']),
    user: cellText(row['User']),
    purchaseDate,
    item: cellText(row['Item']),
    amount,
    category: cellText(row['Category']),
    paymentMethod: cellText(row['Payment Method']),
  });
}

/**
 * Coerces one Income row.
 */
export function coerceIncome(row: RawRow, index: number): Result<IncomeRecord, DataFormatError> {
  const amount = coerceAmount(row['Income Amount']);
  if (amount === null) {
    return fail(index, 'Income Amount', row['Income Amount']);
  }
  const date = coerceDateCell(row['Date']);
  if (date === null) {
    return fail(index, 'Date', row['Date']);
  }
  return ok({
    timestamp: coerceTimestampCell(row['Timestamp']),
    user: cellText(row['User']),
    date,
    source: cellText(row['Source']),
    description: cellText(row['Description']),
    amount,
  });
}

/**
 * Coerces one Budget row. Blank allocations count as 0; the total must be a
 * number >= 0 and the category must be present.
 *
 * @param users - Configured users, one allocation column each
 */
export function coerceBudget(row: RawRow, index: number, users: string[]): Result<BudgetRow, DataFormatError> {
  const category = cellText(row[BUDGET_CATEGORY_COLUMN]);
  if (category === '') {
    return fail(index, BUDGET_CATEGORY_COLUMN, row[BUDGET_CATEGORY_COLUMN]);
  }
  const totalBudget = coerceNumber(row[BUDGET_TOTAL_COLUMN]);
  if (totalBudget === null || totalBudget < 0) {
    return fail(index, BUDGET_TOTAL_COLUMN, row[BUDGET_TOTAL_COLUMN]);
  }

  const allocations: Record<string, number> = {};
  for (const user of users) {
    const cell = row[user];
    if (cellText(cell) === '') {
      allocations[user] = 0;
      continue;
    }
    const allocation = coerceNumber(cell);
    if (allocation === null) {
      return fail(index, user, cell);
    }
    allocations[user] = allocation;
  }

  return ok({ category, allocations, totalBudget });
}

/**
 * Runs a row coercion over a whole table, keeping the rows that coerce and
 * counting the ones that don't. Blank rows are skipped without counting.
 *
 * @example
 * ```typescript
 * const { rows, dropped } = coerceRows(rawExpenses, coerceExpense);
 * ```
 */
export function coerceRows<T>(
  rows: RawRow[],
  coerce: (row: RawRow, index: number) => Result<T, DataFormatError>,
): CoercedRows<T> {
  const valid: T[] = [];
  const errors: DataFormatError[] = [];
  rows.forEach((row, index) => {
    if (isBlankRow(row)) {
      return;
    }
    const result = coerce(row, index);
    if (result.ok) {
      valid.push(result.value);
    } else {
      errors.push(result.error);
    }
  });
  return { rows: valid, dropped: errors.length, errors };
}
