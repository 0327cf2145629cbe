import { CellValue, TableName } from '../store/types';

/**
 * The store could not be reached or refused our credentials. Fatal for the
 * evaluation that hit it.
 */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * The store was reachable but did not accept an appended row.
 */
export class AppendError extends Error {
  table: TableName;

  constructor(table: TableName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppendError';
    this.table = table;
  }
}

/**
 * A submission failed validation. Raised before the store is touched.
 */
export class ValidationError extends Error {
  errors: string[];

  constructor(errors: string[]) {
    super(errors.join('; '));
    this.name = 'ValidationError';
    this.errors = errors;
  }
}

/**
 * A single store row could not be coerced. Collected, counted and dropped; never thrown.
 *
 * @param rowNumber - Row number as the spreadsheet shows it (the header is row 1)
 */
export class DataFormatError extends Error {
  rowNumber: number;
  column: string;
  value: CellValue | undefined;

  constructor(rowNumber: number, column: string, value: CellValue | undefined) {
    super(`Row ${rowNumber}: cannot read ${column} from '${value ?? ''}'`);
    this.name = 'DataFormatError';
    this.rowNumber = rowNumber;
    this.column = column;
    this.value = value;
  }
}
