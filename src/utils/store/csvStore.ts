import { appendFileSync, closeSync, existsSync, fstatSync, openSync, readFileSync, readSync, statSync } from 'fs';
import path from 'path';
import { parse as parseSync } from 'csv-parse/sync';
import * as csv from 'fast-csv';
import { CellValue, RawRow, TableName, TransactionStore } from './types';
import { AppendError, ConnectionError } from '../errors/errors';

function isGrid(value: unknown): value is unknown[][] {
  return Array.isArray(value) && value.every((row) => Array.isArray(row));
}

function toText(value: CellValue): string {
  return value === null ? '' : String(value);
}

// Blank lines read as blank records so data row `i` stays on line `i + 2`
function toRecords(grid: unknown[][]): RawRow[] {
  if (grid.length === 0) {
    return [];
  }
  const header = grid[0].map((cell) => String(cell ?? ''));
  return grid.slice(1).map((row) => {
    const record: RawRow = {};
    header.forEach((column, i) => {
      if (column !== '') {
        const cell = row[i];
        record[column] = typeof cell === 'string' ? cell : '';
      }
    });
    return record;
  });
}

function endsWithNewline(file: string): boolean {
  const fd = openSync(file, 'r');
  try {
    const size = fstatSync(fd).size;
    if (size === 0) {
      return true;
    }
    const last = Buffer.alloc(1);
    readSync(fd, last, 0, 1, size - 1);
    return last[0] === 0x0a;
  } finally {
    closeSync(fd);
  }
}

/**
 * Rows kept as CSV files in a local directory, one `<table>.csv` per table with a
 * header row. Used for development and offline bookkeeping.
 */
export class CsvStore implements TransactionStore {
  private directory: string;
  private columns: (table: TableName) => string[];

  /**
   * @param directory - Directory holding the table files
   * @param columns - Header row written when a table file is created
   */
  constructor(directory: string, columns: (table: TableName) => string[]) {
    this.directory = directory;
    this.columns = columns;
  }

  tablePath(table: TableName): string {
    return path.join(this.directory, `${table}.csv`);
  }

  private ensureDirectory() {
    if (!existsSync(this.directory)) {
      throw new ConnectionError(`CSV store directory ${this.directory} does not exist`);
    }
  }

  async readAll(table: TableName): Promise<RawRow[]> {
    this.ensureDirectory();
    const file = this.tablePath(table);
    if (!existsSync(file)) {
      return [];
    }
    let grid: unknown;
    try {
      grid = parseSync(readFileSync(file, 'utf-8'), {
        skip_empty_lines: false,
        trim: true,
        relax_column_count: true,
      });
    } catch (error) {
      throw new ConnectionError(`Could not read ${file}`, { cause: error });
    }
    if (!isGrid(grid)) {
      throw new ConnectionError(`Could not parse ${file}`);
    }
    return toRecords(grid);
  }

  async appendRow(table: TableName, fields: CellValue[]): Promise<void> {
    this.ensureDirectory();
    const file = this.tablePath(table);
    try {
      const isNew = !existsSync(file) || statSync(file).size === 0;
      const rows = isNew ? [this.columns(table), fields.map(toText)] : [fields.map(toText)];
      const text = await csv.writeToString(rows, { includeEndRowDelimiter: true });
      // The new row must start on its own line
      const separator = isNew || endsWithNewline(file) ? '' : '\n';
      appendFileSync(file, separator + text);
    } catch (error) {
      throw new AppendError(table, `Append to ${file} failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error,
      });
    }
  }
}
