export type TableName = 'Expenses' | 'Income' | 'Budget';

export type CellValue = string | number | boolean | null;

// One store row keyed by the table's header
export type RawRow = Record<string, CellValue>;

/**
 * Row store the tracker reads from and appends to. Implementations reject with
 * ConnectionError when the store cannot be reached and AppendError when an
 * append is refused.
 */
export interface TransactionStore {
  appendRow(table: TableName, fields: CellValue[]): Promise<void>;
  readAll(table: TableName): Promise<RawRow[]>;
}
