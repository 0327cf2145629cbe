import { TableName } from '../utils/store/types';

export const EXPENSES_TABLE: TableName = 'Expenses';
export const INCOME_TABLE: TableName = 'Income';
export const BUDGET_TABLE: TableName = 'Budget';

export const EXPENSE_COLUMNS = [
  'Timestamp',
  'User',
  'Purchase Date',
  'Item',
  'Amount',
  'Category',
  'Payment Method',
] as const;

export const INCOME_COLUMNS = ['Timestamp', 'User', 'Date', 'Source', 'Description', 'Income Amount'] as const;

export const BUDGET_CATEGORY_COLUMN = 'Category';
export const BUDGET_TOTAL_COLUMN = 'Total Budget';

/**
 * Budget columns depend on who is in the household: one allocation column per user
 * sits between the category and the total.
 *
 * @example
 * ```typescript
 * budgetColumns(['Mikael', 'Josephine']);
 * // ['Category', 'Mikael', 'Josephine', 'Total Budget']
 * ```
 */
export function budgetColumns(users: string[]): string[] {
  return [BUDGET_CATEGORY_COLUMN, ...users, BUDGET_TOTAL_COLUMN];
}

/**
 * Header row for a table. Budget needs the configured users to know its middle columns.
 */
export function columnsFor(table: TableName, users: string[]): string[] {
  switch (table) {
    case 'Expenses':
      return [...EXPENSE_COLUMNS];
    case 'Income':
      return [...INCOME_COLUMNS];
    case 'Budget':
      return budgetColumns(users);
  }
}
