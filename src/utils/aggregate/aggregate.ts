import { BudgetRow, Expense, IncomeRecord } from '../../data/transaction/types';
import {
  AccountingPeriod,
  BudgetComparison,
  CategoryTotal,
  SourceTotal,
  UserTotal,
} from '../../data/report/types';
import { isInPeriod } from '../period/period';

/**
 * Rounds to the nearest cent.
 */
export function roundToCents(amount: number): number {
  return Math.round(amount * 100) / 100;
}

/**
 * Sums `amount` per key, remembering the order in which keys were first seen.
 */
function sumBy<T extends { amount: number }>(rows: T[], key: (row: T) => string): Map<string, number> {
  const sums = new Map<string, number>();
  for (const row of rows) {
    const k = key(row);
    sums.set(k, (sums.get(k) ?? 0) + row.amount);
  }
  return sums;
}

/**
 * Left-joins a canonical label list with computed sums. Labels without a sum get 0
 * and sums for labels outside the list are dropped.
 */
function complete(labels: string[], sums: Map<string, number>): { label: string; amount: number }[] {
  return labels.map((label) => ({ label, amount: roundToCents(sums.get(label) ?? 0) }));
}

export function expensesInPeriod(expenses: Expense[], period: AccountingPeriod): Expense[] {
  return expenses.filter((expense) => isInPeriod(expense.purchaseDate, period));
}

export function incomeInPeriod(income: IncomeRecord[], period: AccountingPeriod): IncomeRecord[] {
  return income.filter((record) => isInPeriod(record.date, period));
}

/**
 * Spend per category, completed against the canonical category list.
 *
 * @returns One entry per canonical category, in canonical order
 *
 * @example
 * ```typescript
 * totalsByCategory(
 *   [{ category: 'Bills', amount: 100, ... }, { category: 'Food & Drink', amount: 50, ... }],
 *   ['Bills', 'Food & Drink', 'Transport'],
 * );
 * // [
 * //   { category: 'Bills', amount: 100 },
 * //   { category: 'Food & Drink', amount: 50 },
 * //   { category: 'Transport', amount: 0 },
 * // ]
 * ```
 */
export function totalsByCategory(expenses: Expense[], categories: string[]): CategoryTotal[] {
  return complete(categories, sumBy(expenses, (e) => e.category)).map(({ label, amount }) => ({
    category: label,
    amount,
  }));
}

/**
 * Spend per user, largest first.
 *
 * Users found in the data come first in the order they were first seen, followed by
 * configured users with no spend. The sort is stable, so equal totals keep that order.
 */
export function totalsByUser(expenses: Expense[], users: string[]): UserTotal[] {
  const sums = sumBy(expenses, (e) => e.user);
  for (const user of users) {
    if (!sums.has(user)) {
      sums.set(user, 0);
    }
  }
  return [...sums.entries()]
    .map(([user, amount]) => ({ user, amount: roundToCents(amount) }))
    .sort((a, b) => b.amount - a.amount);
}

/**
 * Income per source, completed against the canonical source list.
 */
export function totalsBySource(income: IncomeRecord[], sources: string[]): SourceTotal[] {
  return complete(sources, sumBy(income, (r) => r.source)).map(({ label, amount }) => ({
    source: label,
    amount,
  }));
}

/**
 * Joins the budget table with actual spend per category.
 *
 * Every budget row appears once, in budget order. Categories with no spend report 0.
 * A negative `remaining` marks the category as over budget.
 */
export function compareBudget(budget: BudgetRow[], spend: CategoryTotal[]): BudgetComparison[] {
  const spentByCategory = new Map(spend.map((total) => [total.category, total.amount]));
  return budget.map((row) => {
    const amountSpent = spentByCategory.get(row.category) ?? 0;
    const remaining = roundToCents(row.totalBudget - amountSpent);
    return {
      category: row.category,
      allocations: { ...row.allocations },
      totalBudget: row.totalBudget,
      amountSpent,
      remaining,
      overBudget: remaining < 0,
    };
  });
}

/**
 * Orders expenses by when they were recorded. Rows without a readable timestamp
 * use their purchase date instead.
 */
export function recencyKey(expense: Expense): number {
  return (expense.timestamp ?? expense.purchaseDate).getTime();
}

/**
 * Most recently recorded expenses first. Ties keep their store order.
 *
 * @param limit - Number of rows to keep
 */
export function recentExpenses(expenses: Expense[], limit: number): Expense[] {
  return [...expenses].sort((a, b) => recencyKey(b) - recencyKey(a)).slice(0, Math.max(0, limit));
}

export function sumAmounts(rows: { amount: number }[]): number {
  return roundToCents(rows.reduce((sum, row) => sum + row.amount, 0));
}
