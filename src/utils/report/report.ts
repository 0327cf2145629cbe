import { BudgetRow, Expense, IncomeRecord } from '../../data/transaction/types';
import { Settings } from '../../data/settings/types';
import { DashboardReport, DroppedRows, RecentTransaction } from '../../data/report/types';
import { RawRow } from '../store/types';
import { DateString } from '../date/types';
import { formatDate, formatSheetDate, formatTimestamp } from '../date/date';
import { currentPeriod } from '../period/period';
import { coerceBudget, coerceExpense, coerceIncome, coerceRows } from '../coerce/coerce';
import {
  compareBudget,
  expensesInPeriod,
  incomeInPeriod,
  recentExpenses,
  roundToCents,
  sumAmounts,
  totalsByCategory,
  totalsBySource,
  totalsByUser,
} from '../aggregate/aggregate';
import { toBudgetChart, toBudgetDisplay } from '../format/format';
import { warn } from '../log';

export type ReportTables = {
  expenses: RawRow[];
  income: RawRow[];
  budget: RawRow[];
};

export type ReportContext = {
  today: Date;
  settings: Settings;
  // Date the session last picked for the entry forms
  selectedDate?: DateString | null;
  // Overrides settings.recentLimit
  recentLimit?: number;
};

export function serializeExpense(expense: Expense): RecentTransaction {
  return {
    timestamp: expense.timestamp ? formatTimestamp(expense.timestamp) : null,
    user: expense.user,
    purchaseDate: formatSheetDate(expense.purchaseDate),
    item: expense.item,
    amount: expense.amount,
    category: expense.category,
    paymentMethod: expense.paymentMethod,
  };
}

/**
 * Coerces the expense table on its own, for views that need no other table.
 */
export function readExpenses(rows: RawRow[]): { expenses: Expense[]; dropped: number } {
  const { rows: expenses, dropped, errors } = coerceRows(rows, coerceExpense);
  reportDrops('Expenses', dropped, errors);
  return { expenses, dropped };
}

function reportDrops(table: string, dropped: number, errors: Error[]) {
  if (dropped > 0) {
    warn('Dropped rows', { table, dropped, first: errors[0] });
  }
}

/**
 * Evaluates the dashboard for the accounting period containing `today`.
 *
 * Rows that cannot be read are dropped and counted per table; they never stop the
 * evaluation. The result depends only on the tables and the context, so evaluating
 * twice gives the same report.
 *
 * @param tables - Raw rows of the three tables, as the store returned them
 * @param context - Today's date, the settings and the session's selected date
 *
 * @example
 * ```typescript
 * const report = evaluateReport(tables, { today: parseDate('2024-03-15'), settings });
 * // report.period -> { start: '2024-02-28', end: '2024-03-28' }
 * ```
 */
export function evaluateReport(tables: ReportTables, context: ReportContext): DashboardReport {
  const { settings } = context;
  const period = currentPeriod(context.today, settings.periodAnchorDay);

  const { expenses, dropped: droppedExpenses } = readExpenses(tables.expenses);
  const income = coerceRows<IncomeRecord>(tables.income, coerceIncome);
  reportDrops('Income', income.dropped, income.errors);
  const budget = coerceRows<BudgetRow>(tables.budget, (row, index) => coerceBudget(row, index, settings.users));
  reportDrops('Budget', budget.dropped, budget.errors);

  const periodExpenses = expensesInPeriod(expenses, period);
  const periodIncome = incomeInPeriod(income.rows, period);

  const categories = totalsByCategory(periodExpenses, settings.categories);
  const budgetRows = compareBudget(budget.rows, categories);
  const spent = sumAmounts(periodExpenses);
  const earned = sumAmounts(periodIncome);

  const dropped: DroppedRows = {
    expenses: droppedExpenses,
    income: income.dropped,
    budget: budget.dropped,
  };

  return {
    period: { start: formatDate(period.start), end: formatDate(period.end) },
    categories,
    users: totalsByUser(periodExpenses, settings.users),
    budget: {
      rows: budgetRows,
      display: toBudgetDisplay(budgetRows),
      chart: toBudgetChart(budgetRows),
    },
    income: totalsBySource(periodIncome, settings.incomeSources),
    totals: { spent, income: earned, net: roundToCents(earned - spent) },
    recent: recentExpenses(expenses, context.recentLimit ?? settings.recentLimit).map(serializeExpense),
    dropped,
    formDefaults: { date: context.selectedDate ?? formatDate(context.today) },
  };
}
