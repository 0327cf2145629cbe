import { BudgetChartBar, BudgetComparison, BudgetDisplayRow } from '../../data/report/types';

export const OVER_BUDGET_COLOR = '#d9534f';
export const UNDER_BUDGET_COLOR = '#5cb85c';

const amountFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Formats an amount with thousands separators and two decimals.
 *
 * @example
 * ```typescript
 * formatAmount(1234.5); // '1,234.50'
 * formatAmount(-50); // '-50.00'
 * ```
 */
export function formatAmount(amount: number): string {
  return amountFormat.format(amount);
}

/**
 * Budget-vs-actual table with every numeric column formatted for display.
 */
export function toBudgetDisplay(rows: BudgetComparison[]): BudgetDisplayRow[] {
  return rows.map((row) => {
    const allocations: Record<string, string> = {};
    for (const [user, amount] of Object.entries(row.allocations)) {
      allocations[user] = formatAmount(amount);
    }
    return {
      category: row.category,
      allocations,
      totalBudget: formatAmount(row.totalBudget),
      amountSpent: formatAmount(row.amountSpent),
      remaining: formatAmount(row.remaining),
      overBudget: row.overBudget,
    };
  });
}

/**
 * Bars for the budget chart. Over-budget categories get the warning color.
 */
export function toBudgetChart(rows: BudgetComparison[]): BudgetChartBar[] {
  return rows.map((row) => ({
    label: row.category,
    budget: row.totalBudget,
    spent: row.amountSpent,
    color: row.overBudget ? OVER_BUDGET_COLOR : UNDER_BUDGET_COLOR,
  }));
}
