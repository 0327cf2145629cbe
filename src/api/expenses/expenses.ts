import { Request } from 'express';
import { RecentTransaction } from '../../data/report/types';
import { EXPENSES_TABLE } from '../../data/tables';
import { SubmissionResult, saveSubmission } from '../submission';
import { loadSettings } from '../../utils/io/settings';
import { getStore } from '../../utils/store/store';
import { toExpenseFields, validateExpenseSubmission } from '../../utils/validate/submission';
import { readExpenses, serializeExpense } from '../../utils/report/report';
import { recentExpenses } from '../../utils/aggregate/aggregate';
import { getLimit } from '../../utils/net/request';

/**
 * Validates and records an expense.
 *
 * @param request - Express request with the expense form in the body
 * @returns The written row, or a warning when the store refused it
 * @throws ValidationError before anything is written
 */
export async function addExpense(request: Request): Promise<SubmissionResult> {
  const submission = validateExpenseSubmission(request.body, loadSettings());
  return saveSubmission(EXPENSES_TABLE, toExpenseFields(submission), submission.sessionId, submission.purchaseDate);
}

/**
 * Most recently recorded expenses across all periods, newest first.
 *
 * @param request - Express request, optionally with `?limit=`
 */
export async function getRecentExpenses(request: Request): Promise<RecentTransaction[]> {
  const limit = getLimit(request, loadSettings().recentLimit);
  const { expenses } = readExpenses(await getStore().readAll(EXPENSES_TABLE));
  return recentExpenses(expenses, limit).map(serializeExpense);
}
