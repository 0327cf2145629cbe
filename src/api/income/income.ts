import { Request } from 'express';
import { INCOME_TABLE } from '../../data/tables';
import { SubmissionResult, saveSubmission } from '../submission';
import { loadSettings } from '../../utils/io/settings';
import { toIncomeFields, validateIncomeSubmission } from '../../utils/validate/submission';

/**
 * Validates and records an income entry.
 *
 * @throws ValidationError before anything is written
 */
export async function addIncome(request: Request): Promise<SubmissionResult> {
  const submission = validateIncomeSubmission(request.body, loadSettings());
  return saveSubmission(INCOME_TABLE, toIncomeFields(submission), submission.sessionId, submission.date);
}
