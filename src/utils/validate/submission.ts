import { ExpenseSubmission, IncomeSubmission } from '../../data/transaction/types';
import { Settings } from '../../data/settings/types';
import { CellValue } from '../store/types';
import { ValidationError } from '../errors/errors';
import { coerceNumber } from '../coerce/coerce';
import { roundToCents } from '../aggregate/aggregate';
import { formatSheetDate, isValidDate, nowTimestamp, parseDate } from '../date/date';

type Fields = Record<string, unknown>;

function isFields(body: unknown): body is Fields {
  return typeof body === 'object' && body !== null && !Array.isArray(body);
}

function requireChoice(body: Fields, field: string, choices: string[], errors: string[]): string {
  const value = body[field];
  if (typeof value !== 'string' || !choices.includes(value)) {
    errors.push(`${field} must be one of: ${choices.join(', ')}`);
    return '';
  }
  return value;
}

function requireText(body: Fields, field: string, errors: string[]): string {
  const value = body[field];
  if (typeof value !== 'string' || value.trim() === '') {
    errors.push(`${field} must not be empty`);
    return '';
  }
  return value.trim();
}

function requireDate(body: Fields, field: string, errors: string[]): string {
  const value = body[field];
  if (typeof value === 'string' && isValidDate(value)) {
    return value;
  }
  errors.push(`${field} must be a date in YYYY-MM-DD format`);
  return '';
}

function requireAmount(body: Fields, field: string, errors: string[]): number {
  const value = body[field];
  const amount = typeof value === 'number' || typeof value === 'string' ? coerceNumber(value) : null;
  if (amount === null) {
    errors.push(`${field} must be a number`);
    return 0;
  }
  if (roundToCents(amount) <= 0) {
    errors.push(`${field} must be at least 0.01`);
    return 0;
  }
  return amount;
}

function optionalSessionId(body: Fields, errors: string[]): string | undefined {
  const value = body.sessionId;
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value === '') {
    errors.push('sessionId must be a non-empty string');
    return undefined;
  }
  return value;
}

/**
 * Checks an expense form submission against the configured label sets.
 *
 * @param body - Request body
 * @throws ValidationError listing every problem found
 *
 * @example
 * ```typescript
 * validateExpenseSubmission(
 *   { user: 'Mikael', purchaseDate: '2024-03-01', item: 'Coffee', amount: 4.5, category: 'Food & Drink', paymentMethod: 'CC' },
 *   settings,
 * );
 * ```
 */
export function validateExpenseSubmission(body: unknown, settings: Settings): ExpenseSubmission {
  if (!isFields(body)) {
    throw new ValidationError(['Submission must be an object']);
  }
  const errors: string[] = [];
  const submission: ExpenseSubmission = {
    user: requireChoice(body, 'user', settings.users, errors),
    purchaseDate: requireDate(body, 'purchaseDate', errors),
    item: requireText(body, 'item', errors),
    amount: requireAmount(body, 'amount', errors),
    category: requireChoice(body, 'category', settings.categories, errors),
    paymentMethod: requireChoice(body, 'paymentMethod', settings.paymentMethods, errors),
    sessionId: optionalSessionId(body, errors),
  };
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
  return submission;
}

/**
 * Checks an income form submission against the configured label sets.
 *
 * @throws ValidationError listing every problem found
 */
export function validateIncomeSubmission(body: unknown, settings: Settings): IncomeSubmission {
  if (!isFields(body)) {
    throw new ValidationError(['Submission must be an object']);
  }
  const errors: string[] = [];
  const submission: IncomeSubmission = {
    user: requireChoice(body, 'user', settings.users, errors),
    date: requireDate(body, 'date', errors),
    source: requireChoice(body, 'source', settings.incomeSources, errors),
    description: requireText(body, 'description', errors),
    amount: requireAmount(body, 'amount', errors),
    sessionId: optionalSessionId(body, errors),
  };
  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
  return submission;
}

/**
 * Expenses row for a validated submission, in column order.
 *
 * @param timestamp - When the row is recorded, `MM/DD/YYYY HH:mm:ss`
 */
export function toExpenseFields(submission: ExpenseSubmission, timestamp: string = nowTimestamp()): CellValue[] {
  return [
    timestamp,
    submission.user,
    formatSheetDate(parseDate(submission.purchaseDate)),
    submission.item,
    roundToCents(submission.amount),
    submission.category,
    submission.paymentMethod,
  ];
}

/**
 * Income row for a validated submission, in column order.
 */
export function toIncomeFields(submission: IncomeSubmission, timestamp: string = nowTimestamp()): CellValue[] {
  return [
    timestamp,
    submission.user,
    formatSheetDate(parseDate(submission.date)),
    submission.source,
    submission.description,
    roundToCents(submission.amount),
  ];
}
