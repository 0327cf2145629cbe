import { Request } from 'express';
import { ApiError } from '../../api/errors';
import { isValidDate, parseDate, today } from '../date/date';

export const MAX_RECENT_LIMIT = 100;

/**
 * The date the report is evaluated for: `?today=YYYY-MM-DD`, or the server's date.
 *
 * @throws ApiError (400) if the query value is not a valid date
 */
export function getToday(request: Request): Date {
  const value = request.query.today;
  if (value === undefined || value === '') {
    return today();
  }
  if (typeof value !== 'string' || !isValidDate(value)) {
    throw new ApiError('today must be a date in YYYY-MM-DD format', 400);
  }
  return parseDate(value);
}

/**
 * Number of recent transactions to list: `?limit=`, capped at 100.
 *
 * @param defaultLimit - Used when the query has no limit
 * @throws ApiError (400) if the limit is not a positive integer
 */
export function getLimit(request: Request, defaultLimit: number): number {
  const value = request.query.limit;
  if (value === undefined || value === '') {
    return Math.min(defaultLimit, MAX_RECENT_LIMIT);
  }
  const limit = typeof value === 'string' && /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ApiError('limit must be a positive integer', 400);
  }
  return Math.min(limit, MAX_RECENT_LIMIT);
}

/**
 * Session id from the `X-Session-Id` header, falling back to `?sessionId=`.
 */
export function getSessionId(request: Request): string | undefined {
  const header = request.headers['x-session-id'];
  if (typeof header === 'string' && header !== '') {
    return header;
  }
  const query = request.query.sessionId;
  return typeof query === 'string' && query !== '' ? query : undefined;
}
