import { Request } from 'express';
import { ApiError } from '../errors';
import { Session } from '../../utils/session/types';
import { countSessions, createSession, deleteSession, getSession, setSelectedDate } from '../../utils/session/session';
import { debug } from '../../utils/log';
import { isValidDate } from '../../utils/date/date';

export function startSession(_request: Request): Session {
  const session = createSession();
  debug('Started session', { id: session.id, active: countSessions() });
  return session;
}

/**
 * @throws ApiError (404) if the session does not exist
 */
export function getFormSession(request: Request): Session {
  const session = getSession(request.params.id);
  if (!session) {
    throw new ApiError('Session not found', 404);
  }
  return session;
}

/**
 * Sets the session's selected date from `{ selectedDate }` in the body.
 *
 * @throws ApiError (400) if the date is not YYYY-MM-DD, (404) if the session does not exist
 */
export function updateFormSession(request: Request): Session {
  const selectedDate: unknown = request.body?.selectedDate;
  if (typeof selectedDate !== 'string' || !isValidDate(selectedDate)) {
    throw new ApiError('selectedDate must be a date in YYYY-MM-DD format', 400);
  }
  const session = setSelectedDate(request.params.id, selectedDate);
  if (!session) {
    throw new ApiError('Session not found', 404);
  }
  return session;
}

/**
 * Ends a session once the forms are closed.
 *
 * @throws ApiError (404) if the session does not exist
 */
export function endFormSession(request: Request): { deleted: true } {
  if (!deleteSession(request.params.id)) {
    throw new ApiError('Session not found', 404);
  }
  return { deleted: true };
}
