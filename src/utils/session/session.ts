import { v4 as uuidv4 } from 'uuid';
import { Session } from './types';
import { DateString } from '../date/types';
import { parseDate } from '../date/date';

// Sessions unused for a day are forgotten
export const SESSION_TTL_MS = 24 * 60 * 60 * 1000;

type StoredSession = {
  session: Session;
  lastUsedAt: number;
};

const sessions = new Map<string, StoredSession>();

function isExpired(stored: StoredSession, now: number): boolean {
  return now - stored.lastUsedAt > SESSION_TTL_MS;
}

function evictExpired(now: number) {
  for (const [id, stored] of sessions) {
    if (isExpired(stored, now)) {
      sessions.delete(id);
    }
  }
}

// Looks up a live session and marks it used; expired sessions are dropped here
function touch(id: string): Session | null {
  const stored = sessions.get(id);
  if (!stored) {
    return null;
  }
  const now = Date.now();
  if (isExpired(stored, now)) {
    sessions.delete(id);
    return null;
  }
  stored.lastUsedAt = now;
  return stored.session;
}

/**
 * Starts a new form session with no selected date. Expired sessions are evicted
 * first.
 */
export function createSession(): Session {
  const now = Date.now();
  evictExpired(now);
  const session: Session = {
    id: uuidv4(),
    selectedDate: null,
    createdAt: new Date(now).toISOString(),
  };
  sessions.set(session.id, { session, lastUsedAt: now });
  return { ...session };
}

/**
 * @returns A copy of the session, or null when the id is unknown or expired
 */
export function getSession(id: string): Session | null {
  const session = touch(id);
  return session ? { ...session } : null;
}

/**
 * Remembers the date the user picked so the entry forms default to it.
 *
 * @param date - YYYY-MM-DD
 * @returns The updated session, or null when the id is unknown or expired
 * @throws Error if the date is not a valid YYYY-MM-DD date
 */
export function setSelectedDate(id: string, date: DateString): Session | null {
  const session = touch(id);
  if (!session) {
    return null;
  }
  parseDate(date);
  session.selectedDate = date;
  return { ...session };
}

export function deleteSession(id: string): boolean {
  return sessions.delete(id);
}

export function countSessions(): number {
  return sessions.size;
}

export function clearSessions(): void {
  sessions.clear();
}
