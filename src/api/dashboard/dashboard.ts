import { Request } from 'express';
import { DashboardReport } from '../../data/report/types';
import { BUDGET_TABLE, EXPENSES_TABLE, INCOME_TABLE } from '../../data/tables';
import { ApiError } from '../errors';
import { loadSettings } from '../../utils/io/settings';
import { getStore } from '../../utils/store/store';
import { getSession } from '../../utils/session/session';
import { evaluateReport } from '../../utils/report/report';
import { getLimit, getSessionId, getToday } from '../../utils/net/request';

/**
 * Evaluates the dashboard for the period containing `?today=` (the server date by default).
 * `?limit=` overrides how many recent expenses are listed.
 *
 * Reads each table once, in turn. Any store failure fails the whole request; no
 * partial report is returned.
 *
 * @throws ApiError (404) if a session id is given but unknown
 * @throws ConnectionError if the store cannot be read
 */
export async function getDashboard(request: Request): Promise<DashboardReport> {
  const today = getToday(request);
  const settings = loadSettings();
  const recentLimit = getLimit(request, settings.recentLimit);
  const sessionId = getSessionId(request);
  const session = sessionId ? getSession(sessionId) : null;
  if (sessionId && !session) {
    throw new ApiError('Session not found', 404);
  }

  const store = getStore();
  const expenses = await store.readAll(EXPENSES_TABLE);
  const income = await store.readAll(INCOME_TABLE);
  const budget = await store.readAll(BUDGET_TABLE);

  return evaluateReport(
    { expenses, income, budget },
    {
      today,
      settings,
      selectedDate: session?.selectedDate ?? null,
      recentLimit,
    },
  );
}
