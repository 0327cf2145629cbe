import { CellValue, TableName } from '../utils/store/types';
import { getStore } from '../utils/store/store';
import { AppendError } from '../utils/errors/errors';
import { setSelectedDate } from '../utils/session/session';
import { err } from '../utils/log';

export type SubmissionResult = { saved: true; row: CellValue[] } | { saved: false; warning: string };

/**
 * Appends a validated row. A store that refuses the row is reported as a warning so
 * the user can retry; a store that cannot be reached still fails the request.
 *
 * @param sessionId - Session whose selected date becomes `date`
 */
export async function saveSubmission(
  table: TableName,
  row: CellValue[],
  sessionId: string | undefined,
  date: string,
): Promise<SubmissionResult> {
  if (sessionId) {
    setSelectedDate(sessionId, date);
  }
  try {
    await getStore().appendRow(table, row);
  } catch (error) {
    if (error instanceof AppendError) {
      err('Append failed', { table: error.table, error });
      return { saved: false, warning: `Could not save to ${table}: ${error.message}` };
    }
    throw error;
  }
  return { saved: true, row };
}
