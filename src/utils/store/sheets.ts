import { CellValue, RawRow, TableName, TransactionStore } from './types';
import { ServiceAccountAuth, safeText } from './googleAuth';
import { AppendError, ConnectionError } from '../errors/errors';
import { debug } from '../log';

export const SHEETS_API_URL = 'https://sheets.googleapis.com/v4/spreadsheets';

type ValuesResponse = {
  values?: unknown[][];
};

function isValuesResponse(value: unknown): value is ValuesResponse {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('values' in value) || value.values === undefined) {
    return true;
  }
  return Array.isArray(value.values) && value.values.every((row) => Array.isArray(row));
}

function toCell(value: unknown): CellValue {
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return null;
}

/**
 * Maps the value grid of a sheet to rows keyed by the header row. Sheets leaves out
 * trailing empty cells, so short rows read the missing columns as null. Blank rows
 * stay in place as all-null records, so data row `i` is sheet row `i + 2`.
 */
export function toRawRows(values: unknown[][]): RawRow[] {
  if (values.length === 0) {
    return [];
  }
  const header = values[0].map((cell) => String(cell ?? '').trim());
  return values.slice(1).map((row) => {
    const record: RawRow = {};
    header.forEach((column, i) => {
      if (column !== '') {
        record[column] = toCell(row[i]);
      }
    });
    return record;
  });
}

/**
 * Rows stored in the tabs of a Google spreadsheet, one tab per table, reached
 * through the Sheets REST API with a service account.
 */
export class SheetsStore implements TransactionStore {
  private spreadsheetId: string;
  private auth: ServiceAccountAuth;

  constructor(spreadsheetId: string, auth: ServiceAccountAuth) {
    this.spreadsheetId = spreadsheetId;
    this.auth = auth;
  }

  private async request(url: string, init: RequestInit = {}): Promise<Response> {
    const token = await this.auth.getAccessToken();
    try {
      return await fetch(url, {
        ...init,
        headers: { Authorization: `Bearer ${token}`, 'Content-Type': 'application/json' },
      });
    } catch (error) {
      throw new ConnectionError('Could not reach Google Sheets', { cause: error });
    }
  }

  async readAll(table: TableName): Promise<RawRow[]> {
    const params = new URLSearchParams({
      valueRenderOption: 'UNFORMATTED_VALUE',
      dateTimeRenderOption: 'FORMATTED_STRING',
    });
    const res = await this.request(
      `${SHEETS_API_URL}/${this.spreadsheetId}/values/${encodeURIComponent(table)}?${params.toString()}`,
    );
    if (!res.ok) {
      const body = await safeText(res);
      throw new ConnectionError(`Read ${table} failed: ${res.status} ${body}`);
    }
    const json: unknown = await res.json();
    if (!isValuesResponse(json)) {
      throw new ConnectionError(`Read ${table} returned an unexpected response`);
    }
    const rows = toRawRows(json.values ?? []);
    debug('Read', rows.length, 'rows', { table });
    return rows;
  }

  async appendRow(table: TableName, fields: CellValue[]): Promise<void> {
    const params = new URLSearchParams({ valueInputOption: 'RAW', insertDataOption: 'INSERT_ROWS' });
    const range = encodeURIComponent(`${table}!A1`);
    const res = await this.request(
      `${SHEETS_API_URL}/${this.spreadsheetId}/values/${range}:append?${params.toString()}`,
      {
        method: 'POST',
        body: JSON.stringify({ values: [fields] }),
      },
    );
    if (res.status === 401 || res.status === 403) {
      const body = await safeText(res);
      throw new ConnectionError(`Append to ${table} was not authorized: ${res.status} ${body}`);
    }
    if (!res.ok) {
      const body = await safeText(res);
      throw new AppendError(table, `Append to ${table} failed: ${res.status} ${body}`);
    }
  }
}
