import { describe, it, expect, vi } from 'vitest';

vi.mock('../config/config', () => ({
  getConfig: vi.fn(() => ({ store: { kind: 'csv', directory: '/srv/tracker-rows' } })),
}));
vi.mock('../io/settings', () => ({
  loadSettings: vi.fn(() => ({ users: ['Mikael', 'Josephine'] })),
}));

import { createStore, getStore } from './store';
import { CsvStore } from './csvStore';
import { SheetsStore } from './sheets';
import { getConfig } from '../config/config';

describe('createStore', () => {
  it('should build a CSV store in the configured directory', () => {
    const store = createStore({ kind: 'csv', directory: '/srv/tracker-rows' });

    expect(store).toBeInstanceOf(CsvStore);
    expect(store instanceof CsvStore && store.tablePath('Budget')).toBe('/srv/tracker-rows/Budget.csv');
  });

  it('should build a Sheets store', () => {
    const store = createStore({
      kind: 'sheets',
      spreadsheetId: 'sheet-123',
      clientEmail: 'tracker@example.com',
      privateKey: 'test-key',
    });

    expect(store).toBeInstanceOf(SheetsStore);
  });
});

describe('getStore', () => {
  it('should build the store once', () => {
    const first = getStore();

    expect(getStore()).toBe(first);
    expect(first).toBeInstanceOf(CsvStore);
    expect(getConfig).toHaveBeenCalledTimes(1);
  });
});
