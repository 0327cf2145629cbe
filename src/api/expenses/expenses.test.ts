import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../utils/store/store', () => ({ getStore: vi.fn() }));
vi.mock('../../utils/io/settings', () => ({ loadSettings: vi.fn() }));
vi.mock('../../utils/log', () => ({ err: vi.fn(), warn: vi.fn() }));

import { getStore } from '../../utils/store/store';
import { loadSettings } from '../../utils/io/settings';
import { err } from '../../utils/log';
import { addExpense, getRecentExpenses } from './expenses';
import { MemoryStore } from '../../utils/test/memoryStore';
import { createMockRequest, createMockSettings } from '../../utils/test/mockData';
import { AppendError, ConnectionError, ValidationError } from '../../utils/errors/errors';
import { clearSessions, createSession, getSession } from '../../utils/session/session';

const coffee = {
  user: 'Mikael',
  purchaseDate: '2024-03-05',
  item: 'Coffee',
  amount: 4.5,
  category: 'Food & Drink',
  paymentMethod: 'CC',
};

describe('Expenses API', () => {
  let store: MemoryStore;

  beforeEach(() => {
    vi.clearAllMocks();
    clearSessions();
    store = new MemoryStore();
    vi.mocked(getStore).mockReturnValue(store);
    vi.mocked(loadSettings).mockReturnValue(createMockSettings());
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2024, 2, 5, 18, 30, 0));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('addExpense', () => {
    it('should append the expense in store formats', async () => {
      const result = await addExpense(createMockRequest({ body: coffee }));

      expect(result).toEqual({
        saved: true,
        row: ['03/05/2024 18:30:00', 'Mikael', '3/5/2024', 'Coffee', 4.5, 'Food & Drink', 'CC'],
      });
      expect(store.tables.Expenses).toEqual([
        {
          Timestamp: '03/05/2024 18:30:00',
          User: 'Mikael',
          'Purchase Date': '3/5/2024',
          Item: 'Coffee',
          Amount: 4.5,
          Category: 'Food & Drink',
          'Payment Method': 'CC',
        },
      ]);
    });

    it('should not touch the store when validation fails', async () => {
      await expect(addExpense(createMockRequest({ body: { ...coffee, amount: -1 } }))).rejects.toBeInstanceOf(
        ValidationError,
      );
      expect(store.tables.Expenses).toEqual([]);
    });

    it('should remember the purchase date for the session', async () => {
      const { id } = createSession();

      await addExpense(createMockRequest({ body: { ...coffee, sessionId: id } }));

      expect(getSession(id)?.selectedDate).toBe('2024-03-05');
    });

    it('should turn a refused append into a warning', async () => {
      vi.spyOn(store, 'appendRow').mockRejectedValue(new AppendError('Expenses', 'Append to Expenses failed: 400'));

      const result = await addExpense(createMockRequest({ body: coffee }));

      expect(result).toEqual({
        saved: false,
        warning: 'Could not save to Expenses: Append to Expenses failed: 400',
      });
      expect(err).toHaveBeenCalledTimes(1);
    });

    it('should fail when the store cannot be reached', async () => {
      vi.spyOn(store, 'appendRow').mockRejectedValue(new ConnectionError('Could not reach Google Sheets'));

      await expect(addExpense(createMockRequest({ body: coffee }))).rejects.toThrow('Could not reach Google Sheets');
    });
  });

  describe('getRecentExpenses', () => {
    beforeEach(async () => {
      await store.appendRow('Expenses', ['03/01/2024 09:00:00', 'Mikael', '3/1/2024', 'Bread', 3, 'Food & Drink', 'Cash']);
      await store.appendRow('Expenses', ['03/03/2024 09:00:00', 'Josephine', '3/3/2024', 'Bus', 2.5, 'Transport', 'Debit']);
      await store.appendRow('Expenses', ['03/02/2024 09:00:00', 'Mikael', '3/2/2024', 'Rent', 'lots', 'Bills', 'Debit']);
    });

    it('should list readable expenses newest first', async () => {
      const recent = await getRecentExpenses(createMockRequest());

      expect(recent.map((row) => row.item)).toEqual(['Bus', 'Bread']);
    });

    it('should honour the requested limit', async () => {
      const recent = await getRecentExpenses(createMockRequest({ query: { limit: '1' } }));

      expect(recent).toEqual([
        {
          timestamp: '03/03/2024 09:00:00',
          user: 'Josephine',
          purchaseDate: '3/3/2024',
          item: 'Bus',
          amount: 2.5,
          category: 'Transport',
          paymentMethod: 'Debit',
        },
      ]);
    });
  });
});
