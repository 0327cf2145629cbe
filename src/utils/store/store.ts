import { TableName, TransactionStore } from './types';
import { StoreConfig, getConfig } from '../config/config';
import { SheetsStore } from './sheets';
import { CsvStore } from './csvStore';
import { ServiceAccountAuth } from './googleAuth';
import { columnsFor } from '../../data/tables';
import { loadSettings } from '../io/settings';

/**
 * Builds the store a configuration names.
 */
export function createStore(config: StoreConfig): TransactionStore {
  switch (config.kind) {
    case 'sheets':
      return new SheetsStore(config.spreadsheetId, new ServiceAccountAuth(config.clientEmail, config.privateKey));
    case 'csv':
      return new CsvStore(config.directory, (table: TableName) => columnsFor(table, loadSettings().users));
  }
}

let store: TransactionStore | undefined;

/**
 * The process-wide store. Sheets access tokens are cached on it, so it is built once.
 */
export function getStore(): TransactionStore {
  if (!store) {
    store = createStore(getConfig().store);
  }
  return store;
}
