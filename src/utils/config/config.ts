import path from 'path';

// Repository root: this file lives at src/utils/config (or dist/src/utils/config once built)
const ROOT_DIR = path.resolve(__dirname, __dirname.includes(`${path.sep}dist${path.sep}`) ? '../../../..' : '../../..');

export type SheetsStoreConfig = {
  kind: 'sheets';
  spreadsheetId: string;
  clientEmail: string;
  privateKey: string;
};

export type CsvStoreConfig = {
  kind: 'csv';
  directory: string;
};

export type StoreConfig = SheetsStoreConfig | CsvStoreConfig;

export type AppConfig = {
  port: number;
  jwtSecret: string;
  dataDir: string;
  store: StoreConfig;
};

const DEFAULT_PORT = 5002;

/**
 * Private keys pasted into .env usually carry literal `\n` sequences.
 */
function unescapeKey(key: string): string {
  return key.replace(/\\n/g, '\n');
}

function parsePort(value: string | undefined, errors: string[]): number {
  if (!value) {
    return DEFAULT_PORT;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    errors.push(`PORT must be an integer between 1 and 65535, got '${value}'`);
    return DEFAULT_PORT;
  }
  return port;
}

/**
 * `DATA_DIR`, or `data/` at the repository root.
 */
export function resolveDataDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.DATA_DIR ? path.resolve(env.DATA_DIR) : path.join(ROOT_DIR, 'data');
}

/**
 * `CSV_STORE_DIR`, or `store/` under the data directory. Shared with the CSV
 * migration script so both work on the same files.
 */
export function resolveCsvStoreDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.CSV_STORE_DIR ? path.resolve(env.CSV_STORE_DIR) : path.join(resolveDataDir(env), 'store');
}

/**
 * Builds the application configuration from environment variables.
 *
 * @param env - Environment to read, `process.env` by default (after dotenv has loaded `.env`)
 * @throws Error listing every missing or invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig({ JWT_SECRET: 'test-secret', STORE: 'csv' });
 * // {
 * //   port: 5002,
 * //   jwtSecret: 'test-secret',
 * //   dataDir: '<root>/data',
 * //   store: { kind: 'csv', directory: '<root>/data/store' }
 * // }
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const errors: string[] = [];

  const port = parsePort(env.PORT, errors);
  const jwtSecret = env.JWT_SECRET ?? '';
  if (!jwtSecret) {
    errors.push('JWT_SECRET is required');
  }
  const dataDir = resolveDataDir(env);

  let store: StoreConfig;
  const kind = env.STORE || 'csv';
  if (kind === 'sheets') {
    const spreadsheetId = env.SPREADSHEET_ID ?? '';
    const clientEmail = env.GOOGLE_CLIENT_EMAIL ?? '';
    const privateKey = unescapeKey(env.GOOGLE_PRIVATE_KEY ?? '');
    if (!spreadsheetId) {
      errors.push('SPREADSHEET_ID is required when STORE is sheets');
    }
    if (!clientEmail) {
      errors.push('GOOGLE_CLIENT_EMAIL is required when STORE is sheets');
    }
    if (!privateKey) {
      errors.push('GOOGLE_PRIVATE_KEY is required when STORE is sheets');
    }
    store = { kind, spreadsheetId, clientEmail, privateKey };
  } else if (kind === 'csv') {
    store = { kind, directory: resolveCsvStoreDir(env) };
  } else {
    errors.push(`STORE must be 'sheets' or 'csv', got '${kind}'`);
    store = { kind: 'csv', directory: path.join(dataDir, 'store') };
  }

  if (errors.length > 0) {
    throw new Error(`Invalid configuration: ${errors.join('; ')}`);
  }

  return { port, jwtSecret, dataDir, store };
}

let config: AppConfig | undefined;

/**
 * The process-wide configuration, loaded from the environment on first use.
 */
export function getConfig(): AppConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}
