#!/usr/bin/env node

/**
 * Migration Script: CSV store date formats
 *
 * Purpose: Rewrite Timestamp and date cells of the CSV store into the formats the
 * server writes today.
 *
 * Before: 03-05-2024 18:30:00, 03-05-2024
 * After:  03/05/2024 18:30:00, 3/5/2024
 *
 * Usage: node dist/scripts/migrate-csv-formats.js [store directory]
 * Without an argument it uses the server's store directory (CSV_STORE_DIR, else
 * <DATA_DIR>/store).
 *
 * This script is idempotent and safe to run multiple times.
 */

import 'dotenv/config';
import * as fs from 'fs';
import * as path from 'path';
import { migrateCsv } from '../src/utils/store/migrate';
import { resolveCsvStoreDir } from '../src/utils/config/config';

const TABLES = [
  { file: 'Expenses.csv', dateColumn: 'Purchase Date' },
  { file: 'Income.csv', dateColumn: 'Date' },
];

function storeDirectory(): string {
  return process.argv[2] ? path.resolve(process.argv[2]) : resolveCsvStoreDir();
}

async function main(): Promise<void> {
  const directory = storeDirectory();
  console.log('Starting CSV format migration...');
  console.log(`Store directory: ${directory}`);

  if (!fs.existsSync(directory)) {
    console.error(`Error: Directory not found at ${directory}`);
    process.exit(1);
  }

  for (const { file, dateColumn } of TABLES) {
    const filePath = path.join(directory, file);
    if (!fs.existsSync(filePath)) {
      console.log(`  - ${file}: not found, skipped`);
      continue;
    }

    const { text, changed } = await migrateCsv(fs.readFileSync(filePath, 'utf-8'), dateColumn);
    if (changed === 0) {
      console.log(`  - ${file}: already migrated`);
      continue;
    }

    // Create backup before modifying
    const backupPath = filePath + `.backup-${Date.now()}`;
    fs.copyFileSync(filePath, backupPath);
    console.log(`  ✓ Created backup: ${backupPath}`);

    fs.writeFileSync(filePath, text, 'utf-8');
    console.log(`  ✓ ${file}: rewrote ${changed} cells`);
  }
}

// Run the migration
main().catch((error) => {
  console.error('Migration failed:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
