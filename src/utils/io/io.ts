import { copyFileSync, existsSync, readFileSync, writeFileSync } from 'fs';
import path from 'path';
import { getConfig } from '../config/config';

function dataPath(fn: string): string {
  return path.join(getConfig().dataDir, fn);
}

/**
 * Loads and parses JSON data from a file
 * @template T - The expected type of the loaded data
 * @param fn - Filename relative to the data directory
 * @returns Parsed data object of type T
 * @throws Error if file cannot be read or parsed
 */
export function load<T>(fn: string): T {
  const data = readFileSync(dataPath(fn), 'utf8');
  return JSON.parse(data) as T;
}

/**
 * Saves data to a JSON file, keeping the previous version as `<fn>.bak`
 * @template T - Type of data being saved
 * @param data - Data object to save
 * @param fn - Filename relative to data directory
 */
export function save<T>(data: T, fn: string) {
  const file = dataPath(fn);
  if (existsSync(file)) {
    copyFileSync(file, `${file}.bak`);
  }
  writeFileSync(file, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Checks if a file exists in the data directory
 * @param fn - Filename to check
 * @returns True if file exists, false otherwise
 */
export function checkExists(fn: string) {
  return existsSync(dataPath(fn));
}
