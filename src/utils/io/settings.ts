import { load } from './io';
import { Settings } from '../../data/settings/types';
import { DEFAULT_ANCHOR_DAY } from '../period/period';

const FILE_NAME = 'settings';

const DEFAULT_RECENT_LIMIT = 10;

function validateLabels(name: string, labels: unknown, errors: string[]): string[] {
  if (!Array.isArray(labels) || labels.length === 0) {
    errors.push(`${name} must be a non-empty list`);
    return [];
  }
  const valid = labels.filter((label): label is string => typeof label === 'string' && label.trim() !== '');
  if (valid.length !== labels.length) {
    errors.push(`${name} must only contain non-empty names`);
  }
  if (new Set(valid).size !== valid.length) {
    errors.push(`${name} must not contain duplicates`);
  }
  return valid;
}

/**
 * Validates raw settings, returning the typed settings and the list of problems found.
 * Missing anchor day and recent limit take their defaults.
 *
 * @param raw - Parsed settings.json
 */
export function validateSettings(raw: Partial<Record<keyof Settings, unknown>>): {
  settings: Settings;
  errors: string[];
} {
  const errors: string[] = [];

  const users = validateLabels('users', raw.users, errors);
  const categories = validateLabels('categories', raw.categories, errors);
  const paymentMethods = validateLabels('paymentMethods', raw.paymentMethods, errors);
  const incomeSources = validateLabels('incomeSources', raw.incomeSources, errors);

  let periodAnchorDay = DEFAULT_ANCHOR_DAY;
  if (raw.periodAnchorDay !== undefined) {
    if (
      typeof raw.periodAnchorDay !== 'number' ||
      !Number.isInteger(raw.periodAnchorDay) ||
      raw.periodAnchorDay < 1 ||
      raw.periodAnchorDay > 28
    ) {
      errors.push('periodAnchorDay must be between 1 and 28');
    } else {
      periodAnchorDay = raw.periodAnchorDay;
    }
  }

  let recentLimit = DEFAULT_RECENT_LIMIT;
  if (raw.recentLimit !== undefined) {
    if (typeof raw.recentLimit !== 'number' || !Number.isInteger(raw.recentLimit) || raw.recentLimit < 1) {
      errors.push('recentLimit must be a positive integer');
    } else {
      recentLimit = raw.recentLimit;
    }
  }

  return {
    settings: { users, categories, paymentMethods, incomeSources, periodAnchorDay, recentLimit },
    errors,
  };
}

/**
 * Loads the canonical label sets and report options from settings.json.
 *
 * @throws Error naming every problem when the file is invalid
 *
 * @example
 * ```typescript
 * const settings = loadSettings();
 * // {
 * //   users: ['Mikael', 'Josephine'],
 * //   categories: ['Bills', 'Subscriptions', ...],
 * //   paymentMethods: ['CC', 'Debit', 'Cash'],
 * //   incomeSources: ['Salary', 'Freelance', 'Other'],
 * //   periodAnchorDay: 28,
 * //   recentLimit: 10
 * // }
 * ```
 */
export function loadSettings(): Settings {
  const { settings, errors } = validateSettings(load<Partial<Record<keyof Settings, unknown>>>(`${FILE_NAME}.json`));
  if (errors.length > 0) {
    throw new Error(`Invalid ${FILE_NAME}.json: ${errors.join('; ')}`);
  }
  return settings;
}
