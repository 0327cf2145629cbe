import { Request } from 'express';
import { Settings } from '../../data/settings/types';
import { loadSettings } from '../../utils/io/settings';

/**
 * Label sets the entry forms offer, plus the period anchor day and recent limit.
 */
export function getSettings(_request: Request): Settings {
  return loadSettings();
}
