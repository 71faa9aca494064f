/**
 * Validation Utilities
 * 
 * Functions for validating external inputs to prevent invalid data
 * from propagating through the system.
 */

import { parseGameId } from './gameId.js';

export { ValidationError } from '../errors/index.js';

/**
 * Validates a URL string
 * 
 * @param url - URL to validate
 * @returns True if valid URL, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Parses a comma or whitespace separated list of game ids
 *
 * Duplicates are dropped, first occurrence wins.
 *
 * @param text - e.g. "2023020001, 2023020002"
 * @returns Canonical 10-digit ids in input order
 * @throws ValidationError on the first id that does not parse
 */
export function parseGameIdList(text: string): string[] {
  const ids = text
    .split(/[\s,]+/)
    .filter(part => part !== '')
    .map(part => parseGameId(part).id);
  return [...new Set(ids)];
}
