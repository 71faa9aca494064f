/**
 * Game ID Module
 *
 * Parses the 10-digit game identifier (YYYYTTNNNN) into season,
 * session type and the six-digit id used by the HTML reports.
 */

import { ValidationError } from '../errors/index.js';

export type Session = 'PR' | 'R' | 'P' | 'AS';

export interface GameId {
  /** Canonical 10-digit string */
  id: string;

  /** Season as start and end year, e.g. 20232024 */
  season: number;

  session: Session;

  /** Last six digits, used in HTML report file names */
  htmlId: string;

  /** Four-digit game number inside the session */
  sequence: number;
}

const SESSION_CODES: Readonly<Record<string, Session>> = {
  '01': 'PR',
  '02': 'R',
  '03': 'P',
  '04': 'AS',
};

/**
 * Parses and validates a game id
 *
 * @param input - Game id as a string or number
 * @throws ValidationError if the id is not a 10-digit id with a known session code
 *
 * @example
 * parseGameId(2023020001);
 * // { id: '2023020001', season: 20232024, session: 'R', htmlId: '020001', sequence: 1 }
 */
export function parseGameId(input: string | number): GameId {
  const id = String(input).trim();
  const match = /^(\d{4})(\d{2})(\d{4})$/.exec(id);
  if (!match) {
    throw new ValidationError(`Invalid game id: ${id}`, 'gameId');
  }
  const [, yearText, sessionCode, sequenceText] = match;
  const session = SESSION_CODES[sessionCode];
  if (!session) {
    throw new ValidationError(`Unknown session code ${sessionCode} in game id ${id}`, 'gameId');
  }
  const year = Number(yearText);
  return {
    id,
    season: year * 10000 + year + 1,
    session,
    htmlId: id.slice(4),
    sequence: Number(sequenceText),
  };
}

/**
 * Returns true when the input parses as a game id
 */
export function isValidGameId(input: string | number): boolean {
  try {
    parseGameId(input);
    return true;
  } catch (err) {
    if (err instanceof ValidationError) return false;
    throw err;
  }
}
