/**
 * Time Utilities
 *
 * Clock parsing for the game-clock formats used by both sources,
 * and Eastern-time date formatting for game dates.
 */

import { GAME_CLOCK } from '../core/constants.js';
import type { Session } from './gameId.js';

/**
 * Parses "MM:SS" into seconds, or null when the text is not a clock
 */
export function clockToSeconds(text: string | null | undefined): number | null {
  if (!text) return null;
  const match = /^\s*(\d{1,2}):(\d{2})\s*$/.exec(text);
  if (!match) return null;
  const seconds = Number(match[2]);
  if (seconds >= 60) return null;
  return Number(match[1]) * 60 + seconds;
}

/**
 * Formats seconds as "M:SS"
 */
export function secondsToClock(total: number): string {
  const minutes = Math.floor(total / 60);
  const seconds = total % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

/**
 * Converts a period and elapsed seconds into game seconds.
 * Every regular-season shootout event shares one timestamp.
 */
export function toGameSeconds(period: number, periodSeconds: number, session: Session): number {
  if (session === 'R' && period === GAME_CLOCK.SHOOTOUT_PERIOD) {
    return GAME_CLOCK.SHOOTOUT_GAME_SECONDS;
  }
  return (period - 1) * GAME_CLOCK.PERIOD_SECONDS + periodSeconds;
}

/**
 * Length of a period in seconds for the session
 */
export function periodLength(period: number, session: Session): number {
  if (session === 'R' && period === 4) return GAME_CLOCK.REGULAR_OT_SECONDS;
  return GAME_CLOCK.PERIOD_SECONDS;
}

/**
 * True for the regular-season shootout period
 */
export function isShootout(period: number, session: Session): boolean {
  return session === 'R' && period === GAME_CLOCK.SHOOTOUT_PERIOD;
}

/**
 * Gets the date in YYYY-MM-DD format using Eastern Time (ET/EDT)
 *
 * League game dates follow Eastern Time regardless of server timezone.
 *
 * @param at - Instant to format
 * @returns Date string in YYYY-MM-DD format (Eastern Time)
 */
export function easternDate(at: Date): string {
  // This handles both EST (UTC-5) and EDT (UTC-4) automatically
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: 'America/New_York',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  });

  const parts = formatter.formatToParts(at);
  const year = parts.find(p => p.type === 'year')?.value;
  const month = parts.find(p => p.type === 'month')?.value;
  const day = parts.find(p => p.type === 'day')?.value;

  return `${year}-${month}-${day}`;
}
