/**
 * Normalizer Helpers
 *
 * Shared parsing entry points for the six source normalizers. Every
 * structural mismatch surfaces as a ParseDefectError tagged with the
 * game and source, so the pipeline can disable that source alone.
 */

import * as cheerio from 'cheerio';
import type { z } from 'zod';
import { ParseDefectError, toError } from '../../errors/index.js';
import type { RawDocument, RawSource, Venue } from '../../models/records.js';

/**
 * Role of each player slot, by event code
 */
export const PLAYER_ROLES: Readonly<Record<string, readonly string[]>> = {
  FAC: ['WINNER', 'LOSER'],
  HIT: ['HITTER', 'HITTEE'],
  GIVE: ['GIVER'],
  TAKE: ['TAKER'],
  SHOT: ['SHOOTER'],
  MISS: ['SHOOTER'],
  BLOCK: ['BLOCKER', 'SHOOTER'],
  GOAL: ['GOAL SCORER', 'PRIMARY ASSIST', 'SECONDARY ASSIST'],
  PENL: ['COMMITTED BY', 'DRAWN BY', 'SERVED BY'],
};

export function roleFor(event: string, slot: number): string {
  return PLAYER_ROLES[event]?.[slot] ?? 'PLAYER';
}

export function parseDefect(raw: RawSource, message: string, cause?: unknown): ParseDefectError {
  return new ParseDefectError(
    `${raw.kind} for game ${raw.gameId}: ${message}`,
    raw.gameId,
    raw.kind,
    cause === undefined ? undefined : toError(cause)
  );
}

/**
 * Parses the first document of a JSON source and validates it
 *
 * @throws ParseDefectError if the body is not JSON or fails the schema
 */
export function parseJsonSource<T>(raw: RawSource, schema: z.ZodType<T>): T {
  let body: unknown;
  try {
    body = JSON.parse(raw.documents[0].text);
  } catch (err) {
    throw parseDefect(raw, 'body is not valid JSON', err);
  }
  const result = schema.safeParse(body);
  if (!result.success) {
    throw parseDefect(raw, result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
  }
  return result.data;
}

/**
 * Loads an HTML report document
 *
 * @throws ParseDefectError if the text holds no <html> document
 */
export function loadHtml(raw: RawSource, doc: RawDocument): cheerio.CheerioAPI {
  if (!/<html/i.test(doc.text)) {
    throw parseDefect(raw, `no html document at ${doc.url}`);
  }
  return cheerio.load(doc.text);
}

/**
 * Finds the document of a two-document source by venue
 */
export function documentFor(raw: RawSource, venue: Venue): RawDocument | undefined {
  return raw.documents.find(doc => doc.venue === venue);
}

/**
 * Text of a report cell: a line break followed by a space reads as a comma
 */
export function cellText(text: string): string {
  return text.replace(/\n /g, ', ').replace(/\n/g, '');
}
