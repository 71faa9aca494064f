/**
 * Redis Key Generators
 * 
 * Centralized key generation for the durable artifact cache.
 * Ensures consistent key naming across the application.
 */

import type { SourceKind } from '../models/records.js';

/**
 * Generates Redis keys and hash fields for cached artifacts
 */
export const KEYS = {
  /** Hash holding every artifact of one game, one field per artifact kind */
  game: (prefix: string, gameId: string) => `${prefix}:game:${gameId}`,

  /** Hash field of an unparsed source */
  raw: (kind: SourceKind) => `raw:${kind}`,
};
