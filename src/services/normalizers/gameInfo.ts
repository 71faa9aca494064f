/**
 * Game Info Normalizer
 *
 * Reads the landing document into a GameInfo record.
 */

import { landingResponseSchema } from '../../types/api.js';
import type { ApiTeam } from '../../types/api.js';
import type { GameInfo, RawSource, TeamInfo } from '../../models/records.js';
import type { GameId, Session } from '../../util/gameId.js';
import { normalizeTeamCode } from '../../util/names.js';
import { easternDate } from '../../util/time.js';
import { parseDefect, parseJsonSource } from './common.js';

const GAME_TYPES: Readonly<Record<number, Session>> = {
  1: 'PR',
  2: 'R',
  3: 'P',
  4: 'AS',
};

function teamInfo(team: ApiTeam): TeamInfo {
  const place = team.placeName?.default;
  const common = team.commonName?.default;
  const name = place && common ? `${place} ${common}` : (team.name?.default ?? team.abbrev);
  return { id: team.id, abbrev: normalizeTeamCode(team.abbrev), name: name.toUpperCase() };
}

export function normalizeGameInfo(raw: RawSource, gameId: GameId): GameInfo {
  const body = parseJsonSource(raw, landingResponseSchema);
  if (String(body.id) !== gameId.id) {
    throw parseDefect(raw, `document is for game ${body.id}`);
  }

  const start = body.startTimeUTC ? new Date(body.startTimeUTC) : null;
  const validStart = start !== null && !Number.isNaN(start.getTime()) ? start : null;

  return {
    gameId: gameId.id,
    season: body.season ?? gameId.season,
    session: (body.gameType !== undefined ? GAME_TYPES[body.gameType] : undefined) ?? gameId.session,
    gameDate: validStart ? easternDate(validStart) : (body.gameDate ?? null),
    startTimeUtc: validStart ? validStart.toISOString() : null,
    venue: body.venue?.default ?? null,
    gameState: body.gameState ?? null,
    home: teamInfo(body.homeTeam),
    away: teamInfo(body.awayTeam),
  };
}
