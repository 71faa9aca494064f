/**
 * API Roster Normalizer
 *
 * Turns the play-by-play document's roster spots into ApiRosterRecords.
 */

import { playByPlayResponseSchema } from '../../types/api.js';
import type { ApiRosterRecord, RawSource, Venue } from '../../models/records.js';
import type { GameId } from '../../util/gameId.js';
import { apiKeyOverride, cleanText, normalizePlayerName, normalizeTeamCode, playerKey } from '../../util/names.js';
import { parseDefect, parseJsonSource } from './common.js';

export function normalizeApiRosters(raw: RawSource, gameId: GameId): ApiRosterRecord[] {
  const body = parseJsonSource(raw, playByPlayResponseSchema);

  const teams = new Map<number, { team: string; venue: Venue }>([
    [body.homeTeam.id, { team: normalizeTeamCode(body.homeTeam.abbrev), venue: 'HOME' }],
    [body.awayTeam.id, { team: normalizeTeamCode(body.awayTeam.abbrev), venue: 'AWAY' }],
  ]);

  return body.rosterSpots.map(spot => {
    const team = teams.get(spot.teamId);
    if (!team) {
      throw parseDefect(raw, `roster spot for player ${spot.playerId} names unknown team ${spot.teamId}`);
    }
    const firstName = cleanText(spot.firstName.default);
    const lastName = cleanText(spot.lastName.default);
    const playerName = normalizePlayerName(`${firstName} ${lastName}`);
    const position = spot.positionCode.toUpperCase();

    return {
      gameId: gameId.id,
      team: team.team,
      teamVenue: team.venue,
      playerName,
      firstName,
      lastName,
      apiId: spot.playerId,
      playerKey: apiKeyOverride(spot.playerId) ?? playerKey(playerName, { position, season: gameId.season }),
      jersey: spot.sweaterNumber,
      teamJersey: `${team.team}${spot.sweaterNumber}`,
      position,
      headshotUrl: spot.headshot ?? null,
    };
  });
}
