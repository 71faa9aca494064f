/**
 * Game-center API payload builders
 */

import type { Venue } from '../../src/models/records.js';

export interface TestTeam {
  id: number;
  abbrev: string;
  place: string;
  common: string;
}

export interface TestPlayer {
  venue: Venue;
  apiId: number;
  jersey: number;
  position: string;
  first: string;
  last: string;
  /** Bold on the roster report */
  starter?: boolean;
  /** Listed only on the roster report, as a scratch */
  scratch?: boolean;
  captain?: boolean;
}

export const EDM: TestTeam = { id: 22, abbrev: 'EDM', place: 'Edmonton', common: 'Oilers' };
export const CGY: TestTeam = { id: 20, abbrev: 'CGY', place: 'Calgary', common: 'Flames' };

export interface TestPlay {
  sortOrder: number;
  period: number;
  time: string;
  type: string;
  situationCode?: string;
  homeTeamDefendingSide?: string;
  details?: Record<string, string | number | null>;
}

function team(t: TestTeam) {
  return {
    id: t.id,
    abbrev: t.abbrev,
    placeName: { default: t.place },
    commonName: { default: t.common },
  };
}

export function playByPlayJson(
  gameId: string,
  teams: { home: TestTeam; away: TestTeam },
  plays: readonly TestPlay[],
  players: readonly TestPlayer[]
): string {
  return JSON.stringify({
    id: Number(gameId),
    homeTeam: team(teams.home),
    awayTeam: team(teams.away),
    plays: plays.map(p => ({
      sortOrder: p.sortOrder,
      periodDescriptor: { number: p.period, periodType: p.period > 3 ? 'OT' : 'REG' },
      timeInPeriod: p.time,
      typeDescKey: p.type,
      situationCode: p.situationCode ?? '1551',
      homeTeamDefendingSide: p.homeTeamDefendingSide ?? 'left',
      ...(p.details ? { details: p.details } : {}),
    })),
    rosterSpots: players
      .filter(p => !p.scratch)
      .map(p => ({
        teamId: p.venue === 'HOME' ? teams.home.id : teams.away.id,
        playerId: p.apiId,
        firstName: { default: p.first },
        lastName: { default: p.last },
        sweaterNumber: p.jersey,
        positionCode: p.position,
        headshot: `https://assets.test/${p.apiId}.png`,
      })),
  });
}

export function landingJson(
  gameId: string,
  teams: { home: TestTeam; away: TestTeam },
  overrides: Record<string, unknown> = {}
): string {
  return JSON.stringify({
    id: Number(gameId),
    season: Number(`${gameId.slice(0, 4)}${Number(gameId.slice(0, 4)) + 1}`),
    gameType: Number(gameId.slice(4, 6)),
    gameDate: '2023-10-11',
    startTimeUTC: '2023-10-12T01:00:00Z',
    venue: { default: 'Rogers Place' },
    gameState: 'OFF',
    homeTeam: team(teams.home),
    awayTeam: team(teams.away),
    ...overrides,
  });
}
