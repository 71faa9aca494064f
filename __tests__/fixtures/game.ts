/**
 * A small regular-season game (CGY at EDM) and an API-only preseason game,
 * served through a FakeHttp route table
 */

import type { EndpointBases } from '../../src/http/nhlApiClient.js';
import type { RawSource, SourceKind } from '../../src/models/records.js';
import { CGY, EDM, landingJson, playByPlayJson } from './api.js';
import type { TestPlay, TestPlayer } from './api.js';
import { playByPlayReport, rosterReport, shiftReport } from './reports.js';
import type { ReportRow } from './reports.js';

export const GAME_ID = '2023020001';
export const PRESEASON_ID = '2023010001';
/** Second regular-season meeting, served from the API alone */
export const REMATCH_ID = '2023020002';

export const BASES: EndpointBases = {
  apiBaseUrl: 'https://api.test/v1',
  htmlBaseUrl: 'https://reports.test/htmlreports',
};

export const URLS = {
  playByPlay: (id: string) => `${BASES.apiBaseUrl}/gamecenter/${id}/play-by-play`,
  landing: (id: string) => `${BASES.apiBaseUrl}/gamecenter/${id}/landing`,
  report: (id: string, prefix: 'PL' | 'RO' | 'TH' | 'TV') =>
    `${BASES.htmlBaseUrl}/${id.slice(0, 4)}${Number(id.slice(0, 4)) + 1}/${prefix}${id.slice(4)}.HTM`,
};

export const PLAYERS: readonly TestPlayer[] = [
  { venue: 'HOME', apiId: 8470010, jersey: 10, position: 'C', first: 'Adam', last: 'North', starter: true, captain: true },
  { venue: 'HOME', apiId: 8470011, jersey: 11, position: 'L', first: 'Ben', last: 'East', starter: true },
  { venue: 'HOME', apiId: 8470012, jersey: 12, position: 'R', first: 'Carl', last: 'West', starter: true },
  { venue: 'HOME', apiId: 8470002, jersey: 2, position: 'D', first: 'Dan', last: 'South', starter: true },
  { venue: 'HOME', apiId: 8470003, jersey: 3, position: 'D', first: 'Ed', last: 'Brook', starter: true },
  { venue: 'HOME', apiId: 8470030, jersey: 30, position: 'G', first: 'Frank', last: 'Stone', starter: true },
  { venue: 'HOME', apiId: 8470031, jersey: 31, position: 'G', first: 'Gary', last: 'Hill', scratch: true },
  { venue: 'AWAY', apiId: 8460020, jersey: 20, position: 'C', first: 'Henry', last: 'Lake', starter: true },
  { venue: 'AWAY', apiId: 8460021, jersey: 21, position: 'L', first: 'Ian', last: 'Field', starter: true },
  { venue: 'AWAY', apiId: 8460022, jersey: 22, position: 'R', first: 'Jack', last: 'Moss', starter: true },
  { venue: 'AWAY', apiId: 8460005, jersey: 5, position: 'D', first: 'Kevin', last: 'Reed', starter: true },
  { venue: 'AWAY', apiId: 8460006, jersey: 6, position: 'D', first: 'Leo', last: 'Park', starter: true },
  { venue: 'AWAY', apiId: 8460040, jersey: 40, position: 'G', first: 'Mark', last: 'Wood', starter: true },
];

export const PLAYS: readonly TestPlay[] = [
  { sortOrder: 8, period: 1, time: '00:00', type: 'period-start' },
  {
    sortOrder: 9,
    period: 1,
    time: '00:00',
    type: 'faceoff',
    details: { eventOwnerTeamId: EDM.id, winningPlayerId: 8470010, losingPlayerId: 8460020, xCoord: 0, yCoord: 0, zoneCode: 'N' },
  },
  {
    sortOrder: 20,
    period: 1,
    time: '01:40',
    type: 'shot-on-goal',
    details: { eventOwnerTeamId: CGY.id, shootingPlayerId: 8460021, goalieInNetId: 8470030, xCoord: -60, yCoord: -10, zoneCode: 'O', shotType: 'wrist' },
  },
  {
    sortOrder: 31,
    period: 1,
    time: '03:05',
    type: 'goal',
    details: { eventOwnerTeamId: EDM.id, scoringPlayerId: 8470010, goalieInNetId: 8460040, xCoord: 74, yCoord: 5, zoneCode: 'O', shotType: 'wrist' },
  },
  {
    sortOrder: 32,
    period: 1,
    time: '03:05',
    type: 'faceoff',
    details: { eventOwnerTeamId: CGY.id, winningPlayerId: 8460020, losingPlayerId: 8470010, xCoord: 0, yCoord: 0, zoneCode: 'N' },
  },
  {
    sortOrder: 40,
    period: 1,
    time: '06:40',
    type: 'penalty',
    details: {
      eventOwnerTeamId: CGY.id,
      committedByPlayerId: 8460005,
      drawnByPlayerId: 8470011,
      typeCode: 'MIN',
      descKey: 'tripping',
      duration: 2,
      xCoord: -70,
      yCoord: 20,
      zoneCode: 'D',
    },
  },
  { sortOrder: 80, period: 1, time: '20:00', type: 'period-end' },
];

/** Primary assist printed as #3 BROOK; the correct player is #11 EAST */
export const GOAL_DESCRIPTION = 'EDM #10 NORTH(1), Wrist , Off. Zone, 15 ft. Assists: #3 BROOK(1); #12 WEST(1)';

export const REPORT_ROWS: readonly ReportRow[] = [
  { idx: 1, period: 1, elapsed: '0:00', remaining: '20:00', event: 'PSTR', description: 'Period Start- Local time: 7:08 MDT' },
  { idx: 2, period: 1, elapsed: '0:00', remaining: '20:00', event: 'FAC', description: 'EDM won Neu. Zone - EDM #10 NORTH vs CGY #20 LAKE' },
  { idx: 3, period: 1, elapsed: '1:40', remaining: '18:20', event: 'SHOT', description: 'CGY ONGOAL - #21 FIELD, Wrist , Off. Zone, 32 ft.' },
  { idx: 4, period: 1, strength: 'EV', elapsed: '3:05', remaining: '16:55', event: 'GOAL', description: GOAL_DESCRIPTION },
  { idx: 5, period: 1, elapsed: '3:05', remaining: '16:55', event: 'FAC', description: 'CGY won Neu. Zone - CGY #20 LAKE vs EDM #10 NORTH' },
  {
    idx: 6,
    period: 1,
    elapsed: '6:40',
    remaining: '13:20',
    event: 'PENL',
    description: 'CGY #5 REED Tripping(2 min), Def. Zone Drawn By: EDM #11 EAST',
  },
  { idx: 7, period: 1, elapsed: '20:00', remaining: '0:00', event: 'PEND', description: 'Period End- Local time: 7:45 MDT' },
];

const FULL_PERIOD = [{ period: 1, start: '0:00', end: '20:00', duration: '20:00' }];

function teamShifts(venue: 'HOME' | 'AWAY') {
  return PLAYERS.filter(p => p.venue === venue && !p.scratch).map(player => ({ player, shifts: FULL_PERIOD }));
}

export const DOCUMENTS = {
  playByPlay: playByPlayJson(GAME_ID, { home: EDM, away: CGY }, PLAYS, PLAYERS),
  landing: landingJson(GAME_ID, { home: EDM, away: CGY }),
  pl: playByPlayReport(REPORT_ROWS),
  ro: rosterReport('CALGARY FLAMES', 'EDMONTON OILERS', PLAYERS),
  th: shiftReport('EDMONTON OILERS', teamShifts('HOME')),
  tv: shiftReport('CALGARY FLAMES', teamShifts('AWAY')),
};

/**
 * Routes serving every document of the regular-season game
 */
export function gameRoutes(): Map<string, string> {
  return new Map([
    [URLS.playByPlay(GAME_ID), DOCUMENTS.playByPlay],
    [URLS.landing(GAME_ID), DOCUMENTS.landing],
    [URLS.report(GAME_ID, 'PL'), DOCUMENTS.pl],
    [URLS.report(GAME_ID, 'RO'), DOCUMENTS.ro],
    [URLS.report(GAME_ID, 'TH'), DOCUMENTS.th],
    [URLS.report(GAME_ID, 'TV'), DOCUMENTS.tv],
  ]);
}

export const PRESEASON_PLAYS: readonly TestPlay[] = [
  { sortOrder: 1, period: 1, time: '00:00', type: 'period-start' },
  {
    sortOrder: 2,
    period: 1,
    time: '02:10',
    type: 'shot-on-goal',
    situationCode: '1451',
    details: { eventOwnerTeamId: EDM.id, shootingPlayerId: 8470012, goalieInNetId: 8460040, xCoord: 80, yCoord: -4, zoneCode: 'O', shotType: 'snap' },
  },
  { sortOrder: 3, period: 1, time: '20:00', type: 'period-end' },
];

function apiOnlyRoutes(gameId: string): Map<string, string> {
  return new Map([
    [URLS.playByPlay(gameId), playByPlayJson(gameId, { home: EDM, away: CGY }, PRESEASON_PLAYS, PLAYERS)],
    [URLS.landing(gameId), landingJson(gameId, { home: EDM, away: CGY })],
  ]);
}

/**
 * Routes for the preseason game: API documents only, every report 404s
 */
export function preseasonRoutes(): Map<string, string> {
  return apiOnlyRoutes(PRESEASON_ID);
}

export function rematchRoutes(): Map<string, string> {
  return apiOnlyRoutes(REMATCH_ID);
}

/**
 * Wraps documents as a raw source, for normalizer tests
 */
export function rawSource(kind: SourceKind, gameId: string, ...docs: { text: string; venue?: 'HOME' | 'AWAY' }[]): RawSource {
  return {
    kind,
    gameId,
    fetchedAt: '2024-01-01T00:00:00.000Z',
    documents: docs.map((d, i) => ({ url: `https://fixture.test/${kind}/${i}`, venue: d.venue ?? null, text: d.text })),
  };
}
