/**
 * API Event Normalizer
 *
 * Maps the structured play-by-play feed onto the event codes shared with
 * the HTML report, with up to three player slots per event.
 */

import { playByPlayResponseSchema } from '../../types/api.js';
import type { ApiPlay, ApiPlayDetails } from '../../types/api.js';
import type { ApiEventRecord, ApiPlayerSlot, RawSource, Sentinel } from '../../models/records.js';
import type { GameId } from '../../util/gameId.js';
import { normalizeTeamCode } from '../../util/names.js';
import { clockToSeconds, toGameSeconds } from '../../util/time.js';
import { parseDefect, parseJsonSource } from './common.js';

/** typeDescKey → event code */
const EVENT_CODES: Readonly<Record<string, string>> = {
  'period-start': 'PSTR',
  'period-end': 'PEND',
  'game-end': 'GEND',
  'shootout-complete': 'SOC',
  faceoff: 'FAC',
  stoppage: 'STOP',
  hit: 'HIT',
  giveaway: 'GIVE',
  takeaway: 'TAKE',
  'shot-on-goal': 'SHOT',
  'missed-shot': 'MISS',
  'failed-shot-attempt': 'MISS',
  'blocked-shot': 'BLOCK',
  goal: 'GOAL',
  penalty: 'PENL',
  'delayed-penalty': 'DELPEN',
};

/** zoneCode → zone label shared with the HTML report */
const ZONES: Readonly<Record<string, string>> = { O: 'OFF', D: 'DEF', N: 'NEU' };

type Slots = [ApiPlayerSlot | null, ApiPlayerSlot | null, ApiPlayerSlot | null];

function slot(apiId: number | null | undefined, role: string): ApiPlayerSlot | null {
  return apiId === null || apiId === undefined ? null : { apiId, sentinel: null, role };
}

function sentinel(value: Sentinel, role: string): ApiPlayerSlot {
  return { apiId: null, sentinel: value, role };
}

/** "too-many-men-on-the-ice" → "TOO MANY MEN ON THE ICE" */
function reasonText(value: string | null | undefined): string | null {
  return value ? value.replace(/-/g, ' ').toUpperCase() : null;
}

function penaltySlots(details: ApiPlayDetails): Slots {
  const reason = (details.descKey ?? '').toUpperCase();
  const committed = details.committedByPlayerId;
  const benchMinor = details.typeCode === 'BEN' || reason.includes('HEAD-COACH') || reason.includes('TEAM-STAFF');

  if (benchMinor && (committed === null || committed === undefined)) {
    return [sentinel('BENCH', 'COMMITTED BY'), slot(details.servedByPlayerId, 'SERVED BY'), null];
  }
  const drawn = slot(details.drawnByPlayerId, 'DRAWN BY');
  if (drawn === null) {
    return [slot(committed, 'COMMITTED BY'), slot(details.servedByPlayerId, 'SERVED BY'), null];
  }
  return [slot(committed, 'COMMITTED BY'), drawn, slot(details.servedByPlayerId, 'SERVED BY')];
}

function playerSlots(event: string, d: ApiPlayDetails): Slots {
  switch (event) {
    case 'FAC':
      return [slot(d.winningPlayerId, 'WINNER'), slot(d.losingPlayerId, 'LOSER'), null];
    case 'HIT':
      return [slot(d.hittingPlayerId, 'HITTER'), slot(d.hitteePlayerId, 'HITTEE'), null];
    case 'GIVE':
      return [slot(d.playerId, 'GIVER'), null, null];
    case 'TAKE':
      return [slot(d.playerId, 'TAKER'), null, null];
    case 'SHOT':
    case 'MISS':
      return [slot(d.shootingPlayerId, 'SHOOTER'), null, null];
    case 'BLOCK':
      return [
        slot(d.blockingPlayerId, 'BLOCKER') ?? sentinel('REFEREE', 'BLOCKER'),
        slot(d.shootingPlayerId, 'SHOOTER'),
        null,
      ];
    case 'GOAL':
      return [
        slot(d.scoringPlayerId, 'GOAL SCORER'),
        slot(d.assist1PlayerId, 'PRIMARY ASSIST'),
        slot(d.assist2PlayerId, 'SECONDARY ASSIST'),
      ];
    case 'PENL':
      return penaltySlots(d);
    default:
      return [null, null, null];
  }
}

function normalizePlay(
  raw: RawSource,
  gameId: GameId,
  play: ApiPlay,
  teams: ReadonlyMap<number, string>
): ApiEventRecord {
  const period = play.periodDescriptor?.number ?? play.period;
  if (period === undefined) {
    throw parseDefect(raw, `play ${play.sortOrder} has no period`);
  }
  const periodSeconds = clockToSeconds(play.timeInPeriod);
  const event = EVENT_CODES[play.typeDescKey] ?? play.typeDescKey.toUpperCase();
  const d: ApiPlayDetails = play.details ?? {};
  const [player1, player2, player3] = playerSlots(event, d);

  const ownerId = d.eventOwnerTeamId;
  let eventTeam = ownerId === null || ownerId === undefined ? null : (teams.get(ownerId) ?? null);
  if (event === 'BLOCK' && player1?.sentinel === 'REFEREE') eventTeam = 'OTHER';

  const isShot = event === 'SHOT' || event === 'MISS' || event === 'GOAL';
  const goalie = d.goalieInNetId ?? null;

  return {
    gameId: gameId.id,
    eventIdx: play.sortOrder,
    period,
    timeText: play.timeInPeriod,
    periodSeconds,
    gameSeconds: periodSeconds === null ? null : toGameSeconds(period, periodSeconds, gameId.session),
    event,
    eventTeam,
    coordsX: d.xCoord ?? null,
    coordsY: d.yCoord ?? null,
    zone: d.zoneCode ? (ZONES[d.zoneCode] ?? d.zoneCode) : null,
    player1,
    player2,
    player3,
    oppGoalieApiId: isShot ? goalie : null,
    emptyNet: isShot && goalie === null && play.typeDescKey !== 'failed-shot-attempt',
    shotType: isShot && play.typeDescKey !== 'failed-shot-attempt' ? (d.shotType ?? 'wrist').toUpperCase() : null,
    missReason: event === 'MISS' ? reasonText(d.reason) : null,
    penaltyCode: event === 'PENL' ? (d.typeCode ?? null) : null,
    penaltyReason: event === 'PENL' ? (d.descKey ?? '').toUpperCase() || null : null,
    penaltyLength: event === 'PENL' ? (d.duration ?? null) : null,
    stoppageReason: event === 'STOP' ? reasonText(d.reason) : null,
    stoppageReasonSecondary: event === 'STOP' ? reasonText(d.secondaryReason) : null,
    situationCode: play.situationCode ?? null,
    homeTeamDefendingSide: play.homeTeamDefendingSide ?? null,
  };
}

export function normalizeApiEvents(raw: RawSource, gameId: GameId): ApiEventRecord[] {
  const body = parseJsonSource(raw, playByPlayResponseSchema);
  const teams = new Map<number, string>([
    [body.homeTeam.id, normalizeTeamCode(body.homeTeam.abbrev)],
    [body.awayTeam.id, normalizeTeamCode(body.awayTeam.abbrev)],
  ]);
  return body.plays.map(play => normalizePlay(raw, gameId, play, teams));
}
