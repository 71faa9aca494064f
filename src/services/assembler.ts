/**
 * Play-by-Play Assembler
 *
 * Enriches canonical events with on-ice personnel, strength and score
 * state, normalized coordinates, zone and shot geometry. One enriched
 * event per canonical event, in the same order.
 */

import {
  AFTER_CHANGE_EVENTS,
  CLOSE_RANGE_SHOT_TYPES,
  RINK,
  SCORED_EVENTS,
} from '../core/constants.js';
import type {
  CanonicalEvent,
  EnrichedEvent,
  EventPlayer,
  OnIcePlayer,
  TeamOnIce,
  Venue,
} from '../models/records.js';
import type { GameId, Session } from '../util/gameId.js';
import { angleToNet, dangerOf, distanceToNet, normalizePoint, zoneOf } from '../util/rink.js';
import { isShootout } from '../util/time.js';
import type { OnIceTimeline } from './changeReconciler.js';
import type { RosterIndex } from './rosterReconciler.js';

/** Game-level fields copied onto every event */
export interface GameContext {
  gameId: GameId;
  season: number;
  session: Session;
  gameDate: string | null;
  homeTeam: string;
  awayTeam: string;
}

type Sign = 1 | -1;

const FORWARD_POSITIONS: ReadonlySet<string> = new Set(['C', 'L', 'R', 'F']);

const EMPTY_TEAM: TeamOnIce = { forwards: [], defense: [], goalies: [], skaters: 0, goalie: false };

function teamOnIce(players: readonly OnIcePlayer[]): TeamOnIce {
  const goalies = players.filter(p => p.position === 'G');
  const defense = players.filter(p => p.position === 'D');
  const forwards = players.filter(p => p.position !== 'G' && p.position !== 'D');
  return { forwards, defense, goalies, skaters: forwards.length + defense.length, goalie: goalies.length > 0 };
}

/**
 * Reads the API situation code "{awayGoalie}{awaySkaters}{homeSkaters}{homeGoalie}"
 */
export function onIceFromSituation(code: string | null): Record<Venue, TeamOnIce> {
  if (code === null || !/^\d{4}$/.test(code)) return { AWAY: EMPTY_TEAM, HOME: EMPTY_TEAM };
  const digit = (i: number) => Number(code[i]);
  return {
    AWAY: { ...EMPTY_TEAM, skaters: digit(1), goalie: digit(0) > 0 },
    HOME: { ...EMPTY_TEAM, skaters: digit(2), goalie: digit(3) > 0 },
  };
}

function strengthSide(team: TeamOnIce): string {
  return team.goalie ? String(team.skaters) : 'E';
}

function isIllegal(team: TeamOnIce): boolean {
  return team.goalie && team.skaters > 5;
}

export interface StrengthStates {
  strengthState: string;
  oppStrengthState: string;
}

/**
 * Strength label from one team's perspective
 */
export function strengthStates(
  own: TeamOnIce,
  opp: TeamOnIce,
  options: { shootout: boolean; penaltyShot: boolean }
): StrengthStates {
  if (options.shootout || options.penaltyShot) return { strengthState: '1v0', oppStrengthState: '0v1' };
  if (isIllegal(own) || isIllegal(opp)) return { strengthState: 'ILLEGAL', oppStrengthState: 'ILLEGAL' };
  return {
    strengthState: `${strengthSide(own)}v${strengthSide(opp)}`,
    oppStrengthState: `${strengthSide(opp)}v${strengthSide(own)}`,
  };
}

/**
 * Home and away score before each event
 *
 * Shootout goals are not counted individually; the winner gets one goal
 * once the last shootout attempt is over.
 */
export function runningScores(
  events: readonly CanonicalEvent[],
  context: GameContext
): { home: number; away: number }[] {
  const shootout = (e: CanonicalEvent) => isShootout(e.period, context.session);
  const shootoutGoals = { home: 0, away: 0 };
  let lastAttempt = -1;
  events.forEach((e, i) => {
    if (!shootout(e) || !SCORED_EVENTS.has(e.event)) return;
    lastAttempt = i;
    if (e.event !== 'GOAL') return;
    if (e.eventTeam === context.homeTeam) shootoutGoals.home += 1;
    if (e.eventTeam === context.awayTeam) shootoutGoals.away += 1;
  });

  let home = 0;
  let away = 0;
  return events.map((e, i) => {
    const before = { home, away };
    if (i === lastAttempt && shootoutGoals.home !== shootoutGoals.away) {
      if (shootoutGoals.home > shootoutGoals.away) home += 1;
      else away += 1;
    }
    if (e.event === 'GOAL' && !shootout(e)) {
      if (e.eventTeam === context.homeTeam) home += 1;
      if (e.eventTeam === context.awayTeam) away += 1;
    }
    return before;
  });
}

/**
 * Direction the home team attacks in each period (+1 towards +x)
 *
 * Taken from the API defending side, else from where the home team's
 * shots fall, else alternated from the nearest known period (period 1
 * towards +x when nothing is known).
 */
export function homeDirections(events: readonly CanonicalEvent[], context: GameContext): Map<number, Sign> {
  const periods = [...new Set(events.map(e => e.period))].sort((a, b) => a - b);
  const known = new Map<number, Sign>();

  for (const period of periods) {
    const inPeriod = events.filter(e => e.period === period);
    const side = inPeriod.find(e => e.homeTeamDefendingSide !== null)?.homeTeamDefendingSide?.toLowerCase();
    if (side === 'left' || side === 'right') {
      known.set(period, side === 'left' ? 1 : -1);
      continue;
    }
    const homeShotX = inPeriod
      .filter(e => e.eventTeam === context.homeTeam && SCORED_EVENTS.has(e.event) && e.coordsX !== null)
      .reduce((sum, e) => sum + Math.sign(e.coordsX ?? 0), 0);
    if (homeShotX !== 0) known.set(period, homeShotX > 0 ? 1 : -1);
  }

  const anchor = known.size > 0 ? [...known.entries()][0] : ([1, 1] as const);
  const directions = new Map<number, Sign>();
  for (const period of periods) {
    const flips = Math.abs(period - anchor[0]) % 2;
    const fallback: Sign = flips === 0 ? anchor[1] : anchor[1] === 1 ? -1 : 1;
    directions.set(period, known.get(period) ?? fallback);
  }
  return directions;
}

interface Geometry {
  normX: number | null;
  normY: number | null;
  eventZone: string | null;
  eventDistance: number | null;
  eventAngle: number | null;
  danger: boolean;
  highDanger: boolean;
}

/**
 * Long shots the HTML measures from the far net were taken from the shooter's own half
 */
function isLongShot(event: CanonicalEvent): boolean {
  return (
    SCORED_EVENTS.has(event.event) &&
    (event.pbpDistance ?? 0) > RINK.LONG_SHOT_FT &&
    !CLOSE_RANGE_SHOT_TYPES.has(event.shotType ?? 'WRIST') &&
    event.zone !== 'OFF'
  );
}

function geometry(event: CanonicalEvent, sign: Sign): Geometry {
  const shot = SCORED_EVENTS.has(event.event);
  if (event.coordsX === null || event.coordsY === null) {
    return { normX: null, normY: null, eventZone: event.zone, eventDistance: null, eventAngle: null, danger: false, highDanger: false };
  }
  let [normX, normY] = normalizePoint(event.coordsX, event.coordsY, sign);
  if (isLongShot(event) && normX > 0) [normX, normY] = normalizePoint(normX, normY, -1);

  const eventDistance = distanceToNet(normX, normY);
  const eventAngle = angleToNet(normX, normY);
  let eventZone: string = event.zone ?? zoneOf(normX);
  if (shot && eventZone === 'DEF' && eventDistance <= RINK.DEF_ZONE_SHOT_MAX_FT) eventZone = 'OFF';

  const flags = shot && eventZone === 'OFF' ? dangerOf([normX, normY]) : { danger: false, highDanger: false };
  return { normX, normY, eventZone, eventDistance, eventAngle, ...flags };
}

function goalieOf(team: TeamOnIce, roster: RosterIndex): EventPlayer | null {
  const onIce = team.goalies[0];
  if (!onIce) return null;
  const entry = roster.byPlayerId(onIce.playerId);
  return {
    playerId: onIce.playerId,
    apiId: entry?.apiId ?? null,
    name: entry?.playerName ?? null,
    teamJersey: onIce.teamJersey,
    position: 'G',
    role: 'GOALIE',
  };
}

/**
 * Builds the enriched play-by-play of one game
 *
 * @param events - Canonical events in canonical order
 * @param timeline - On-ice timeline; an empty one falls back to situation codes
 */
export function assemblePlayByPlay(
  context: GameContext,
  events: readonly CanonicalEvent[],
  timeline: OnIceTimeline,
  roster: RosterIndex
): EnrichedEvent[] {
  const scores = runningScores(events, context);
  const directions = homeDirections(events, context);

  return events.map((event, i): EnrichedEvent => {
    const venue: Venue | null =
      event.eventTeam === context.homeTeam ? 'HOME' : event.eventTeam === context.awayTeam ? 'AWAY' : null;
    const shootout = isShootout(event.period, context.session);

    let onIce: Record<Venue, TeamOnIce>;
    if (timeline.isEmpty) {
      onIce = onIceFromSituation(event.situationCode);
    } else {
      const phase = AFTER_CHANGE_EVENTS.has(event.event) ? 'after' : 'before';
      const seconds = event.periodSeconds ?? 0;
      onIce = {
        AWAY: teamOnIce(timeline.onIce(event.period, seconds, 'AWAY', phase)),
        HOME: teamOnIce(timeline.onIce(event.period, seconds, 'HOME', phase)),
      };
    }

    const ownVenue: Venue = venue ?? 'HOME';
    const oppVenue: Venue = ownVenue === 'HOME' ? 'AWAY' : 'HOME';
    const strength = strengthStates(onIce[ownVenue], onIce[oppVenue], {
      shootout,
      penaltyShot: (event.description ?? '').includes('PENALTY SHOT'),
    });

    const { home: homeScore, away: awayScore } = scores[i];
    const own = ownVenue === 'HOME' ? homeScore : awayScore;
    const opp = ownVenue === 'HOME' ? awayScore : homeScore;

    const homeSign = directions.get(event.period) ?? 1;
    const sign: Sign = ownVenue === 'HOME' ? homeSign : homeSign === 1 ? -1 : 1;

    const oppGoalie =
      event.oppGoalie ??
      (SCORED_EVENTS.has(event.event) && venue !== null && !event.emptyNet && !shootout
        ? goalieOf(onIce[oppVenue], roster)
        : null);

    const previous = i > 0 ? events[i - 1].gameSeconds : null;
    const eventLength =
      previous === null || event.gameSeconds === null ? 0 : Math.max(0, event.gameSeconds - previous);

    return {
      ...event,
      oppGoalie,
      season: context.season,
      session: context.session,
      gameDate: context.gameDate,
      homeTeam: context.homeTeam,
      awayTeam: context.awayTeam,
      oppTeam: venue === 'HOME' ? context.awayTeam : venue === 'AWAY' ? context.homeTeam : null,
      eventTeamVenue: venue,
      homeOnIce: onIce.HOME,
      awayOnIce: onIce.AWAY,
      ...strength,
      homeScore,
      awayScore,
      scoreState: `${own}v${opp}`,
      oppScoreState: `${opp}v${own}`,
      scoreDiff: own - opp,
      ...geometry(event, sign),
      eventLength,
    };
  });
}
