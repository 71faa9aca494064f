/**
 * Stats Aggregation
 *
 * Individual and on-ice stats per player, and on-ice stats per forward
 * line, defense pair and team. Rows are grouped by game, session or season
 * and optionally split by strength and score state. Time on ice is the sum
 * of event lengths while on the ice, in minutes. Regular-season shootout
 * attempts are not counted.
 */

import { z } from 'zod';
import type { EnrichedEvent, EventPlayer, OnIcePlayer, TeamOnIce, Venue } from '../models/records.js';
import { isShootout } from '../util/time.js';

export const statsGroupingSchema = z.object({
  level: z.enum(['game', 'session', 'season']).default('season'),
  strengthState: z.boolean().default(false),
  scoreState: z.boolean().default(false),
});
export type StatsGrouping = z.infer<typeof statsGroupingSchema>;
export type StatsGroupingInput = z.input<typeof statsGroupingSchema>;

export const lineGroupingSchema = statsGroupingSchema.extend({
  position: z.enum(['F', 'D']).default('F'),
});
export type LineGroupingInput = z.input<typeof lineGroupingSchema>;

interface GroupKey {
  season: number;
  session: string | null;
  gameId: string | null;
  team: string;
  strengthState: string | null;
  scoreState: string | null;
}

export interface PlayerStats extends GroupKey {
  playerId: string;
  playerName: string | null;
  games: number;
  /** Minutes on the ice */
  toi: number;
  goals: number;
  primaryAssists: number;
  secondaryAssists: number;
  /** Shots on goal, goals included */
  shots: number;
  /** Unblocked shot attempts */
  fenwick: number;
  /** All shot attempts */
  corsi: number;
  predGoals: number;
  onIceGoalsFor: number;
  onIceGoalsAgainst: number;
  onIceCorsiFor: number;
  onIceCorsiAgainst: number;
  onIceFenwickFor: number;
  onIceFenwickAgainst: number;
  onIcePredGoalsFor: number;
  onIcePredGoalsAgainst: number;
}

/** On-ice stats of a line, a defense pair or a whole team */
export interface UnitStats extends GroupKey {
  /** Sorted player ids of the unit; empty for team rows */
  players: string[];
  games: number;
  toi: number;
  goalsFor: number;
  goalsAgainst: number;
  corsiFor: number;
  corsiAgainst: number;
  fenwickFor: number;
  fenwickAgainst: number;
  predGoalsFor: number;
  predGoalsAgainst: number;
}

type PlayerCounter = Exclude<keyof PlayerStats, keyof GroupKey | 'playerId' | 'playerName' | 'games'>;
type UnitCounter = Exclude<keyof UnitStats, keyof GroupKey | 'players' | 'games'>;
type Counters<K extends string> = Partial<Record<K, number>>;

function playerCounters(): Record<PlayerCounter, number> {
  return {
    toi: 0,
    goals: 0,
    primaryAssists: 0,
    secondaryAssists: 0,
    shots: 0,
    fenwick: 0,
    corsi: 0,
    predGoals: 0,
    onIceGoalsFor: 0,
    onIceGoalsAgainst: 0,
    onIceCorsiFor: 0,
    onIceCorsiAgainst: 0,
    onIceFenwickFor: 0,
    onIceFenwickAgainst: 0,
    onIcePredGoalsFor: 0,
    onIcePredGoalsAgainst: 0,
  };
}

function unitCounters(): Record<UnitCounter, number> {
  return {
    toi: 0,
    goalsFor: 0,
    goalsAgainst: 0,
    corsiFor: 0,
    corsiAgainst: 0,
    fenwickFor: 0,
    fenwickAgainst: 0,
    predGoalsFor: 0,
    predGoalsAgainst: 0,
  };
}

function teamOf(teamJersey: string | null): string | null {
  return teamJersey === null ? null : teamJersey.replace(/\d+$/, '');
}

function groupKey(event: EnrichedEvent, team: string, grouping: StatsGrouping): GroupKey {
  const own = event.eventTeam === null || event.eventTeam === team;
  return {
    season: event.season,
    session: grouping.level === 'season' ? null : event.session,
    gameId: grouping.level === 'game' ? event.gameId : null,
    team,
    strengthState: grouping.strengthState ? (own ? event.strengthState : event.oppStrengthState) : null,
    scoreState: grouping.scoreState ? (own ? event.scoreState : event.oppScoreState) : null,
  };
}

function keyString(key: GroupKey, id: string): string {
  return [key.season, key.session, key.gameId, id, key.team, key.strengthState, key.scoreState].join('|');
}

function compareKeys(a: GroupKey, b: GroupKey): number {
  return (
    a.season - b.season ||
    (a.session ?? '').localeCompare(b.session ?? '') ||
    (a.gameId ?? '').localeCompare(b.gameId ?? '') ||
    a.team.localeCompare(b.team)
  );
}

function compareStates(a: GroupKey, b: GroupKey): number {
  return (a.strengthState ?? '').localeCompare(b.strengthState ?? '') || (a.scoreState ?? '').localeCompare(b.scoreState ?? '');
}

/**
 * Rows keyed by grouping and an id, with summed counters and the set of
 * games each row appeared in
 */
class Table<Info extends GroupKey, K extends string> {
  private readonly rows = new Map<string, { info: Info; counters: Record<K, number>; gameIds: Set<string> }>();

  constructor(private readonly empty: () => Record<K, number>) {}

  /**
   * Adds counters to a row, creating it from init the first time
   *
   * @returns The row's info, shared across later adds
   */
  add(event: EnrichedEvent, key: GroupKey, id: string, init: () => Info, counters: Counters<K>): Info {
    const k = keyString(key, id);
    let entry = this.rows.get(k);
    if (!entry) {
      entry = { info: init(), counters: this.empty(), gameIds: new Set() };
      this.rows.set(k, entry);
    }
    entry.gameIds.add(event.gameId);
    for (const counter of Object.keys(entry.counters)) {
      if (isKey(entry.counters, counter)) entry.counters[counter] += counters[counter] ?? 0;
    }
    return entry.info;
  }

  entries(): { info: Info; counters: Record<K, number>; games: number }[] {
    return [...this.rows.values()].map(({ info, counters, gameIds }) => ({ info, counters, games: gameIds.size }));
  }
}

function isKey<K extends string>(record: Record<K, number>, key: string): key is K {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/** A shot attempt, credited to the team that took it */
interface Attempt {
  venue: Venue;
  goal: boolean;
  /** Not blocked */
  fenwick: boolean;
  predGoal: number;
}

/**
 * The attempt an event records, if any. A block belongs to the shooter's
 * team, not to the blocking team that owns the event.
 */
function shotAttempt(event: EnrichedEvent): Attempt | null {
  switch (event.event) {
    case 'GOAL':
    case 'SHOT':
    case 'MISS':
      if (event.eventTeamVenue === null) return null;
      return { venue: event.eventTeamVenue, goal: event.event === 'GOAL', fenwick: true, predGoal: event.predGoal ?? 0 };
    case 'BLOCK': {
      const team = teamOf(event.players.find(p => p.role === 'SHOOTER')?.teamJersey ?? null);
      const venue: Venue | null = team === event.homeTeam ? 'HOME' : team === event.awayTeam ? 'AWAY' : null;
      return venue === null ? null : { venue, goal: false, fenwick: false, predGoal: 0 };
    }
    default:
      return null;
  }
}

function onIceCounters(attempt: Attempt | null, venue: Venue, minutes: number): Counters<UnitCounter> {
  if (attempt === null) return { toi: minutes };
  const fenwick = attempt.fenwick ? 1 : 0;
  const goal = attempt.goal ? 1 : 0;
  if (attempt.venue === venue) {
    return { toi: minutes, corsiFor: 1, fenwickFor: fenwick, goalsFor: goal, predGoalsFor: attempt.predGoal };
  }
  return { toi: minutes, corsiAgainst: 1, fenwickAgainst: fenwick, goalsAgainst: goal, predGoalsAgainst: attempt.predGoal };
}

function asPlayerCounters(unit: Counters<UnitCounter>): Counters<PlayerCounter> {
  return {
    toi: unit.toi,
    onIceGoalsFor: unit.goalsFor,
    onIceGoalsAgainst: unit.goalsAgainst,
    onIceCorsiFor: unit.corsiFor,
    onIceCorsiAgainst: unit.corsiAgainst,
    onIceFenwickFor: unit.fenwickFor,
    onIceFenwickAgainst: unit.fenwickAgainst,
    onIcePredGoalsFor: unit.predGoalsFor,
    onIcePredGoalsAgainst: unit.predGoalsAgainst,
  };
}

function individualCounters(event: EnrichedEvent, role: string): Counters<PlayerCounter> {
  switch (event.event) {
    case 'GOAL':
      if (role === 'GOAL SCORER') return { goals: 1, shots: 1, fenwick: 1, corsi: 1, predGoals: event.predGoal ?? 0 };
      if (role === 'PRIMARY ASSIST') return { primaryAssists: 1 };
      if (role === 'SECONDARY ASSIST') return { secondaryAssists: 1 };
      return {};
    case 'SHOT':
      return role === 'SHOOTER' ? { shots: 1, fenwick: 1, corsi: 1, predGoals: event.predGoal ?? 0 } : {};
    case 'MISS':
      return role === 'SHOOTER' ? { fenwick: 1, corsi: 1, predGoals: event.predGoal ?? 0 } : {};
    case 'BLOCK':
      return role === 'SHOOTER' ? { corsi: 1 } : {};
    default:
      return {};
  }
}

type PlayerInfo = Pick<PlayerStats, keyof GroupKey | 'playerId' | 'playerName'>;
type UnitInfo = Pick<UnitStats, keyof GroupKey | 'players'>;

interface Identity {
  playerId: string;
  team: string;
  name: string | null;
}

function rosterPlayer(player: EventPlayer): Identity | null {
  if (player.playerId === null) return null;
  const team = teamOf(player.teamJersey);
  return team === null ? null : { playerId: player.playerId, team, name: player.name };
}

function onIcePlayers(team: TeamOnIce): Identity[] {
  return [...team.forwards, ...team.defense, ...team.goalies].flatMap((p: OnIcePlayer) => {
    const club = teamOf(p.teamJersey);
    return club === null ? [] : [{ playerId: p.playerId, team: club, name: null }];
  });
}

const VENUES: readonly Venue[] = ['HOME', 'AWAY'];

function counted(events: readonly EnrichedEvent[]): EnrichedEvent[] {
  return events.filter(event => !isShootout(event.period, event.session));
}

/**
 * Aggregates player stats over enriched events of any number of games
 */
export function aggregatePlayerStats(events: readonly EnrichedEvent[], input: StatsGroupingInput = {}): PlayerStats[] {
  const grouping = statsGroupingSchema.parse(input);
  const table = new Table<PlayerInfo, PlayerCounter>(playerCounters);

  const add = (event: EnrichedEvent, player: Identity, counters: Counters<PlayerCounter>) => {
    const key = groupKey(event, player.team, grouping);
    const info = table.add(event, key, player.playerId, () => ({ ...key, playerId: player.playerId, playerName: player.name }), counters);
    info.playerName = info.playerName ?? player.name;
  };

  for (const event of counted(events)) {
    for (const player of event.players) {
      const counters = individualCounters(event, player.role);
      const identity = rosterPlayer(player);
      if (identity && Object.keys(counters).length > 0) add(event, identity, counters);
    }

    const attempt = shotAttempt(event);
    for (const venue of VENUES) {
      const onIce = venue === 'HOME' ? event.homeOnIce : event.awayOnIce;
      const counters = asPlayerCounters(onIceCounters(attempt, venue, event.eventLength / 60));
      for (const player of onIcePlayers(onIce)) add(event, player, counters);
    }
  }

  return table
    .entries()
    .map(({ info, counters, games }): PlayerStats => ({ ...info, games, ...counters }))
    .sort((a, b) => compareKeys(a, b) || a.playerId.localeCompare(b.playerId) || compareStates(a, b));
}

function aggregateUnits(
  events: readonly EnrichedEvent[],
  grouping: StatsGrouping,
  unitOf: (onIce: TeamOnIce) => string[] | null
): UnitStats[] {
  const table = new Table<UnitInfo, UnitCounter>(unitCounters);

  for (const event of counted(events)) {
    const attempt = shotAttempt(event);
    for (const venue of VENUES) {
      const players = unitOf(venue === 'HOME' ? event.homeOnIce : event.awayOnIce);
      if (players === null) continue;
      const team = venue === 'HOME' ? event.homeTeam : event.awayTeam;
      const key = groupKey(event, team, grouping);
      const counters = onIceCounters(attempt, venue, event.eventLength / 60);
      table.add(event, key, players.join(','), () => ({ ...key, players }), counters);
    }
  }

  return table
    .entries()
    .map(({ info, counters, games }): UnitStats => ({ ...info, games, ...counters }))
    .sort((a, b) => compareKeys(a, b) || a.players.join(',').localeCompare(b.players.join(',')) || compareStates(a, b));
}

/**
 * Aggregates on-ice stats per forward line or defense pair
 *
 * A unit is the exact set of forwards (or defensemen) a team has on the
 * ice at an event; events where a team has none of them are skipped.
 */
export function aggregateLineStats(events: readonly EnrichedEvent[], input: LineGroupingInput = {}): UnitStats[] {
  const { position, ...grouping } = lineGroupingSchema.parse(input);
  return aggregateUnits(events, grouping, onIce => {
    const players = (position === 'F' ? onIce.forwards : onIce.defense).map(p => p.playerId).sort();
    return players.length > 0 ? players : null;
  });
}

/**
 * Aggregates on-ice stats per team
 */
export function aggregateTeamStats(events: readonly EnrichedEvent[], input: StatsGroupingInput = {}): UnitStats[] {
  return aggregateUnits(events, statsGroupingSchema.parse(input), () => []);
}
