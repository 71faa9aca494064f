/**
 * Change Reconciler
 *
 * Turns shift records into a single ordered stream of ON/OFF changes for
 * both teams, and answers "who was on the ice" through OnIceTimeline.
 *
 * Shift data has gaps the reports never fill themselves: a goalie who
 * played a whole period may have no shift in it, and a goalie's last shift
 * can be printed as ending at 0:00. Both are repaired here, from the
 * roster's goalies.
 */

import { shiftRecordSchema } from '../models/records.js';
import type { Diagnostic, OnIcePlayer, ShiftChange, ShiftRecord, Venue } from '../models/records.js';
import type { GameId } from '../util/gameId.js';
import { isShootout, periodLength, toGameSeconds } from '../util/time.js';
import type { CorrectionTable } from './corrections.js';
import { raiseDiagnostic } from './diagnostics.js';
import type { RosterIndex } from './rosterReconciler.js';

export type OnIcePhase = 'before' | 'after';

const VENUES: readonly Venue[] = ['AWAY', 'HOME'];

/** Skater count range accepted while a team has anyone on the ice */
const MIN_SKATERS = 3;
/** Six skaters only with the net empty */
const MAX_SKATERS = 6;

export interface ChangeReconciliation {
  shifts: ShiftRecord[];
  changes: ShiftChange[];
  diagnostics: Diagnostic[];
}

/**
 * Orders changes by (period, second, OFF before ON, venue, jersey)
 */
export function compareChanges(a: ShiftChange, b: ShiftChange): number {
  return (
    a.period - b.period ||
    a.periodSeconds - b.periodSeconds ||
    (a.direction === b.direction ? 0 : a.direction === 'OFF' ? -1 : 1) ||
    a.teamVenue.localeCompare(b.teamVenue) ||
    a.teamJersey.localeCompare(b.teamJersey, 'en', { numeric: true })
  );
}

/** Last second played in a period: full length in regulation, last recorded shift end in overtime */
function periodEnd(period: number, shifts: readonly ShiftRecord[]): number {
  if (period < 4) return periodLength(period, 'R');
  return Math.max(0, ...shifts.filter(s => s.period === period).map(s => s.endSeconds));
}

function isGoalie(shift: ShiftRecord, roster: RosterIndex): boolean {
  return roster.byTeamJersey(shift.teamJersey)?.position === 'G';
}

/**
 * Synthesizes full-period shifts for teams with no goalie shift in a period
 */
function fillGoalies(gameId: GameId, shifts: ShiftRecord[], roster: RosterIndex): ShiftRecord[] {
  const periods = [...new Set(shifts.map(s => s.period))].sort((a, b) => a - b);
  const out = [...shifts];

  for (const period of periods) {
    const end = periodEnd(period, shifts);
    for (const venue of VENUES) {
      const goalieShifts = (p: number) => out.filter(s => s.period === p && s.teamVenue === venue && isGoalie(s, roster));
      if (goalieShifts(period).length > 0) continue;

      let template: Pick<ShiftRecord, 'team' | 'teamName' | 'playerName' | 'jersey' | 'teamJersey'> | undefined;
      if (period === periods[0]) {
        const starter = roster.startingGoalie(venue);
        const teamName = shifts.find(s => s.teamVenue === venue)?.teamName ?? starter?.team;
        if (starter && teamName) {
          template = { team: starter.team, teamName, playerName: starter.playerName, jersey: starter.jersey, teamJersey: starter.teamJersey };
        }
      } else {
        const previous = goalieShifts(period - 1);
        template = previous.reduce<ShiftRecord | undefined>(
          (last, s) => (last === undefined || s.endSeconds >= last.endSeconds ? s : last),
          undefined
        );
      }
      if (!template) continue;

      out.push({
        gameId: gameId.id,
        team: template.team,
        teamName: template.teamName,
        teamVenue: venue,
        playerName: template.playerName,
        jersey: template.jersey,
        teamJersey: template.teamJersey,
        period,
        shiftCount: 0,
        startSeconds: 0,
        endSeconds: end,
        durationSeconds: end,
        repairs: ['goalie-fill'],
      });
    }
  }
  return out;
}

function toChanges(gameId: GameId, shift: ShiftRecord, playerId: string, position: string | null): ShiftChange[] {
  const change = (direction: 'ON' | 'OFF', periodSeconds: number): ShiftChange => ({
    gameId: gameId.id,
    period: shift.period,
    periodSeconds,
    gameSeconds: toGameSeconds(shift.period, periodSeconds, gameId.session),
    playerId,
    teamJersey: shift.teamJersey,
    team: shift.team,
    teamVenue: shift.teamVenue,
    position,
    direction,
  });
  return [change('ON', shift.startSeconds), change('OFF', shift.endSeconds)];
}

/**
 * Builds the change stream of one game
 *
 * @param shifts - Shift records, or null when the source is unavailable
 */
export function reconcileChanges(
  gameId: GameId,
  shifts: readonly ShiftRecord[] | null,
  roster: RosterIndex,
  corrections: CorrectionTable
): ChangeReconciliation {
  const diagnostics: Diagnostic[] = [];
  if (shifts === null || shifts.length === 0) return { shifts: [], changes: [], diagnostics };

  const corrected = corrections
    .apply(gameId.id, 'html_shifts', shifts, shiftRecordSchema)
    .map(r => r.record)
    .filter(s => !isShootout(s.period, gameId.session));

  // Goalie shifts printed as ending at 0:00 run to the end of the period
  const closed = corrected.map(shift => {
    if (!isGoalie(shift, roster) || shift.endSeconds !== 0) return shift;
    const end = periodEnd(shift.period, corrected);
    return { ...shift, endSeconds: end, durationSeconds: end - shift.startSeconds, repairs: [...shift.repairs, 'goalie-end'] };
  });

  const filled = fillGoalies(gameId, closed, roster);

  const changes: ShiftChange[] = [];
  const unresolved = new Set<string>();
  for (const shift of filled) {
    const entry = roster.byTeamJersey(shift.teamJersey);
    if (!entry) {
      if (!unresolved.has(shift.teamJersey)) {
        unresolved.add(shift.teamJersey);
        diagnostics.push(
          raiseDiagnostic('IdentityUnresolved', gameId.id, `no roster entry for ${shift.teamJersey}`, {
            teamJersey: shift.teamJersey,
            playerName: shift.playerName,
          }, 'html_shifts')
        );
      }
      continue;
    }
    if (shift.endSeconds <= shift.startSeconds) continue;
    changes.push(...toChanges(gameId, shift, entry.playerId, entry.position));
  }
  changes.sort(compareChanges);

  diagnostics.push(...checkCardinality(gameId.id, OnIceTimeline.fromChanges(changes)));
  return { shifts: filled, changes, diagnostics };
}

/**
 * Reports every timestamp at which a team has more than one goalie,
 * fewer than three skaters, or more skaters than its net allows
 * (five with a goalie, six without) while anyone is on the ice
 */
export function checkCardinality(gameId: string, timeline: OnIceTimeline): Diagnostic[] {
  const out: Diagnostic[] = [];
  for (const { period, periodSeconds } of timeline.timestamps()) {
    for (const venue of VENUES) {
      const players = timeline.onIce(period, periodSeconds, venue, 'after');
      if (players.length === 0) continue;
      const goalies = players.filter(p => p.position === 'G').length;
      const skaters = players.length - goalies;
      const maxSkaters = goalies === 0 ? MAX_SKATERS : MAX_SKATERS - 1;
      if (goalies <= 1 && skaters >= MIN_SKATERS && skaters <= maxSkaters) continue;
      out.push(
        raiseDiagnostic('OnIceCardinality', gameId, `${venue} has ${skaters} skaters and ${goalies} goalies`, {
          period,
          periodSeconds,
          venue,
          skaters,
          goalies,
        }, 'html_shifts')
      );
    }
  }
  return out;
}

interface Snapshot {
  periodSeconds: number;
  onIce: Record<Venue, OnIcePlayer[]>;
}

function byJersey(a: OnIcePlayer, b: OnIcePlayer): number {
  return a.teamJersey.localeCompare(b.teamJersey, 'en', { numeric: true });
}

/**
 * On-ice state indexed per period by change timestamp
 *
 * Each period starts empty; nothing carries over a period boundary.
 */
export class OnIceTimeline {
  private readonly periods = new Map<number, Snapshot[]>();

  private constructor() {}

  /**
   * @param changes - Changes ordered by compareChanges
   */
  static fromChanges(changes: readonly ShiftChange[]): OnIceTimeline {
    const timeline = new OnIceTimeline();
    let period: number | null = null;
    let state: Record<Venue, Map<string, OnIcePlayer>> = { AWAY: new Map(), HOME: new Map() };
    let snapshots: Snapshot[] = [];

    const snapshot = (periodSeconds: number) => {
      const onIce = {
        AWAY: [...state.AWAY.values()].sort(byJersey),
        HOME: [...state.HOME.values()].sort(byJersey),
      };
      const last = snapshots[snapshots.length - 1];
      if (last && last.periodSeconds === periodSeconds) last.onIce = onIce;
      else snapshots.push({ periodSeconds, onIce });
    };

    for (const change of changes) {
      if (change.period !== period) {
        period = change.period;
        state = { AWAY: new Map(), HOME: new Map() };
        snapshots = [];
        timeline.periods.set(period, snapshots);
      }
      const side = state[change.teamVenue];
      if (change.direction === 'ON') {
        side.set(change.playerId, { playerId: change.playerId, teamJersey: change.teamJersey, position: change.position });
      } else {
        side.delete(change.playerId);
      }
      snapshot(change.periodSeconds);
    }
    return timeline;
  }

  get isEmpty(): boolean {
    return this.periods.size === 0;
  }

  hasPeriod(period: number): boolean {
    return this.periods.has(period);
  }

  /**
   * Distinct change timestamps, in order
   */
  *timestamps(): Generator<{ period: number; periodSeconds: number }> {
    for (const [period, snapshots] of [...this.periods.entries()].sort(([a], [b]) => a - b)) {
      for (const s of snapshots) yield { period, periodSeconds: s.periodSeconds };
    }
  }

  /**
   * Players of one team on the ice at a moment
   *
   * @param phase - 'after' includes changes made at exactly this second, 'before' does not
   */
  onIce(period: number, periodSeconds: number, venue: Venue, phase: OnIcePhase): OnIcePlayer[] {
    const snapshots = this.periods.get(period);
    if (!snapshots) return [];

    // Last snapshot at or before (after) / strictly before (before) the second
    let lo = 0;
    let hi = snapshots.length - 1;
    let found = -1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const t = snapshots[mid].periodSeconds;
      const included = phase === 'after' ? t <= periodSeconds : t < periodSeconds;
      if (included) {
        found = mid;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }
    return found === -1 ? [] : snapshots[found].onIce[venue];
  }
}
