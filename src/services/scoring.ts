/**
 * Scoring Adapter
 *
 * Attaches a predicted-goal value to unblocked shot attempts using an
 * injected model. The model is a plain function of shot features; this
 * module only builds the features and checks what comes back.
 */

import { SCORED_EVENTS } from '../core/constants.js';
import { toError } from '../errors/index.js';
import type { Diagnostic, EnrichedEvent } from '../models/records.js';
import { raiseDiagnostic } from './diagnostics.js';

/** Score differentials beyond this are treated alike */
const MAX_SCORE_DIFF = 4;

export type PositionGroup = 'F' | 'D' | 'G';

export interface ShotFeatures {
  event: string;
  shotType: string | null;
  distance: number;
  angle: number;
  strengthState: string;
  scoreDiff: number;
  isHome: boolean;
  period: number;
  periodSeconds: number;
  emptyNetAgainst: boolean;
  shooterPosition: PositionGroup | null;
  prevEvent: string | null;
  prevSameTeam: boolean;
  secondsSincePrev: number | null;
  distanceFromPrev: number | null;
}

export type ScoringFunction = (features: ShotFeatures) => number;

export interface ScoringResult {
  events: EnrichedEvent[];
  diagnostics: Diagnostic[];
}

function positionGroup(position: string | null): PositionGroup | null {
  if (position === null) return null;
  if (position === 'G' || position === 'D') return position;
  return 'F';
}

function isScorable(event: EnrichedEvent): boolean {
  return SCORED_EVENTS.has(event.event) && event.eventDistance !== null && event.eventAngle !== null;
}

/**
 * Features of one shot attempt, with context from the event before it in the same period
 */
export function shotFeatures(event: EnrichedEvent, previous: EnrichedEvent | undefined): ShotFeatures {
  const prev = previous && previous.period === event.period ? previous : undefined;
  const distanceFromPrev =
    prev && prev.normX !== null && prev.normY !== null && event.normX !== null && event.normY !== null
      ? Math.hypot(event.normX - prev.normX, event.normY - prev.normY)
      : null;
  const secondsSincePrev =
    prev && prev.periodSeconds !== null && event.periodSeconds !== null
      ? event.periodSeconds - prev.periodSeconds
      : null;

  return {
    event: event.event,
    shotType: event.shotType,
    distance: event.eventDistance ?? 0,
    angle: event.eventAngle ?? 0,
    strengthState: event.strengthState,
    scoreDiff: Math.max(-MAX_SCORE_DIFF, Math.min(MAX_SCORE_DIFF, event.scoreDiff)),
    isHome: event.eventTeamVenue === 'HOME',
    period: event.period,
    periodSeconds: event.periodSeconds ?? 0,
    emptyNetAgainst: event.emptyNet,
    shooterPosition: positionGroup(event.players[0]?.position ?? null),
    prevEvent: prev?.event ?? null,
    prevSameTeam: prev !== undefined && prev.eventTeam !== null && prev.eventTeam === event.eventTeam,
    secondsSincePrev,
    distanceFromPrev,
  };
}

/**
 * Returns copies of the events with `predGoal` set on every scorable shot
 *
 * Model outputs outside [0, 1], and model errors, are rejected and leave
 * the field unset.
 */
export function scoreEvents(
  gameId: string,
  events: readonly EnrichedEvent[],
  model: ScoringFunction
): ScoringResult {
  const diagnostics: Diagnostic[] = [];
  const scored = events.map((event, i): EnrichedEvent => {
    if (!isScorable(event)) return { ...event };
    let value: number;
    try {
      value = model(shotFeatures(event, i > 0 ? events[i - 1] : undefined));
    } catch (err) {
      const error = toError(err);
      diagnostics.push(
        raiseDiagnostic('ScoreRejected', gameId, `model failed for event ${event.eventIdx}: ${error.message}`, {
          eventIdx: event.eventIdx,
          error: error.message,
        })
      );
      return { ...event };
    }
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      diagnostics.push(
        raiseDiagnostic('ScoreRejected', gameId, `model returned ${value} for event ${event.eventIdx}`, {
          eventIdx: event.eventIdx,
          value: String(value),
        })
      );
      return { ...event };
    }
    return { ...event, predGoal: value };
  });
  return { events: scored, diagnostics };
}
