import { describe, it, expect, vi } from 'vitest';
import { scoreEvents, shotFeatures } from '../../src/services/scoring.js';
import type { ShotFeatures } from '../../src/services/scoring.js';
import { enrichedEvent, eventPlayer } from '../fixtures/events.js';

const shot = enrichedEvent({
  eventIdx: 3,
  event: 'SHOT',
  eventTeam: 'CGY',
  eventTeamVenue: 'AWAY',
  periodSeconds: 100,
  gameSeconds: 100,
  normX: 60,
  normY: 10,
  eventDistance: 30.675723300355934,
  eventAngle: 19.025606037568686,
  players: [eventPlayer('IAN.FIELD', 'CGY21', 'SHOOTER', 'L')],
});

const goal = enrichedEvent({
  eventIdx: 4,
  event: 'GOAL',
  eventTeam: 'EDM',
  eventTeamVenue: 'HOME',
  periodSeconds: 185,
  gameSeconds: 185,
  normX: 74,
  normY: 5,
  eventDistance: 15.811388300841896,
  eventAngle: 18.43494882292201,
  shotType: 'WRIST',
  scoreDiff: 6,
  players: [eventPlayer('ADAM.NORTH', 'EDM10', 'GOAL SCORER')],
});

const faceoff = enrichedEvent({ eventIdx: 5, event: 'FAC', periodSeconds: 185, gameSeconds: 185 });

describe('scoreEvents', () => {
  it('should set predGoal on shot attempts only', () => {
    const model = vi.fn(() => 0.25);
    const { events, diagnostics } = scoreEvents('2023020001', [shot, goal, faceoff], model);
    expect(events.map(e => e.predGoal)).toEqual([0.25, 0.25, undefined]);
    expect(model).toHaveBeenCalledTimes(2);
    expect(diagnostics).toEqual([]);
  });

  it('should not modify the input events', () => {
    scoreEvents('2023020001', [shot], () => 0.5);
    expect(shot.predGoal).toBeUndefined();
  });

  it('should skip shots without a location', () => {
    const blind = { ...shot, eventDistance: null, eventAngle: null };
    const model = vi.fn(() => 0.5);
    const { events } = scoreEvents('2023020001', [blind], model);
    expect(events[0].predGoal).toBeUndefined();
    expect(model).not.toHaveBeenCalled();
  });

  it('should reject values outside the unit interval', () => {
    const { events, diagnostics } = scoreEvents('2023020001', [shot, goal], vi.fn().mockReturnValueOnce(1.5).mockReturnValueOnce(Number.NaN));
    expect(events.map(e => e.predGoal)).toEqual([undefined, undefined]);
    expect(diagnostics.map(d => [d.kind, d.detail.eventIdx, d.detail.value])).toEqual([
      ['ScoreRejected', 3, '1.5'],
      ['ScoreRejected', 4, 'NaN'],
    ]);
  });
});

describe('scoreEvents with a failing model', () => {
  it('should reject the shots the model throws on and score the rest', () => {
    const model = vi.fn((features: ShotFeatures) => {
      if (features.event === 'SHOT') throw new Error('feature out of range');
      return 0.3;
    });
    const { events, diagnostics } = scoreEvents('2023020001', [shot, goal], model);
    expect(events.map(e => e.predGoal)).toEqual([undefined, 0.3]);
    expect(diagnostics.map(d => [d.kind, d.detail.eventIdx, d.detail.error])).toEqual([
      ['ScoreRejected', 3, 'feature out of range'],
    ]);
  });
});

describe('shotFeatures', () => {
  it('should describe the shot and the event before it', () => {
    expect(shotFeatures(goal, shot)).toEqual({
      event: 'GOAL',
      shotType: 'WRIST',
      distance: 15.811388300841896,
      angle: 18.43494882292201,
      strengthState: '5v5',
      scoreDiff: 4,
      isHome: true,
      period: 1,
      periodSeconds: 185,
      emptyNetAgainst: false,
      shooterPosition: 'F',
      prevEvent: 'SHOT',
      prevSameTeam: false,
      secondsSincePrev: 85,
      distanceFromPrev: Math.hypot(14, -5),
    });
  });

  it('should ignore an event from the previous period', () => {
    const features = shotFeatures({ ...goal, period: 2 }, shot);
    expect(features.prevEvent).toBeNull();
    expect(features.secondsSincePrev).toBeNull();
    expect(features.distanceFromPrev).toBeNull();
  });

  it('should group shooter positions', () => {
    const defense = { ...goal, players: [eventPlayer('DAN.SOUTH', 'EDM2', 'GOAL SCORER', 'D')] };
    expect(shotFeatures(defense, undefined).shooterPosition).toBe('D');
    expect(shotFeatures({ ...goal, players: [] }, undefined).shooterPosition).toBeNull();
  });
});
