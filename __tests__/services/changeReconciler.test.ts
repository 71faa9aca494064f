import { describe, it, expect } from 'vitest';
import {
  OnIceTimeline,
  checkCardinality,
  compareChanges,
  reconcileChanges,
} from '../../src/services/changeReconciler.js';
import { CorrectionTable } from '../../src/services/corrections.js';
import type { ShiftRecord } from '../../src/models/records.js';
import { GAME_ID } from '../fixtures/game.js';
import { game, normalizedGame, standardRoster } from '../fixtures/normalized.js';
import { change } from '../fixtures/events.js';

const none = CorrectionTable.empty();
const roster = standardRoster();

function withShift(shifts: ShiftRecord[], teamJersey: string, edit: Partial<ShiftRecord>): ShiftRecord[] {
  return shifts.map(s => (s.teamJersey === teamJersey ? { ...s, ...edit } : s));
}

describe('reconcileChanges', () => {
  const { shifts } = normalizedGame();
  const result = reconcileChanges(game, shifts, roster, none);

  it('should emit an ON and an OFF change per shift', () => {
    expect(result.changes).toHaveLength(24);
    expect(result.changes.filter(c => c.direction === 'ON').every(c => c.periodSeconds === 0)).toBe(true);
    expect(result.changes.filter(c => c.direction === 'OFF').every(c => c.periodSeconds === 1200)).toBe(true);
    expect(result.diagnostics).toEqual([]);
  });

  it('should order changes away first and by sweater number', () => {
    expect(result.changes.slice(0, 3).map(c => c.teamJersey)).toEqual(['CGY5', 'CGY6', 'CGY20']);
    expect(result.changes[0]).toEqual({
      gameId: GAME_ID,
      period: 1,
      periodSeconds: 0,
      gameSeconds: 0,
      playerId: 'KEVIN.REED',
      teamJersey: 'CGY5',
      team: 'CGY',
      teamVenue: 'AWAY',
      position: 'D',
      direction: 'ON',
    });
  });

  it('should return nothing when the shift source is unavailable', () => {
    expect(reconcileChanges(game, null, roster, none)).toEqual({ shifts: [], changes: [], diagnostics: [] });
  });

  it('should fill a period with no goalie shift from the starting goalie', () => {
    const { shifts: out, changes } = reconcileChanges(
      game,
      shifts.filter(s => s.teamJersey !== 'EDM30'),
      roster,
      none
    );
    const filled = out.find(s => s.teamJersey === 'EDM30');
    expect(filled?.repairs).toEqual(['goalie-fill']);
    expect(filled?.teamName).toBe('EDMONTON OILERS');
    expect([filled?.startSeconds, filled?.endSeconds, filled?.shiftCount]).toEqual([0, 1200, 0]);
    expect(changes.filter(c => c.playerId === 'FRANK.STONE').map(c => c.direction)).toEqual(['ON', 'OFF']);
  });

  it('should run a goalie shift printed as ending at zero to the end of the period', () => {
    const { shifts: out } = reconcileChanges(game, withShift(shifts, 'CGY40', { startSeconds: 600, endSeconds: 0 }), roster, none);
    const wood = out.find(s => s.teamJersey === 'CGY40');
    expect(wood?.endSeconds).toBe(1200);
    expect(wood?.durationSeconds).toBe(600);
    expect(wood?.repairs).toEqual(['goalie-end']);
  });

  it('should report a shift for an unknown player once', () => {
    const stranger = { ...shifts[0], teamJersey: 'EDM99', jersey: 99, playerName: 'NO ONE' };
    const { diagnostics, changes } = reconcileChanges(game, [...shifts, stranger, { ...stranger, shiftCount: 2, startSeconds: 100 }], roster, none);
    expect(diagnostics.map(d => [d.kind, d.detail.teamJersey])).toEqual([['IdentityUnresolved', 'EDM99']]);
    expect(changes.some(c => c.teamJersey === 'EDM99')).toBe(false);
  });

  it('should leave shootout shifts out', () => {
    const shootout = { ...shifts[0], period: 5, startSeconds: 0, endSeconds: 10, durationSeconds: 10 };
    const { changes } = reconcileChanges(game, [...shifts, shootout], roster, none);
    expect(changes.some(c => c.period === 5)).toBe(false);
  });

  it('should apply shift corrections', () => {
    const corrections = new CorrectionTable([
      { gameId: GAME_ID, source: 'html_shifts', match: { teamJersey: 'EDM11' }, action: { type: 'set', field: 'endSeconds', value: 600 } },
    ]);
    const { changes, diagnostics } = reconcileChanges(game, shifts, roster, corrections);
    expect(changes.find(c => c.teamJersey === 'EDM11' && c.direction === 'OFF')?.periodSeconds).toBe(600);
    expect(diagnostics).toEqual([]);
  });
});

describe('compareChanges', () => {
  it('should put OFF before ON at the same second', () => {
    const on = change('ADAM.NORTH', 'EDM10', 'ON', 100);
    const off = change('BEN.EAST', 'EDM11', 'OFF', 100);
    expect([on, off].sort(compareChanges)).toEqual([off, on]);
  });
});

describe('OnIceTimeline', () => {
  const timeline = OnIceTimeline.fromChanges(reconcileChanges(game, normalizedGame().shifts, roster, none).changes);

  it('should list players on the ice sorted by sweater number', () => {
    expect(timeline.onIce(1, 100, 'HOME', 'after').map(p => p.teamJersey)).toEqual([
      'EDM2', 'EDM3', 'EDM10', 'EDM11', 'EDM12', 'EDM30',
    ]);
  });

  it('should include changes at the same second only after them', () => {
    expect(timeline.onIce(1, 0, 'AWAY', 'before')).toEqual([]);
    expect(timeline.onIce(1, 0, 'AWAY', 'after')).toHaveLength(6);
    expect(timeline.onIce(1, 1200, 'AWAY', 'before')).toHaveLength(6);
    expect(timeline.onIce(1, 1200, 'AWAY', 'after')).toEqual([]);
  });

  it('should know nothing about periods without changes', () => {
    expect(timeline.hasPeriod(1)).toBe(true);
    expect(timeline.hasPeriod(2)).toBe(false);
    expect(timeline.onIce(2, 100, 'HOME', 'after')).toEqual([]);
  });

  it('should start every period empty', () => {
    const timeline = OnIceTimeline.fromChanges([
      change('ADAM.NORTH', 'EDM10', 'ON', 1100),
      change('BEN.EAST', 'EDM11', 'ON', 30, { period: 2 }),
    ]);
    expect(timeline.onIce(2, 60, 'HOME', 'after').map(p => p.playerId)).toEqual(['BEN.EAST']);
  });
});

describe('checkCardinality', () => {
  it('should report a team with two goalies', () => {
    const skaters = ['A', 'B', 'C', 'D', 'E'].map((name, i) => change(`${name}.SKATER`, `EDM${i + 1}`, 'ON', 0));
    const goalies = [change('G.ONE', 'EDM30', 'ON', 0, { position: 'G' }), change('G.TWO', 'EDM31', 'ON', 0, { position: 'G' })];
    const diagnostics = checkCardinality(GAME_ID, OnIceTimeline.fromChanges([...skaters, ...goalies].sort(compareChanges)));
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].message).toBe('HOME has 5 skaters and 2 goalies');
  });

  it('should report six skaters with a goalie in net', () => {
    const skaters = ['A', 'B', 'C', 'D', 'E', 'F'].map((name, i) => change(`${name}.SKATER`, `EDM${i + 1}`, 'ON', 0));
    const goalie = change('G.ONE', 'EDM30', 'ON', 0, { position: 'G' });
    const diagnostics = checkCardinality(GAME_ID, OnIceTimeline.fromChanges([...skaters, goalie].sort(compareChanges)));
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].message).toBe('HOME has 6 skaters and 1 goalies');
  });

  it('should accept six skaters with the net empty', () => {
    const skaters = ['A', 'B', 'C', 'D', 'E', 'F'].map((name, i) => change(`${name}.SKATER`, `EDM${i + 1}`, 'ON', 0));
    expect(checkCardinality(GAME_ID, OnIceTimeline.fromChanges([...skaters].sort(compareChanges)))).toEqual([]);
  });
});
