/**
 * HTML Event Normalizer
 *
 * Parses the legacy play-by-play report (PL######.HTM). Extraction and
 * derivation are separate steps: rows hold the report's cells as text,
 * and every other field is derived from the row. The event reconciler
 * re-runs the derivation on records whose text a correction changed.
 */

import type { HtmlEventRecord, HtmlPlayerRef, RawSource, Sentinel } from '../../models/records.js';
import type { GameId } from '../../util/gameId.js';
import { PENALTIES } from '../../util/data.js';
import { cleanText, replaceTeamAliases } from '../../util/names.js';
import { toGameSeconds } from '../../util/time.js';
import { cellText, loadHtml, parseDefect, roleFor } from './common.js';

/** Cells per event row: index, period, strength, time, event, description, away on-ice, home on-ice */
const CELLS_PER_ROW = 8;

/** Clock text printed for some period ends in place of the real time */
export const GARBLED_PERIOD_END = '-16:0-120:00';

const NON_DESCRIPTS: Readonly<Record<string, string>> = {
  PGSTR: 'PRE-GAME START',
  PGEND: 'PRE-GAME END',
  ANTHEM: 'NATIONAL ANTHEM',
  EISTR: 'EARLY INTERMISSION START',
  EIEND: 'EARLY INTERMISSION END',
};

const NON_TEAM_EVENTS: ReadonlySet<string> = new Set([
  'STOP', 'ANTHEM', 'PGSTR', 'PGEND', 'PSTR', 'PEND', 'EISTR', 'EIEND', 'GEND', 'SOC', 'PBOX',
]);

/** Events whose players all belong to the event team and are printed as bare numbers */
const TEAM_NUMBERED_EVENTS: ReadonlySet<string> = new Set(['GOAL', 'SHOT', 'TAKE', 'GIVE']);

const SHOT_EVENTS: ReadonlySet<string> = new Set(['GOAL', 'SHOT', 'MISS', 'BLOCK']);

const PATTERNS = {
  eventTeam: /^([A-Z]{3}|[A-Z]\.[A-Z])/,
  faceoffWinner: /([A-Z]{3}) WON/,
  blockTeam: /BLOCKED BY\s+([A-Z]{3})/,
  numbered: /#(\d{1,2})?(?:\s+([A-Z][A-Z'.-]*))?/g,
  teamNumbered: /([A-Z]{3})\s+#(\d{1,2})?(?:\s+([A-Z][A-Z'.-]*))?/g,
  zone: /([A-Za-z]{3}). ZONE/,
  penalty: /([A-Za-z]*|[A-Za-z]*-[A-Za-z]*|[A-Za-z]*\s+\(.*\))\s*\(/,
  penaltyLength: /(\d+) MIN/,
  shotType: /,\s+([A-Za-z]*|[A-Za-z]*-[A-Za-z]*)\s*,/,
  distance: /(\d+) FT/,
  servedBy: /([A-Z]{3})\s.+SERVED BY: #(\d+)(?:\s+([A-Z][A-Z'.-]*))?/,
  drawnBy: /DRAWN BY: ([A-Z]{3}) #(\d+)(?:\s+([A-Z][A-Z'.-]*))?/,
} as const;

/**
 * One row of the report, cells as cleaned text
 */
export interface HtmlEventRow {
  eventIdx: number;
  period: number;
  strength: string | null;
  timeText: string;
  event: string;
  description: string;
}

export interface HtmlEventContext {
  gameId: GameId;
  /** Raw clock text of the last goal in each period */
  lastGoalTimes: ReadonlyMap<number, string>;
}

function playerRef(team: string | null, jersey: string | undefined, lastName: string | undefined): HtmlPlayerRef {
  return {
    team,
    jersey: jersey === undefined ? null : Number(jersey),
    lastName: jersey === undefined ? null : (lastName ?? null),
    sentinel: null,
    role: '',
  };
}

function sentinelRef(sentinel: Sentinel): HtmlPlayerRef {
  return { team: null, jersey: null, lastName: null, sentinel, role: '' };
}

function sameRef(a: HtmlPlayerRef | null, b: HtmlPlayerRef | null): boolean {
  return a !== null && b !== null && a.sentinel === null && a.team === b.team && a.jersey !== null && a.jersey === b.jersey;
}

/**
 * Elapsed seconds from the report's clock cell ("0:0020:00" → 0)
 */
export function elapsedSeconds(timeText: string): number | null {
  const [minutes, rest] = timeText.split(':');
  const seconds = (rest ?? '').slice(0, 2);
  if (!/^\d+$/.test(minutes ?? '') || !/^\d{2}$/.test(seconds)) return null;
  return Number(minutes) * 60 + Number(seconds);
}

export function extractHtmlEventRows(raw: RawSource): HtmlEventRow[] {
  const $ = loadHtml(raw, raw.documents[0]);
  const cells = $('td.bborder')
    .toArray()
    .map(el => cellText($(el).text()));

  if (cells.length % CELLS_PER_ROW !== 0) {
    throw parseDefect(raw, `found ${cells.length} event cells, not a multiple of ${CELLS_PER_ROW}`);
  }

  const rows: HtmlEventRow[] = [];
  for (let i = 0; i < cells.length; i += CELLS_PER_ROW) {
    const row = cells.slice(i, i + CELLS_PER_ROW).map(cell => cell.trim());
    if (row.includes('#')) continue;

    const [idxText, periodText, strength, time, event, description] = row;
    const eventIdx = Number(idxText);
    const period = Number(periodText);
    if (!Number.isInteger(eventIdx) || !Number.isInteger(period)) {
      throw parseDefect(raw, `row ${i / CELLS_PER_ROW} has index "${idxText}" and period "${periodText}"`);
    }
    rows.push({
      eventIdx,
      period,
      strength: strength === '' ? null : cleanText(strength),
      timeText: time.replace(/\s+/g, ''),
      event: cleanText(event),
      description: cleanText(description),
    });
  }
  return rows;
}

export function buildHtmlEventContext(gameId: GameId, rows: readonly HtmlEventRow[]): HtmlEventContext {
  const lastGoalTimes = new Map<number, string>();
  for (const row of rows) {
    if (row.event === 'GOAL') lastGoalTimes.set(row.period, row.timeText);
  }
  return { gameId, lastGoalTimes };
}

function eventTeamOf(event: string, description: string): string | null {
  let team: string | null = null;
  if (!NON_TEAM_EVENTS.has(event)) {
    const match = PATTERNS.eventTeam.exec(description);
    team = match && match[1] !== 'LEA' ? match[1] : null;
  }
  if (event === 'FAC') {
    team = PATTERNS.faceoffWinner.exec(description)?.[1] ?? team;
  }
  if (event === 'BLOCK' && description.includes('BLOCKED BY')) {
    team = PATTERNS.blockTeam.exec(description)?.[1] ?? team;
  }
  return team;
}

function penaltySlots(description: string, listed: HtmlPlayerRef[]): HtmlPlayerRef[] {
  const served = PATTERNS.servedBy.exec(description);
  const drawn = PATTERNS.drawnBy.exec(description);
  const servedRef = served ? { ...playerRef(served[1], served[2], served[3]), role: 'SERVED BY' } : null;
  const drawnRef = drawn ? { ...playerRef(drawn[1], drawn[2], drawn[3]), role: 'DRAWN BY' } : null;
  const benchStaff = description.includes('TEAM') || description.includes('HEAD COACH');

  const slots: (HtmlPlayerRef | null)[] = [listed[0] ?? null, listed[1] ?? null, listed[2] ?? null];

  if ((description.includes('TEAM') && servedRef) || description.includes('HEAD COACH')) {
    slots[0] = sentinelRef('BENCH');
    slots[1] = servedRef ?? drawnRef ?? slots[1];
  }

  if (servedRef && drawnRef) {
    slots[1] = drawnRef;
    if (sameRef(slots[0], slots[1])) slots[0] = sentinelRef('BENCH');
    slots[2] = servedRef;
    if (benchStaff) [slots[1], slots[2]] = [slots[2], slots[1]];
  } else if (servedRef) {
    slots[1] = servedRef;
  } else if (drawnRef) {
    slots[1] = drawnRef;
  }

  slots[0] = slots[0] ?? sentinelRef('BENCH');
  return slots
    .filter((ref): ref is HtmlPlayerRef => ref !== null)
    .map((ref, i) => ({ ...ref, role: i === 0 ? 'COMMITTED BY' : ref.role || roleFor('PENL', i) }));
}

function eventPlayers(event: string, description: string, eventTeam: string | null): { players: HtmlPlayerRef[]; eventTeam: string | null } {
  const listed = TEAM_NUMBERED_EVENTS.has(event)
    ? [...description.matchAll(PATTERNS.numbered)].map(m => playerRef(eventTeam, m[1], m[2]))
    : [...description.matchAll(PATTERNS.teamNumbered)].map(m => playerRef(m[1], m[2], m[3]));
  let team = eventTeam;

  if (event === 'PENL') return { players: penaltySlots(description, listed), eventTeam: team };

  if (event === 'FAC' && listed.length >= 2 && listed[0].team !== team) {
    [listed[0], listed[1]] = [listed[1], listed[0]];
  }

  if (event === 'BLOCK') {
    if (description.includes('TEAMMATE')) {
      team = description.slice(0, 3);
      listed.unshift(sentinelRef('TEAMMATE'));
    } else if (description.includes('BLOCKED BY OTHER')) {
      team = 'OTHER';
      listed.unshift(sentinelRef('REFEREE'));
    } else if (listed.length >= 2 && listed[0].team !== team) {
      [listed[0], listed[1]] = [listed[1], listed[0]];
    }
  }

  return {
    players: listed.slice(0, 3).map((ref, i) => ({ ...ref, role: roleFor(event, i) })),
    eventTeam: team,
  };
}

function penaltyName(description: string): string | null {
  const match = PATTERNS.penalty.exec(description);
  if (!match) return null;
  for (const rule of PENALTIES.keywordRules) {
    if (rule.contains.every(word => description.includes(word))) return rule.penalty;
  }
  const name = match[1].toUpperCase();
  return PENALTIES.renames[name] ?? name;
}

function shotTypeOf(description: string): string {
  if (description.includes('BETWEEN LEGS')) return 'BETWEEN LEGS';
  const match = PATTERNS.shotType.exec(description);
  return match && match[1] !== '' ? match[1].toUpperCase() : 'WRIST';
}

/**
 * Derives a full record from a row's text
 */
export function deriveHtmlEvent(row: HtmlEventRow, context: HtmlEventContext): HtmlEventRecord {
  const repairs: string[] = [];
  const { event, period } = row;
  const { session } = context.gameId;

  let description = row.description;
  const canned = NON_DESCRIPTS[event];
  if (canned !== undefined && description !== canned) {
    description = canned;
    repairs.push('non-descript');
  }
  const aliased = replaceTeamAliases(description);
  if (aliased !== description) {
    description = aliased;
    repairs.push('team-alias');
  }

  let timeText = row.timeText;
  if (event === 'PEND' && timeText === GARBLED_PERIOD_END) {
    const endOfPeriod = period === 4 && session === 'R' ? '5:000:00' : '20:000:00';
    timeText = context.lastGoalTimes.get(period) ?? endOfPeriod;
    repairs.push('period-end-clock');
  }

  const periodSeconds = elapsedSeconds(timeText);
  const { players, eventTeam } = eventPlayers(event, description, eventTeamOf(event, description));

  let zone = PATTERNS.zone.exec(description)?.[1].toUpperCase() ?? null;
  if (event === 'BLOCK' && zone === 'DEF') zone = 'OFF';

  const distance = PATTERNS.distance.exec(description);
  const isPenalty = event === 'PENL';
  const lengthMatch = isPenalty ? PATTERNS.penaltyLength.exec(description) : null;

  return {
    gameId: context.gameId.id,
    eventIdx: row.eventIdx,
    period,
    timeText,
    periodSeconds,
    gameSeconds: periodSeconds === null ? null : toGameSeconds(period, periodSeconds, session),
    event,
    strength: row.strength,
    description,
    eventTeam,
    player1: players[0] ?? null,
    player2: players[1] ?? null,
    player3: players[2] ?? null,
    zone,
    shotType: SHOT_EVENTS.has(event) ? shotTypeOf(description) : null,
    pbpDistance: distance ? Number(distance[1]) : SHOT_EVENTS.has(event) && event !== 'BLOCK' ? 0 : null,
    penalty: isPenalty ? penaltyName(description) : null,
    penaltyLength: lengthMatch ? Number(lengthMatch[1]) : null,
    repairs,
  };
}

/**
 * Row view of a record, for re-deriving after its text was corrected
 */
export function rowOf(record: HtmlEventRecord): HtmlEventRow {
  return {
    eventIdx: record.eventIdx,
    period: record.period,
    strength: record.strength,
    timeText: record.timeText,
    event: record.event,
    description: record.description,
  };
}

export function normalizeHtmlEvents(raw: RawSource, gameId: GameId): HtmlEventRecord[] {
  const rows = extractHtmlEventRows(raw);
  const context = buildHtmlEventContext(gameId, rows);
  return rows.map(row => deriveHtmlEvent(row, context)).sort((a, b) => a.eventIdx - b.eventIdx);
}
