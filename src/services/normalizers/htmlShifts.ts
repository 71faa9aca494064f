/**
 * HTML Shift Normalizer
 *
 * Parses the two time-on-ice reports (TH######.HTM home, TV######.HTM away).
 * Each player block starts with a "NN LAST, FIRST" heading cell followed by
 * five cells per shift: number, period, start, end, duration. Start and end
 * cells print "elapsed / remaining"; only the elapsed half is used.
 */

import type { RawSource, ShiftRecord, Venue } from '../../models/records.js';
import type { GameId } from '../../util/gameId.js';
import { cleanText, normalizePlayerName, teamCodeFromName } from '../../util/names.js';
import { clockToSeconds, periodLength } from '../../util/time.js';
import { documentFor, loadHtml, parseDefect } from './common.js';

const CELLS_PER_SHIFT = 5;

/** Start time printed on shifts that never happened */
const BOGUS_START = '31:23';

const HEADING_CLASS = 'teamHeading + border';
const PLAYER_CLASSES: ReadonlySet<string> = new Set(['playerHeading + border', 'lborder + bborder']);

interface PlayerBlock {
  playerName: string;
  jersey: number;
  cells: string[];
}

/** Shift as printed, before end times are repaired */
interface PrintedShift extends Omit<ShiftRecord, 'endSeconds' | 'durationSeconds'> {
  endSeconds: number | null;
  durationSeconds: number | null;
}

function elapsedHalf(text: string): string {
  return cleanText(text).split('/')[0].trim();
}

function playerBlocks(raw: RawSource, cells: readonly string[]): PlayerBlock[] {
  const blocks: PlayerBlock[] = [];
  let current: PlayerBlock | null = null;

  for (const text of cells) {
    if (text.includes(', ')) {
      const [numberAndLast, firstText] = text.split(/,(.*)/s);
      const [jerseyText, ...lastParts] = cleanText(numberAndLast).split(' ');
      const first = cleanText(firstText.replace(/\(\s?(.+)\)/, ''));
      const last = lastParts.join(' ');
      if (first === '' && last === '') {
        current = null;
        continue;
      }
      const jersey = Number(jerseyText);
      if (!Number.isInteger(jersey)) {
        throw parseDefect(raw, `player heading "${cleanText(text)}" has no sweater number`);
      }
      current = { playerName: normalizePlayerName(`${first} ${last}`), jersey, cells: [] };
      blocks.push(current);
    } else if (current !== null) {
      current.cells.push(text);
    }
  }
  return blocks;
}

function documentShifts(raw: RawSource, gameId: GameId, venue: Venue): PrintedShift[] {
  const doc = documentFor(raw, venue);
  if (!doc) throw parseDefect(raw, `missing ${venue.toLowerCase()} report`);
  const $ = loadHtml(raw, doc);

  const heading = $('td')
    .filter((_, el) => ($(el).attr('class') ?? '').trim() === HEADING_CLASS)
    .first();
  if (heading.length === 0) throw parseDefect(raw, `no team heading in ${doc.url}`);
  const teamName = cleanText(heading.text());
  const team = teamCodeFromName(teamName);
  if (team === undefined) throw parseDefect(raw, `unknown team name "${teamName}"`);

  const cells = $('td')
    .filter((_, el) => PLAYER_CLASSES.has(($(el).attr('class') ?? '').trim()))
    .toArray()
    .map(el => $(el).text());

  const shifts: PrintedShift[] = [];
  for (const block of playerBlocks(raw, cells)) {
    for (let i = 0; i + CELLS_PER_SHIFT <= block.cells.length; i += CELLS_PER_SHIFT) {
      const [countText, periodText, startText, endText, durationText] = block.cells.slice(i, i + CELLS_PER_SHIFT);
      const start = elapsedHalf(startText);
      if (start === BOGUS_START) continue;

      const period = Number(cleanText(periodText).replace('OT', '4').replace('SO', '5'));
      const startSeconds = clockToSeconds(start);
      if (!Number.isInteger(period) || startSeconds === null) {
        throw parseDefect(raw, `unreadable shift for ${team}${block.jersey}: period "${periodText}", start "${start}"`);
      }

      shifts.push({
        gameId: gameId.id,
        team,
        teamName,
        teamVenue: venue,
        playerName: block.playerName,
        jersey: block.jersey,
        teamJersey: `${team}${block.jersey}`,
        period,
        shiftCount: Number(cleanText(countText)),
        startSeconds,
        endSeconds: clockToSeconds(elapsedHalf(endText)),
        durationSeconds: clockToSeconds(cleanText(durationText)),
        repairs: [],
      });
    }
  }
  return shifts;
}

/**
 * Fills blank end times and closes shifts whose end precedes their start
 */
function repairEnds(raw: RawSource, gameId: GameId, printed: readonly PrintedShift[]): ShiftRecord[] {
  const withEnds = printed.map((shift): PrintedShift => {
    if (shift.endSeconds !== null) return shift;
    if (shift.durationSeconds === null) {
      throw parseDefect(raw, `shift ${shift.shiftCount} of ${shift.teamJersey} has neither end nor duration`);
    }
    return { ...shift, endSeconds: shift.startSeconds + shift.durationSeconds, repairs: [...shift.repairs, 'blank-end'] };
  });

  const lastPeriod = Math.max(0, ...withEnds.map(s => s.period));
  const lastRecordedSecond = Math.max(
    0,
    ...withEnds.filter(s => s.period === lastPeriod).map(s => s.endSeconds ?? 0)
  );

  return withEnds.map((shift): ShiftRecord => {
    let endSeconds = shift.endSeconds ?? shift.startSeconds;
    const repairs = [...shift.repairs];
    if (shift.startSeconds > endSeconds) {
      endSeconds = shift.period < 4 ? periodLength(shift.period, gameId.session) : lastRecordedSecond;
      repairs.push('end-before-start');
    }
    return {
      ...shift,
      endSeconds,
      durationSeconds: Math.max(0, endSeconds - shift.startSeconds),
      repairs,
    };
  });
}

export function normalizeHtmlShifts(raw: RawSource, gameId: GameId): ShiftRecord[] {
  const printed = [...documentShifts(raw, gameId, 'HOME'), ...documentShifts(raw, gameId, 'AWAY')];
  return repairEnds(raw, gameId, printed);
}
