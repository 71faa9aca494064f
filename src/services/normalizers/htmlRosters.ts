/**
 * HTML Roster Normalizer
 *
 * Parses the legacy roster report (RO######.HTM): the two dressed lineups,
 * then the two scratch lists when the report has them. Starters are the
 * rows printed in bold.
 */

import type { HtmlRosterRecord, RawSource, RosterStatus, Venue } from '../../models/records.js';
import type { GameId } from '../../util/gameId.js';
import { cleanText, normalizePlayerName, playerKey, teamCodeFromName } from '../../util/names.js';
import { loadHtml, parseDefect } from './common.js';

/** Table order on the report */
const VENUES: readonly Venue[] = ['AWAY', 'HOME'];

const HEADER_NAMES: ReadonlySet<string> = new Set(['NAME', 'NOM/NAME']);

interface RosterTeam {
  team: string;
  teamName: string;
  venue: Venue;
}

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i + size <= items.length; i += size) out.push(items.slice(i, i + size));
  return out;
}

/** Player name as printed, without captaincy marks */
function printedName(text: string): string {
  return cleanText(text.replace(/\(\s?(.*)\)/, ''));
}

/** Cell texts of one roster table, with the bold (starter) cells apart */
interface RosterTable {
  cells: string[];
  boldCells: string[];
}

function tableRecords(table: RosterTable, team: RosterTeam, status: RosterStatus, gameId: GameId): HtmlRosterRecord[] {
  const rows = chunk(table.cells, 3);
  if (rows.length === 0 || !rows[0].some(cell => HEADER_NAMES.has(cleanText(cell)))) return [];

  const starters = new Set(chunk(table.boldCells, 3).map(row => printedName(row[2])));

  return rows.slice(1).map(([jerseyText, positionText, nameText]) => {
    const jersey = Number(cleanText(jerseyText));
    const position = cleanText(positionText) || null;
    const playerName = normalizePlayerName(printedName(nameText));
    return {
      gameId: gameId.id,
      team: team.team,
      teamName: team.teamName,
      teamVenue: team.venue,
      playerName,
      playerKey: playerKey(playerName, { position, season: gameId.season }),
      jersey,
      teamJersey: `${team.team}${jersey}`,
      position,
      starter: status === 'ACTIVE' && starters.has(printedName(nameText)),
      status,
    };
  });
}

export function normalizeHtmlRosters(raw: RawSource, gameId: GameId): HtmlRosterRecord[] {
  const $ = loadHtml(raw, raw.documents[0]);

  const headings = $('td')
    .filter((_, el) => ($(el).attr('class') ?? '').trim() === 'teamHeading + border')
    .toArray()
    .map(el => $(el).text());
  if (headings.length < 2) {
    throw parseDefect(raw, `found ${headings.length} team headings`);
  }

  const teams = VENUES.map((venue, i): RosterTeam => {
    const teamName = cleanText(headings[i]);
    const team = teamCodeFromName(teamName);
    if (team === undefined) throw parseDefect(raw, `unknown team name "${teamName}"`);
    return { team, teamName, venue };
  });

  const tables: RosterTable[] = $('table')
    .filter((_, el) => $(el).attr('xmlns:ext') !== undefined)
    .toArray()
    .map(el => ({
      cells: $(el).find('td').toArray().map(td => $(td).text()),
      boldCells: $(el).find('td.bold').toArray().map(td => $(td).text()),
    }));
  if (tables.length < 2) {
    throw parseDefect(raw, `found ${tables.length} roster tables`);
  }

  const records: HtmlRosterRecord[] = [];
  teams.forEach((team, i) => {
    records.push(...tableRecords(tables[i], team, 'ACTIVE', gameId));
  });
  teams.forEach((team, i) => {
    const scratches = tables[i + 2];
    if (scratches) records.push(...tableRecords(scratches, team, 'SCRATCH', gameId));
  });

  for (const record of records) {
    if (!Number.isInteger(record.jersey)) {
      throw parseDefect(raw, `player ${record.playerName} has no sweater number`);
    }
  }
  return records;
}
