/**
 * Roster Reconciler
 *
 * Joins the API and HTML rosters on team-jersey key into one entry per
 * (team, sweater number), and indexes the result for identity lookups.
 *
 * Precedence:
 * - API wins position and dressed status (an API roster spot means the player dressed)
 * - HTML supplies the starter flag and the name used for identity
 */

import { apiRosterRecordSchema, htmlRosterRecordSchema, rosterEntrySchema } from '../models/records.js';
import type {
  ApiRosterRecord,
  Diagnostic,
  HtmlPlayerRef,
  HtmlRosterRecord,
  RosterEntry,
  Venue,
} from '../models/records.js';
import type { GameId } from '../util/gameId.js';
import { editDistance } from '../util/names.js';
import type { CorrectionTable } from './corrections.js';
import { raiseDiagnostic } from './diagnostics.js';

/** Largest edit distance accepted by the last-name fallback */
const MAX_NAME_DISTANCE = 2;

export interface RosterReconciliation {
  entries: RosterEntry[];
  diagnostics: Diagnostic[];
}

function lastNameOf(playerName: string): string {
  const space = playerName.indexOf(' ');
  return space === -1 ? playerName : playerName.slice(space + 1);
}

/**
 * Keeps one record per team-jersey key: ACTIVE beats SCRATCH, otherwise the first wins
 */
function dedupe<T extends { teamJersey: string; playerName: string; status?: string }>(
  records: readonly T[],
  gameId: string,
  source: 'api_rosters' | 'html_rosters',
  diagnostics: Diagnostic[]
): Map<string, T> {
  const kept = new Map<string, T>();
  for (const record of records) {
    const existing = kept.get(record.teamJersey);
    if (!existing) {
      kept.set(record.teamJersey, record);
      continue;
    }
    const replace = existing.status === 'SCRATCH' && record.status === 'ACTIVE';
    if (replace) kept.set(record.teamJersey, record);
    diagnostics.push(
      raiseDiagnostic(
        'RosterCollision',
        gameId,
        `two players listed as ${record.teamJersey}`,
        {
          teamJersey: record.teamJersey,
          kept: replace ? record.playerName : existing.playerName,
          dropped: replace ? existing.playerName : record.playerName,
        },
        source
      )
    );
  }
  return kept;
}

function joinEntry(gameId: string, api: ApiRosterRecord | undefined, html: HtmlRosterRecord | undefined): RosterEntry {
  if (api && html) {
    return {
      gameId,
      playerId: html.playerKey,
      apiId: api.apiId,
      playerName: html.playerName,
      team: html.team,
      teamVenue: html.teamVenue,
      jersey: html.jersey,
      teamJersey: html.teamJersey,
      position: api.position,
      status: 'ACTIVE',
      starter: html.starter,
      headshotUrl: api.headshotUrl,
      sources: ['api', 'html'],
    };
  }
  if (api) {
    return {
      gameId,
      playerId: api.playerKey,
      apiId: api.apiId,
      playerName: api.playerName,
      team: api.team,
      teamVenue: api.teamVenue,
      jersey: api.jersey,
      teamJersey: api.teamJersey,
      position: api.position,
      status: 'ACTIVE',
      starter: false,
      headshotUrl: api.headshotUrl,
      sources: ['api'],
    };
  }
  if (html) {
    return {
      gameId,
      playerId: html.playerKey,
      apiId: null,
      playerName: html.playerName,
      team: html.team,
      teamVenue: html.teamVenue,
      jersey: html.jersey,
      teamJersey: html.teamJersey,
      position: html.position,
      status: html.status,
      starter: html.starter,
      headshotUrl: null,
      sources: ['html'],
    };
  }
  throw new Error('joinEntry needs at least one record');
}

/**
 * Merges both roster sources for one game
 *
 * @param api - API roster records, or null when the source is unavailable
 * @param html - HTML roster records, or null when the source is unavailable
 */
export function reconcileRosters(
  gameId: GameId,
  api: readonly ApiRosterRecord[] | null,
  html: readonly HtmlRosterRecord[] | null,
  corrections: CorrectionTable
): RosterReconciliation {
  const diagnostics: Diagnostic[] = [];
  const apiRecords = corrections.apply(gameId.id, 'api_rosters', api ?? [], apiRosterRecordSchema).map(r => r.record);
  const htmlRecords = corrections.apply(gameId.id, 'html_rosters', html ?? [], htmlRosterRecordSchema).map(r => r.record);

  const apiByKey = dedupe(apiRecords, gameId.id, 'api_rosters', diagnostics);
  const htmlByKey = dedupe(htmlRecords, gameId.id, 'html_rosters', diagnostics);

  const keys = [...new Set([...htmlByKey.keys(), ...apiByKey.keys()])];
  const joined = keys.map(key => joinEntry(gameId.id, apiByKey.get(key), htmlByKey.get(key)));

  const entries = corrections
    .apply(gameId.id, 'rosters', joined, rosterEntrySchema)
    .map(r => r.record)
    .sort((a, b) => a.teamVenue.localeCompare(b.teamVenue) || a.jersey - b.jersey);

  return { entries, diagnostics };
}

/**
 * Identity lookups over a reconciled roster
 */
export class RosterIndex {
  private readonly byApi = new Map<number, RosterEntry>();
  private readonly byKey = new Map<string, RosterEntry>();
  private readonly byId = new Map<string, RosterEntry>();

  constructor(private readonly list: readonly RosterEntry[]) {
    for (const entry of list) {
      if (entry.apiId !== null) this.byApi.set(entry.apiId, entry);
      this.byKey.set(entry.teamJersey, entry);
      this.byId.set(entry.playerId, entry);
    }
  }

  get entries(): readonly RosterEntry[] {
    return this.list;
  }

  get size(): number {
    return this.list.length;
  }

  byApiId(apiId: number): RosterEntry | undefined {
    return this.byApi.get(apiId);
  }

  byTeamJersey(teamJersey: string): RosterEntry | undefined {
    return this.byKey.get(teamJersey);
  }

  byPlayerId(playerId: string): RosterEntry | undefined {
    return this.byId.get(playerId);
  }

  teamOf(venue: Venue): string | undefined {
    return this.list.find(entry => entry.teamVenue === venue)?.team;
  }

  /**
   * Starting goalie of a team, falling back to its first dressed goalie
   */
  startingGoalie(venue: Venue): RosterEntry | undefined {
    const goalies = this.list.filter(e => e.teamVenue === venue && e.position === 'G' && e.status === 'ACTIVE');
    return goalies.find(g => g.starter) ?? goalies[0];
  }

  /**
   * Finds a player of a team by last name: exact, then prefix, then
   * edit distance. Only a single candidate at the first level that has
   * any is accepted.
   */
  byLastName(team: string, lastName: string): RosterEntry | undefined {
    const candidates = this.list.filter(entry => entry.team === team);
    const levels: ((last: string) => boolean)[] = [
      last => last === lastName,
      last => last.startsWith(lastName) || lastName.startsWith(last),
      last => editDistance(last, lastName) <= MAX_NAME_DISTANCE,
    ];
    for (const level of levels) {
      const hits = candidates.filter(entry => level(lastNameOf(entry.playerName)));
      if (hits.length === 1) return hits[0];
      if (hits.length > 1) return undefined;
    }
    return undefined;
  }

  /**
   * Resolves an HTML player reference by team-jersey key, then by last name
   */
  resolveRef(ref: HtmlPlayerRef): RosterEntry | undefined {
    if (ref.sentinel !== null || ref.team === null) return undefined;
    if (ref.jersey !== null) {
      const hit = this.byKey.get(`${ref.team}${ref.jersey}`);
      if (hit) return hit;
    }
    return ref.lastName ? this.byLastName(ref.team, ref.lastName) : undefined;
  }
}
