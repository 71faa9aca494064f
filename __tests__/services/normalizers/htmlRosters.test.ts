import { describe, it, expect } from 'vitest';
import { normalizeHtmlRosters } from '../../../src/services/normalizers/htmlRosters.js';
import { ParseDefectError } from '../../../src/errors/index.js';
import { parseGameId } from '../../../src/util/gameId.js';
import { DOCUMENTS, GAME_ID, PLAYERS, rawSource } from '../../fixtures/game.js';
import { rosterReport } from '../../fixtures/reports.js';

const game = parseGameId(GAME_ID);

describe('normalizeHtmlRosters', () => {
  const records = normalizeHtmlRosters(rawSource('html_rosters', GAME_ID, { text: DOCUMENTS.ro }), game);

  it('should read away then home lineups, then scratches', () => {
    expect(records.map(r => r.teamJersey)).toEqual([
      'CGY20', 'CGY21', 'CGY22', 'CGY5', 'CGY6', 'CGY40',
      'EDM10', 'EDM11', 'EDM12', 'EDM2', 'EDM3', 'EDM30',
      'EDM31',
    ]);
  });

  it('should build the full record for a dressed player', () => {
    expect(records[0]).toEqual({
      gameId: GAME_ID,
      team: 'CGY',
      teamName: 'CALGARY FLAMES',
      teamVenue: 'AWAY',
      playerName: 'HENRY LAKE',
      playerKey: 'HENRY.LAKE',
      jersey: 20,
      teamJersey: 'CGY20',
      position: 'C',
      starter: true,
      status: 'ACTIVE',
    });
  });

  it('should drop the captaincy mark from the name', () => {
    const north = records.find(r => r.teamJersey === 'EDM10');
    expect(north?.playerName).toBe('ADAM NORTH');
    expect(north?.starter).toBe(true);
  });

  it('should mark scratches and never count them as starters', () => {
    const hill = records.find(r => r.teamJersey === 'EDM31');
    expect(hill?.status).toBe('SCRATCH');
    expect(hill?.starter).toBe(false);
    expect(hill?.playerKey).toBe('GARY.HILL');
  });

  it('should read a report without scratch tables', () => {
    const text = rosterReport('CALGARY FLAMES', 'EDMONTON OILERS', PLAYERS.filter(p => !p.scratch)).replace(
      /<table xmlns:ext="urn:schemas-ext">\n<tr><td class="heading">#<\/td><td class="heading">Pos<\/td><td class="heading">Name<\/td><\/tr>\n<\/table>\n/g,
      ''
    );
    const records = normalizeHtmlRosters(rawSource('html_rosters', GAME_ID, { text }), game);
    expect(records).toHaveLength(12);
    expect(records.every(r => r.status === 'ACTIVE')).toBe(true);
  });

  it('should throw ParseDefectError for an unknown team', () => {
    const text = rosterReport('NOWHERE KNIGHTS', 'EDMONTON OILERS', PLAYERS);
    expect(() => normalizeHtmlRosters(rawSource('html_rosters', GAME_ID, { text }), game)).toThrow(ParseDefectError);
  });
});
