import { describe, it, expect } from 'vitest';
import { normalizeGameInfo } from '../../../src/services/normalizers/gameInfo.js';
import { ParseDefectError } from '../../../src/errors/index.js';
import { parseGameId } from '../../../src/util/gameId.js';
import { CGY, EDM, landingJson } from '../../fixtures/api.js';
import { DOCUMENTS, GAME_ID, rawSource } from '../../fixtures/game.js';

const game = parseGameId(GAME_ID);

describe('normalizeGameInfo', () => {
  it('should read teams, venue and start time', () => {
    expect(normalizeGameInfo(rawSource('api_game_info', GAME_ID, { text: DOCUMENTS.landing }), game)).toEqual({
      gameId: GAME_ID,
      season: 20232024,
      session: 'R',
      gameDate: '2023-10-11',
      startTimeUtc: '2023-10-12T01:00:00.000Z',
      venue: 'Rogers Place',
      gameState: 'OFF',
      home: { id: 22, abbrev: 'EDM', name: 'EDMONTON OILERS' },
      away: { id: 20, abbrev: 'CGY', name: 'CALGARY FLAMES' },
    });
  });

  it('should fall back to the printed date without a start time', () => {
    const text = landingJson(GAME_ID, { home: EDM, away: CGY }, { startTimeUTC: undefined, gameDate: '2023-10-10' });
    const info = normalizeGameInfo(rawSource('api_game_info', GAME_ID, { text }), game);
    expect(info.gameDate).toBe('2023-10-10');
    expect(info.startTimeUtc).toBeNull();
  });

  it('should reject a document for another game', () => {
    const text = landingJson(GAME_ID, { home: EDM, away: CGY }, { id: 2023020002 });
    expect(() => normalizeGameInfo(rawSource('api_game_info', GAME_ID, { text }), game)).toThrow(ParseDefectError);
  });
});
