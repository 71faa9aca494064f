import { describe, it, expect } from 'vitest';
import { Scraper, runCollection } from '../../src/services/scraper.js';
import type { ScraperOptions } from '../../src/services/scraper.js';
import { MemoryArtifactStore } from '../../src/cache/artifactStore.js';
import { CorrectionTable } from '../../src/services/corrections.js';
import { SourceFetcher } from '../../src/services/fetcher.js';
import { ValidationError } from '../../src/errors/index.js';
import { FakeHttp, recordingSleep } from '../fixtures/fakes.js';
import { BASES, GAME_ID, PRESEASON_ID, REMATCH_ID, URLS, gameRoutes, preseasonRoutes, rematchRoutes } from '../fixtures/game.js';

function setup(http = new FakeHttp(new Map([...gameRoutes(), ...preseasonRoutes(), ...rematchRoutes()]))) {
  const fetcher = new SourceFetcher({
    http: http.get,
    bases: BASES,
    maxRetries: 3,
    baseDelayMs: 10,
    maxDelayMs: 100,
    sleep: recordingSleep().sleep,
  });
  const options: ScraperOptions = {
    store: new MemoryArtifactStore(),
    fetcher,
    corrections: CorrectionTable.empty(),
    model: () => 0.25,
    match: { matchWindowSeconds: 0, minPlayerOverlap: 1 },
    gameConcurrency: 2,
  };
  return { http, fetcher, options };
}

describe('Scraper', () => {
  it('should run every game and concatenate the events in id order', async () => {
    const { options } = setup();
    const scraper = new Scraper([GAME_ID, PRESEASON_ID], options);
    const results = await scraper.run();

    expect(results.map(r => [r.gameId, r.status])).toEqual([
      [GAME_ID, 'ok'],
      [PRESEASON_ID, 'ok'],
    ]);
    expect(scraper.playByPlay().map(e => e.gameId)).toEqual([...Array<string>(7).fill(GAME_ID), ...Array<string>(3).fill(PRESEASON_ID)]);
  });

  it('should not repeat requests for games already done', async () => {
    const { fetcher, options } = setup();
    const scraper = new Scraper([GAME_ID], options);
    await scraper.run();
    const requests = fetcher.requests;
    await scraper.run();
    expect(fetcher.requests).toBe(requests);
  });

  it('should share a run in flight', async () => {
    const { options } = setup();
    const scraper = new Scraper([GAME_ID], options);
    const [first, second] = await Promise.all([scraper.run(), scraper.run()]);
    expect(second[0]).toBe(first[0]);
  });

  describe('addGames', () => {
    it('should run only the games not seen before', async () => {
      const { http, options } = setup();
      const scraper = new Scraper([GAME_ID], options);
      await scraper.run();

      const added = await scraper.addGames([GAME_ID, Number(PRESEASON_ID)]);
      expect(added.map(r => r.gameId)).toEqual([PRESEASON_ID]);
      expect(scraper.gameIds).toEqual([GAME_ID, PRESEASON_ID]);
      expect(http.callsTo(URLS.playByPlay(GAME_ID))).toBe(1);
    });

    it('should match a collection that ran every game at once', async () => {
      const incremental = new Scraper([GAME_ID, PRESEASON_ID], setup().options);
      await incremental.run();
      await incremental.addGames([REMATCH_ID]);

      const { events } = await runCollection([GAME_ID, PRESEASON_ID, REMATCH_ID], setup().options);
      const whole = new Scraper([GAME_ID, PRESEASON_ID, REMATCH_ID], setup().options);
      await whole.run();

      expect(incremental.gameIds).toEqual([GAME_ID, PRESEASON_ID, REMATCH_ID]);
      expect(JSON.stringify(incremental.playByPlay())).toBe(JSON.stringify(events));
      expect(JSON.stringify(incremental.stats())).toBe(JSON.stringify(whole.stats()));
      expect(JSON.stringify(incremental.stats({ level: 'game' }))).toBe(JSON.stringify(whole.stats({ level: 'game' })));
    });

    it('should add nothing when an id is malformed', async () => {
      const { options } = setup();
      const scraper = new Scraper([GAME_ID], options);
      await expect(scraper.addGames([PRESEASON_ID, 'not-a-game'])).rejects.toThrow(ValidationError);
      expect(scraper.gameIds).toEqual([GAME_ID]);
    });
  });

  describe('stats', () => {
    it('should reuse the aggregate until the collection changes', async () => {
      const { options } = setup();
      const scraper = new Scraper([GAME_ID], options);
      await scraper.run();

      const first = scraper.stats();
      expect(scraper.stats({ level: 'season' })).toBe(first);
      expect(scraper.stats({ level: 'game' })).not.toBe(first);

      await scraper.addGames([PRESEASON_ID]);
      const updated = scraper.stats();
      expect(updated).not.toBe(first);
      expect(updated.find(s => s.playerId === 'CARL.WEST')?.shots).toBe(1);
    });

    it('should total lines and teams over the collection', async () => {
      const { options } = setup();
      const scraper = new Scraper([GAME_ID], options);
      await scraper.run();

      const teams = scraper.teamStats();
      expect(scraper.teamStats()).toBe(teams);
      expect(teams.map(t => [t.team, t.goalsFor, t.goalsAgainst])).toEqual([
        ['CGY', 0, 1],
        ['EDM', 1, 0],
      ]);
      expect(teams[1].toi).toBeCloseTo(20);
      const lines = scraper.lineStats().filter(l => l.team === 'EDM');
      expect(lines.map(l => l.players)).toEqual([['ADAM.NORTH', 'BEN.EAST', 'CARL.WEST']]);
      expect(lines[0].toi).toBeCloseTo(20);
    });

    it('should credit goals from the collected games', async () => {
      const { options } = setup();
      const scraper = new Scraper([GAME_ID], options);
      await scraper.run();
      const north = scraper.stats().find(s => s.playerId === 'ADAM.NORTH');
      expect([north?.goals, north?.shots, north?.predGoals, north?.onIceGoalsFor]).toEqual([1, 1, 0.25, 1]);
    });
  });

  it('should report cancelled games and run them on the next call', async () => {
    const { options } = setup();
    const scraper = new Scraper([GAME_ID], options);
    const controller = new AbortController();
    controller.abort();

    expect(await scraper.run({ signal: controller.signal })).toEqual([{ status: 'cancelled', gameId: GAME_ID }]);
    expect(scraper.result(GAME_ID)).toBeUndefined();
    expect((await scraper.run())[0].status).toBe('ok');
  });

  it('should keep going when one game fails and retry it on the next run', async () => {
    const url = URLS.playByPlay(GAME_ID);
    const http = new FakeHttp(new Map([...gameRoutes(), ...preseasonRoutes()])).script(
      url,
      { status: 503 },
      { status: 503 },
      { status: 503 },
      { status: 503 }
    );
    const { options } = setup(http);
    const scraper = new Scraper([GAME_ID, PRESEASON_ID], options);

    expect((await scraper.run()).map(r => r.status)).toEqual(['failed', 'ok']);
    expect(scraper.result(GAME_ID)?.status).toBe('failed');
    expect((await scraper.run()).map(r => r.status)).toEqual(['ok', 'ok']);
  });

  describe('cached artifacts', () => {
    it('should expose each stage of a finished game', async () => {
      const { options } = setup();
      const scraper = new Scraper([GAME_ID], options);
      await scraper.run();

      expect((await scraper.rawSource(GAME_ID, 'html_events'))?.documents).toHaveLength(1);
      expect((await scraper.gameInfo(GAME_ID))?.home.abbrev).toBe('EDM');
      expect(await scraper.rosters(GAME_ID)).toHaveLength(13);
      expect(await scraper.changes(GAME_ID)).toHaveLength(24);
      expect(await scraper.canonicalEvents(GAME_ID)).toHaveLength(7);
      expect(await scraper.rawSource(PRESEASON_ID, 'html_events')).toBeUndefined();
    });

    it('should drop the result and cached artifacts on invalidation', async () => {
      const { fetcher, options } = setup();
      const scraper = new Scraper([GAME_ID], options);
      await scraper.run();
      const requests = fetcher.requests;

      await scraper.invalidate(GAME_ID, ['raw:html_events', 'htmlEvents', 'canonicalEvents', 'enrichedEvents', 'diagnostics']);
      expect(scraper.result(GAME_ID)).toBeUndefined();
      expect(scraper.playByPlay()).toEqual([]);

      await scraper.run();
      expect(fetcher.requests).toBe(requests + 1);
      expect(scraper.playByPlay()).toHaveLength(7);
    });
  });
});

describe('runCollection', () => {
  it('should run the games once and return their events', async () => {
    const { options } = setup();
    const { results, events } = await runCollection([PRESEASON_ID], options);
    expect(results.map(r => r.status)).toEqual(['ok']);
    expect(events.map(e => e.event)).toEqual(['PSTR', 'SHOT', 'PEND']);
  });
});
