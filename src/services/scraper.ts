/**
 * Scraper Service
 *
 * Collection controller over many games. Keeps the ordered list of game
 * ids, one cache entry and one result per id, and shares in-flight runs so
 * concurrent requests for the same game execute its pipeline once.
 */

import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { GameCache, SLOTS } from '../cache/gameCache.js';
import { MemoryArtifactStore } from '../cache/artifactStore.js';
import type { ArtifactStore } from '../cache/artifactStore.js';
import type {
  ApiEventRecord,
  ApiRosterRecord,
  CanonicalEvent,
  EnrichedEvent,
  GameInfo,
  GameResult,
  HtmlEventRecord,
  HtmlRosterRecord,
  RawSource,
  RosterEntry,
  ShiftChange,
  ShiftRecord,
  SourceKind,
} from '../models/records.js';
import { parseGameId } from '../util/gameId.js';
import {
  aggregateLineStats,
  aggregatePlayerStats,
  aggregateTeamStats,
  lineGroupingSchema,
  statsGroupingSchema,
} from './aggregation.js';
import type { LineGroupingInput, PlayerStats, StatsGroupingInput, UnitStats } from './aggregation.js';
import { CorrectionTable } from './corrections.js';
import type { MatchOptions } from './eventReconciler.js';
import { SourceFetcher } from './fetcher.js';
import { runGame } from './gamePipeline.js';
import type { PipelineDeps } from './gamePipeline.js';
import type { ScoringFunction } from './scoring.js';

export interface ScraperOptions {
  store?: ArtifactStore;
  fetcher?: SourceFetcher;
  corrections?: CorrectionTable;
  model?: ScoringFunction;
  match?: MatchOptions;
  /** Games in flight at once */
  gameConcurrency?: number;
}

export interface RunOptions {
  signal?: AbortSignal;
}

export interface CollectionResult {
  results: GameResult[];
  /** Enriched events of every successful game, in game-id order */
  events: EnrichedEvent[];
}

/**
 * Last aggregate of one kind, kept while its grouping and the set of
 * finished games stay the same
 */
class AggregateCache<T> {
  private last: { key: string; membership: number; value: T } | null = null;

  get(key: string, membership: number, compute: () => T): T {
    if (this.last && this.last.key === key && this.last.membership === membership) return this.last.value;
    const value = compute();
    this.last = { key, membership, value };
    return value;
  }
}

export class Scraper {
  private readonly ids: string[] = [];
  private readonly results = new Map<string, GameResult>();
  private readonly inFlight = new Map<string, Promise<GameResult>>();
  private readonly deps: Omit<PipelineDeps, 'signal'>;
  private readonly limit: LimitFunction;
  /** Bumped whenever a game's successful result lands */
  private membership = 0;
  private readonly playerStats = new AggregateCache<PlayerStats[]>();
  private readonly lineStatsCache = new AggregateCache<UnitStats[]>();
  private readonly teamStatsCache = new AggregateCache<UnitStats[]>();

  constructor(gameIds: readonly (string | number)[] = [], options: ScraperOptions = {}) {
    this.deps = {
      store: options.store ?? new MemoryArtifactStore(),
      fetcher: options.fetcher ?? new SourceFetcher(),
      corrections: options.corrections ?? CorrectionTable.load(),
      model: options.model,
      match: options.match,
    };
    this.limit = pLimit(options.gameConcurrency ?? cfg.pipeline.gameConcurrency);
    this.track(gameIds);
  }

  get gameIds(): readonly string[] {
    return this.ids;
  }

  /**
   * Appends unseen ids, returning the ones that were new
   *
   * @throws ValidationError if any id is malformed; nothing is added then
   */
  private track(gameIds: readonly (string | number)[]): string[] {
    const parsed = gameIds.map(id => parseGameId(id).id);
    const added: string[] = [];
    for (const id of parsed) {
      if (this.ids.includes(id) || added.includes(id)) continue;
      added.push(id);
    }
    this.ids.push(...added);
    return added;
  }

  /**
   * Runs one game, sharing a run already in flight for the same id
   */
  private runOne(id: string, signal: AbortSignal | undefined): Promise<GameResult> {
    const done = this.results.get(id);
    if (done?.status === 'ok') return Promise.resolve(done);

    const pending = this.inFlight.get(id);
    if (pending) return pending;

    const run = this.limit(async (): Promise<GameResult> => {
      if (signal?.aborted) return { status: 'cancelled', gameId: id };
      return runGame(id, { ...this.deps, signal });
    }).then(result => {
      if (result.status !== 'cancelled') this.results.set(id, result);
      if (result.status === 'ok') this.membership += 1;
      return result;
    }).finally(() => this.inFlight.delete(id));

    this.inFlight.set(id, run);
    return run;
  }

  /**
   * Runs every game without a successful result, in id order
   *
   * Aborting the signal stops new games from starting; those are
   * reported as cancelled and run again on the next call.
   */
  async run(options: RunOptions = {}): Promise<GameResult[]> {
    const results = await Promise.all(this.ids.map(id => this.runOne(id, options.signal)));
    const failed = results.filter(r => r.status === 'failed').length;
    const cancelled = results.filter(r => r.status === 'cancelled').length;
    logger.info({ games: results.length, failed, cancelled }, 'collection run complete');
    return results;
  }

  /**
   * Adds games to the collection and runs only the ones not seen before
   *
   * @returns Results of the newly added games
   */
  async addGames(gameIds: readonly (string | number)[], options: RunOptions = {}): Promise<GameResult[]> {
    const added = this.track(gameIds);
    logger.debug({ added: added.length, total: this.ids.length }, 'games added');
    return Promise.all(added.map(id => this.runOne(id, options.signal)));
  }

  result(gameId: string | number): GameResult | undefined {
    return this.results.get(parseGameId(gameId).id);
  }

  /**
   * Enriched events of every successful game, in id order
   */
  playByPlay(): EnrichedEvent[] {
    return this.ids.flatMap(id => {
      const result = this.results.get(id);
      return result?.status === 'ok' ? result.events : [];
    });
  }

  /**
   * Player stats over the collection
   *
   * The previous aggregate is returned as is when the grouping is the
   * same and no game has completed since it was computed.
   */
  stats(grouping: StatsGroupingInput = {}): PlayerStats[] {
    const key = JSON.stringify(statsGroupingSchema.parse(grouping));
    return this.playerStats.get(key, this.membership, () => aggregatePlayerStats(this.playByPlay(), grouping));
  }

  /**
   * Forward line or defense pair stats over the collection, cached like stats()
   */
  lineStats(grouping: LineGroupingInput = {}): UnitStats[] {
    const key = JSON.stringify(lineGroupingSchema.parse(grouping));
    return this.lineStatsCache.get(key, this.membership, () => aggregateLineStats(this.playByPlay(), grouping));
  }

  /**
   * Team stats over the collection, cached like stats()
   */
  teamStats(grouping: StatsGroupingInput = {}): UnitStats[] {
    const key = JSON.stringify(statsGroupingSchema.parse(grouping));
    return this.teamStatsCache.get(key, this.membership, () => aggregateTeamStats(this.playByPlay(), grouping));
  }

  private cache(gameId: string | number): GameCache {
    return new GameCache(this.deps.store, parseGameId(gameId).id);
  }

  // Read-only projections of the cache

  rawSource(gameId: string | number, kind: SourceKind): Promise<RawSource | undefined> {
    return this.cache(gameId).value(SLOTS.raw(kind));
  }

  gameInfo(gameId: string | number): Promise<GameInfo | undefined> {
    return this.cache(gameId).value(SLOTS.gameInfo);
  }

  apiEvents(gameId: string | number): Promise<ApiEventRecord[] | undefined> {
    return this.cache(gameId).value(SLOTS.apiEvents);
  }

  apiRosters(gameId: string | number): Promise<ApiRosterRecord[] | undefined> {
    return this.cache(gameId).value(SLOTS.apiRosters);
  }

  htmlEvents(gameId: string | number): Promise<HtmlEventRecord[] | undefined> {
    return this.cache(gameId).value(SLOTS.htmlEvents);
  }

  htmlRosters(gameId: string | number): Promise<HtmlRosterRecord[] | undefined> {
    return this.cache(gameId).value(SLOTS.htmlRosters);
  }

  shifts(gameId: string | number): Promise<ShiftRecord[] | undefined> {
    return this.cache(gameId).value(SLOTS.shifts);
  }

  rosters(gameId: string | number): Promise<RosterEntry[] | undefined> {
    return this.cache(gameId).value(SLOTS.rosters);
  }

  changes(gameId: string | number): Promise<ShiftChange[] | undefined> {
    return this.cache(gameId).value(SLOTS.changes);
  }

  canonicalEvents(gameId: string | number): Promise<CanonicalEvent[] | undefined> {
    return this.cache(gameId).value(SLOTS.canonicalEvents);
  }

  /**
   * Explicit re-scrape: drops the given cached artifact kinds (every kind
   * when none are given) and the stored result of the game
   */
  async invalidate(gameId: string | number, kinds?: readonly string[]): Promise<void> {
    const id = parseGameId(gameId).id;
    await this.cache(id).invalidate(kinds);
    if (this.results.get(id)?.status === 'ok') this.membership += 1;
    this.results.delete(id);
  }
}

/**
 * Runs a collection of games once and concatenates their events
 */
export async function runCollection(
  gameIds: readonly (string | number)[],
  options: ScraperOptions & RunOptions = {}
): Promise<CollectionResult> {
  const scraper = new Scraper(gameIds, options);
  const results = await scraper.run({ signal: options.signal });
  return { results, events: scraper.playByPlay() };
}
