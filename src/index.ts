/**
 * Hockey Play-by-Play Engine
 * 
 * Library surface: run games, collections and incremental collections,
 * read intermediate artifacts, and plug in a cache store or a shot model.
 */

export { runGame } from './services/gamePipeline.js';
export type { PipelineDeps } from './services/gamePipeline.js';
export { Scraper, runCollection } from './services/scraper.js';
export type { CollectionResult, RunOptions, ScraperOptions } from './services/scraper.js';
export { aggregateLineStats, aggregatePlayerStats, aggregateTeamStats } from './services/aggregation.js';
export type {
  LineGroupingInput,
  PlayerStats,
  StatsGrouping,
  StatsGroupingInput,
  UnitStats,
} from './services/aggregation.js';
export { SourceFetcher } from './services/fetcher.js';
export type { FetchOutcome, FetcherOptions } from './services/fetcher.js';
export { CorrectionTable } from './services/corrections.js';
export { MERGE_POLICY } from './services/eventReconciler.js';
export type { MatchOptions } from './services/eventReconciler.js';
export { OnIceTimeline } from './services/changeReconciler.js';
export { RosterIndex } from './services/rosterReconciler.js';
export { scoreEvents, shotFeatures } from './services/scoring.js';
export type { ScoringFunction, ShotFeatures } from './services/scoring.js';
export { MemoryArtifactStore, RedisArtifactStore } from './cache/artifactStore.js';
export type { ArtifactStore, HashClient } from './cache/artifactStore.js';
export { GameCache, SLOTS } from './cache/gameCache.js';
export { parseGameId, isValidGameId } from './util/gameId.js';
export type { GameId, Session } from './util/gameId.js';
export * from './errors/index.js';
export * from './models/records.js';
