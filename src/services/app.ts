/**
 * Application Service
 * 
 * Process-level orchestration for the command-line entry point.
 * Handles service readiness, the collection run, result publishing
 * and graceful shutdown.
 */

import type { Redis } from 'ioredis';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { publishGameResult, startProducer, stopProducer } from '../bus/kafkaProducer.js';
import { MemoryArtifactStore, RedisArtifactStore } from '../cache/artifactStore.js';
import type { ArtifactStore } from '../cache/artifactStore.js';
import { createRedis } from '../cache/redisClient.js';
import type { GameResult } from '../models/records.js';
import { waitForServices } from '../util/waitForServices.js';
import { parseGameIdList, ValidationError } from '../util/validation.js';
import { Scraper } from './scraper.js';

/**
 * Sets up graceful shutdown handlers
 * 
 * @param controller - AbortController that stops new games from starting
 */
function setupShutdownHandlers(controller: AbortController): void {
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, finishing games in flight`);
    controller.abort();
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

/**
 * Game ids from the command line, falling back to GAME_IDS
 * 
 * @throws ValidationError if there are none or one does not parse
 */
export function resolveGameIds(argv: readonly string[], configured: readonly string[] = cfg.gameIds): string[] {
  const text = argv.length > 0 ? argv.join(' ') : configured.join(',');
  const ids = parseGameIdList(text);
  if (ids.length === 0) {
    throw new ValidationError('No game ids given (pass them as arguments or set GAME_IDS)', 'gameIds');
  }
  return ids;
}

/**
 * Main application logic
 * 
 * 1. Resolves the game ids to run
 * 2. Waits for Redis and Kafka when they are configured
 * 3. Runs the collection, stopping new games on SIGINT/SIGTERM
 * 4. Publishes each finished game when Kafka publishing is enabled
 * 
 * @param argv - Command-line arguments (game ids)
 * @returns Per-game results in id order
 */
export async function startApp(argv: readonly string[]): Promise<GameResult[]> {
  const gameIds = resolveGameIds(argv);
  await waitForServices();

  let redis: Redis | null = null;
  let store: ArtifactStore;
  if (cfg.cache.backend === 'redis') {
    redis = createRedis();
    store = new RedisArtifactStore(redis);
  } else {
    store = new MemoryArtifactStore();
  }

  if (cfg.kafka.enabled) await startProducer();

  const controller = new AbortController();
  setupShutdownHandlers(controller);

  try {
    const scraper = new Scraper(gameIds, { store });
    logger.info({ games: gameIds.length, cache: cfg.cache.backend }, 'collection starting');
    const results = await scraper.run({ signal: controller.signal });

    if (cfg.kafka.enabled) {
      for (const result of results) await publishGameResult(result);
    }

    const events = scraper.playByPlay().length;
    const failed = results.filter(r => r.status === 'failed').map(r => r.gameId);
    logger.info({ games: results.length, events, failed }, 'collection finished');
    return results;
  } finally {
    if (cfg.kafka.enabled) await stopProducer();
    if (redis) await redis.quit();
  }
}
