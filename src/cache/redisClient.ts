/**
 * Redis Client Module
 * 
 * Creates the Redis connection backing the durable artifact cache.
 * Handles connection events and errors for monitoring.
 */

import { Redis } from 'ioredis';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';

/**
 * Opens a Redis connection
 * 
 * Only created when CACHE_BACKEND=redis; the in-memory store needs none.
 */
export function createRedis(url: string = cfg.redis.url): Redis {
  const redis = new Redis(url);

  // Log connection events for monitoring
  redis.on('connect', () => logger.info('Redis connected'));
  redis.on('error', (err) => logger.error({ err }, 'Redis error'));

  return redis;
}
