/**
 * Configuration Module
 *
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 */

import 'dotenv/config';
import { z } from 'zod';

/**
 * Reads a numeric environment variable, falling back to a default when unset
 *
 * @param name - Environment variable name
 * @param fallback - Value used when the variable is missing or empty
 */
function num(name: string, fallback: number): number {
  const v = process.env[name];
  return v === undefined || v === '' ? fallback : Number(v);
}

/**
 * Reads a boolean environment variable ('true' / 'false')
 */
function bool(name: string, fallback: boolean): boolean {
  const v = process.env[name];
  if (v === undefined || v === '') return fallback;
  return v.toLowerCase() === 'true';
}

const configSchema = z.object({
  nhl: z.object({
    apiBaseUrl: z.string().url(),
    htmlBaseUrl: z.string().url()
  }),
  fetch: z.object({
    maxRetries: z.number().int().min(0),
    baseDelayMs: z.number().int().min(0),
    maxDelayMs: z.number().int().min(0),
    timeoutMs: z.number().int().positive(),
    concurrency: z.number().int().positive(),
    userAgent: z.string().min(1)
  }),
  pipeline: z.object({
    gameConcurrency: z.number().int().positive()
  }),
  reconcile: z.object({
    matchWindowSeconds: z.number().int().min(0),
    minPlayerOverlap: z.number().int().min(0)
  }),
  cache: z.object({
    backend: z.enum(['memory', 'redis'])
  }),
  redis: z.object({
    url: z.string().min(1),
    keyPrefix: z.string().min(1)
  }),
  kafka: z.object({
    enabled: z.boolean(),
    brokers: z.array(z.string().min(1)),
    clientId: z.string().min(1),
    topicResults: z.string().min(1)
  }),
  gameIds: z.array(z.string()),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
  logPretty: z.boolean()
});

export type AppConfig = z.infer<typeof configSchema>;

const nodeEnv = process.env.NODE_ENV;

/**
 * Application configuration object
 *
 * All configuration values are read from environment variables with sensible defaults.
 * Invalid values fail fast at import time.
 */
export const cfg: AppConfig = configSchema.parse({
  // Upstream endpoint families
  nhl: {
    apiBaseUrl: process.env.NHL_API_BASE_URL || 'https://api-web.nhle.com/v1', // Structured game-center API
    htmlBaseUrl: process.env.NHL_HTML_BASE_URL || 'https://www.nhl.com/scores/htmlreports' // Legacy HTML game reports
  },
  // Source fetching
  fetch: {
    maxRetries: num('FETCH_MAX_RETRIES', 3), // Retries after the first attempt for transient failures
    baseDelayMs: num('FETCH_BASE_DELAY_MS', 500), // First backoff step, doubled on each retry
    maxDelayMs: num('FETCH_MAX_DELAY_MS', 8000), // Backoff ceiling (also caps Retry-After)
    timeoutMs: num('FETCH_TIMEOUT_MS', 15000),
    concurrency: num('FETCH_CONCURRENCY', 4), // Requests in flight across all games
    userAgent: process.env.FETCH_USER_AGENT || 'icetime-pbp/0.1'
  },
  pipeline: {
    gameConcurrency: num('GAME_CONCURRENCY', 2) // Games in flight during a collection run
  },
  // Cross-source event matching
  reconcile: {
    matchWindowSeconds: num('MATCH_WINDOW_SECONDS', 0),
    minPlayerOverlap: num('MIN_PLAYER_OVERLAP', 1)
  },
  cache: {
    backend: process.env.CACHE_BACKEND || 'memory'
  },
  // Redis configuration (durable artifact cache)
  redis: {
    url: process.env.REDIS_URL || 'redis://localhost:6379',
    keyPrefix: process.env.REDIS_KEY_PREFIX || 'pbp'
  },
  // Kafka/Redpanda configuration
  kafka: {
    enabled: bool('KAFKA_ENABLED', false),
    brokers: (process.env.KAFKA_BROKERS || 'localhost:9092').split(',').map(b => b.trim()), // Comma-separated list of Kafka broker addresses
    clientId: process.env.KAFKA_CLIENT_ID || 'icetime-pbp',
    topicResults: process.env.KAFKA_TOPIC_RESULTS || 'pbp.game.results' // Topic for finished game results
  },
  gameIds: (process.env.GAME_IDS || '').split(',').map(id => id.trim()).filter(id => id.length > 0),
  // Logging configuration
  logLevel: process.env.LOG_LEVEL || 'info', // Log level (trace, debug, info, warn, error, fatal, silent)
  logPretty: bool('LOG_PRETTY', nodeEnv !== 'production' && nodeEnv !== 'test')
});
