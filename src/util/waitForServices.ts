/**
 * Wait for Services Utility
 *
 * Waits for the external services the configuration enables (Redis for the
 * durable cache, Kafka for result publishing) before a collection starts,
 * so the first game does not fail on a connection that is still coming up.
 */

import { Redis } from 'ioredis';
import { Kafka } from 'kafkajs';
import { cfg } from '../core/config.js';
import { HEALTH_CHECK } from '../core/constants.js';
import { logger } from '../core/logger.js';
import { AppError, toError } from '../errors/index.js';
import { sleep } from './backoff.js';

/** One readiness check; resolves when the service answers */
export type Probe = () => Promise<void>;

export interface WaitOptions {
  maxAttempts: number;
  delayMs: number;
  sleep: (ms: number) => Promise<void>;
}

const DEFAULT_WAIT: WaitOptions = {
  maxAttempts: HEALTH_CHECK.MAX_RETRIES,
  delayMs: HEALTH_CHECK.RETRY_DELAY_MS,
  sleep,
};

/**
 * Runs a probe until it succeeds
 *
 * @throws AppError (SERVICE_UNAVAILABLE) with the last probe error as cause
 */
export async function waitFor(service: string, probe: Probe, options: Partial<WaitOptions> = {}): Promise<void> {
  const { maxAttempts, delayMs, sleep: pause } = { ...DEFAULT_WAIT, ...options };
  logger.info({ service }, 'waiting for service');

  for (let attempt = 1; ; attempt++) {
    try {
      await probe();
      logger.info({ service, attempt }, 'service ready');
      return;
    } catch (err) {
      const error = toError(err);
      if (attempt >= maxAttempts) {
        throw new AppError(
          `${service} not ready after ${maxAttempts} attempts: ${error.message}`,
          'SERVICE_UNAVAILABLE',
          503,
          error
        );
      }
      logger.debug({ service, attempt, maxAttempts, err: error.message }, 'service not ready, retrying');
      await pause(delayMs);
    }
  }
}

async function probeRedis(): Promise<void> {
  const client = new Redis(cfg.redis.url, {
    maxRetriesPerRequest: 1,
    retryStrategy: () => null,
    connectTimeout: HEALTH_CHECK.CONNECTION_TIMEOUT_MS,
    lazyConnect: true,
  });
  try {
    await client.connect();
    await client.ping();
    await client.quit();
  } catch (err) {
    client.disconnect();
    throw err;
  }
}

function kafkaProbe(): Probe {
  const admin = new Kafka({
    clientId: `${cfg.kafka.clientId}-health-check`,
    brokers: cfg.kafka.brokers,
    connectionTimeout: HEALTH_CHECK.CONNECTION_TIMEOUT_MS,
    requestTimeout: HEALTH_CHECK.CONNECTION_TIMEOUT_MS,
  }).admin();

  return async () => {
    await admin.connect();
    await admin.listTopics();
    await admin.disconnect();
  };
}

/**
 * Waits for every configured service
 *
 * @throws AppError naming the first service that never became ready
 */
export async function waitForServices(): Promise<void> {
  const checks: Promise<void>[] = [];
  if (cfg.cache.backend === 'redis') checks.push(waitFor('redis', probeRedis));
  if (cfg.kafka.enabled) checks.push(waitFor('kafka', kafkaProbe()));
  if (checks.length === 0) return;

  const results = await Promise.allSettled(checks);
  const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
  if (failure) throw toError(failure.reason);
  logger.info('service availability check complete');
}
