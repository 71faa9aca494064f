/**
 * Kafka Producer Module
 * 
 * Manages Kafka producer connection and result publishing.
 * Uses KafkaJS library which is compatible with Kafka and Redpanda brokers.
 */

import { Kafka, logLevel } from 'kafkajs';
import type { Producer } from 'kafkajs';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { KafkaError, toError } from '../errors/index.js';
import type { GameResult } from '../models/records.js';
import type { CompletedPayload, FailedPayload, GameResultMessage } from '../models/messages.js';
import { sha256 } from '../util/hash.js';

/**
 * Kafka client instance
 * 
 * Configured with client ID and broker addresses from config.
 * Log level set to ERROR to reduce noise from KafkaJS internal logs.
 */
const kafka = new Kafka({
  clientId: cfg.kafka.clientId,
  brokers: cfg.kafka.brokers,
  logLevel: logLevel.ERROR
});

/**
 * Kafka producer instance
 * 
 * Used to publish game result messages to the configured topic.
 */
export const producer = kafka.producer();

/**
 * Connects the Kafka producer to the broker(s)
 * 
 * Must be called before publishing any messages.
 */
export async function startProducer() {
  logger.info({ brokers: cfg.kafka.brokers }, 'Connecting to Kafka brokers...');
  try {
    await producer.connect();
  } catch (err) {
    const error = toError(err);
    throw new KafkaError(`Kafka connect failed: ${error.message}`, 'connect', error);
  }
  logger.info({ brokers: cfg.kafka.brokers }, 'Kafka producer connected');
}

/**
 * Disconnects the Kafka producer gracefully
 * 
 * Should be called during shutdown to ensure all pending messages are sent.
 */
export async function stopProducer() {
  await producer.disconnect();
}

/**
 * Builds the message for a finished game; cancelled games have none
 * 
 * @param now - Clock used for producedAt
 */
export function buildResultMessage(result: GameResult, now: Date = new Date()): GameResultMessage | null {
  if (result.status === 'cancelled') return null;

  const payload: CompletedPayload | FailedPayload =
    result.status === 'ok'
      ? { events: result.events, diagnostics: result.diagnostics }
      : { reason: result.reason };

  return {
    eventType: result.status === 'ok' ? 'game.completed' : 'game.failed',
    gameId: result.gameId,
    source: 'icetime-pbp',
    version: 'v1',
    producedAt: now.toISOString(),
    hash: sha256(JSON.stringify(payload)),
    payload
  };
}

/**
 * Publishes a game result to the results topic, keyed by game id
 * 
 * @param target - Producer to send with (the module producer by default)
 * @returns false when there was nothing to publish
 */
export async function publishGameResult(
  result: GameResult,
  target: Pick<Producer, 'send'> = producer
): Promise<boolean> {
  const message = buildResultMessage(result);
  if (!message) return false;

  try {
    await target.send({
      topic: cfg.kafka.topicResults,
      messages: [{ key: message.gameId, value: JSON.stringify(message) }]
    });
  } catch (err) {
    const error = toError(err);
    throw new KafkaError(`Publishing ${message.eventType} for ${message.gameId} failed: ${error.message}`, 'send', error);
  }
  logger.debug({ gameId: message.gameId, eventType: message.eventType, hash: message.hash }, 'result published');
  return true;
}
