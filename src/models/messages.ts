/**
 * Message Models
 * 
 * Defines the structure of messages published to Kafka.
 * One message is published per finished game when publishing is enabled.
 */

import type { Diagnostic, EnrichedEvent } from './records.js';

export type ResultEventType = 'game.completed' | 'game.failed';

export interface CompletedPayload {
  events: EnrichedEvent[];
  diagnostics: Diagnostic[];
}

export interface FailedPayload {
  reason: { code: string; message: string; source?: string };
}

/**
 * Game result message structure
 * 
 * @template T - Type of the payload (CompletedPayload or FailedPayload)
 */
export interface GameResultMessage<T = CompletedPayload | FailedPayload> {
  /** 'game.completed' with the enriched play-by-play, or 'game.failed' with the reason */
  eventType: ResultEventType;
  
  /** 10-digit game identifier, also used as the message key */
  gameId: string;
  
  /** Producer identifier */
  source: 'icetime-pbp';
  
  /** Message schema version */
  version: 'v1';
  
  /** ISO timestamp when the message was built */
  producedAt: string;
  
  /** SHA256 hash of the JSON payload (for change detection and deduplication) */
  hash: string;
  
  payload: T;
}
