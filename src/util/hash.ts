/**
 * Hash Utility Module
 * 
 * Content hashing for published result payloads.
 */

import crypto from 'crypto';

/**
 * Generates SHA256 hash of input data
 * 
 * Consumers compare the hash of a game's result message with the last
 * one they stored to tell a re-published result from a changed one.
 * 
 * @param data - String data to hash (the JSON payload of a result message)
 * @returns Hexadecimal hash string (64 characters)
 * 
 * @example
 * sha256('{"events":[]}');
 */
export function sha256(data: string): string {
  return crypto.createHash('sha256').update(data).digest('hex');
}
