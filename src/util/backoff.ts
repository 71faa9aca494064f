/**
 * Backoff Module
 *
 * Computes retry delays for transient fetch failures.
 */

/**
 * Calculates the delay before the next retry
 *
 * Uses exponential backoff (`baseMs * 2^attempt`) capped at `maxMs`.
 * A server-provided Retry-After takes precedence but is capped the same way.
 *
 * @param attempt - Zero-based index of the retry about to happen
 * @param baseMs - Delay of the first retry
 * @param maxMs - Upper bound on any delay
 * @param retryAfterMs - Optional server hint
 *
 * @example
 * nextDelayMs(0, 500, 8000); // 500
 * nextDelayMs(3, 500, 8000); // 4000
 * nextDelayMs(0, 500, 8000, 2000); // 2000
 */
export function nextDelayMs(attempt: number, baseMs: number, maxMs: number, retryAfterMs?: number): number {
  if (retryAfterMs !== undefined && Number.isFinite(retryAfterMs)) {
    return Math.min(Math.max(0, retryAfterMs), maxMs);
  }
  return Math.min(baseMs * 2 ** attempt, maxMs);
}

/**
 * Resolves after `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
