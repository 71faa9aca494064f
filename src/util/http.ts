/**
 * HTTP Utility Module
 *
 * Provides the raw GET used by the source fetcher:
 * - Bodies returned as decoded text (UTF-8 for the API, ISO-8859-1 for HTML reports)
 * - Retry-After parsing for rate-limited responses
 * - Never throws on HTTP error statuses (validateStatus: () => true)
 */

import axios from 'axios';
import { ApiError, toError } from '../errors/index.js';
import { logger } from '../core/logger.js';

/**
 * HTTP response structure
 *
 * @template T - Type of the response data
 */
export interface HttpResponse<T> {
  status: number; // HTTP status code
  data?: T; // Response body
  retryAfterMs?: number; // Retry-After header converted to milliseconds
}

export interface HttpGetOptions {
  headers?: Record<string, string>;
  encoding?: 'utf8' | 'latin1';
  timeoutMs?: number;
}

/**
 * Signature of the GET function the fetcher depends on.
 * Tests inject an in-process implementation.
 */
export type HttpGetter = (url: string, options?: HttpGetOptions) => Promise<HttpResponse<string>>;

/**
 * Converts a Retry-After header (delta seconds or HTTP date) to milliseconds
 */
export function parseRetryAfter(value: string | undefined, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return undefined;
  return Math.max(0, at - now);
}

/**
 * Performs an HTTP GET request and returns the body as text
 *
 * @param url - Full URL to request
 * @param options - Headers, body encoding and timeout
 * @returns Promise resolving to HttpResponse with status, text body and retry hint
 * @throws ApiError with status 0 when no response was received (network error, timeout)
 *
 * @example
 * const res = await httpGet('https://www.nhl.com/scores/htmlreports/20232024/PL020001.HTM', {
 *   encoding: 'latin1'
 * });
 */
export async function httpGet(url: string, options: HttpGetOptions = {}): Promise<HttpResponse<string>> {
  const { headers = {}, encoding = 'utf8', timeoutMs } = options;
  try {
    const res = await axios.get<ArrayBuffer>(url, {
      headers,
      timeout: timeoutMs,
      responseType: 'arraybuffer',
      validateStatus: () => true
    });

    // Log errors for non-2xx responses
    if (res.status >= 400) {
      logger.warn({ url, status: res.status }, 'HTTP request failed');
    }

    const retryHeader = res.headers['retry-after'];
    const retryAfterMs = parseRetryAfter(typeof retryHeader === 'string' ? retryHeader : undefined);

    return { status: res.status, data: Buffer.from(res.data).toString(encoding), retryAfterMs };
  } catch (err) {
    const error = toError(err);
    throw new ApiError(`HTTP request failed: ${error.message}`, url, 0, error);
  }
}
