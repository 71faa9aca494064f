/**
 * Source Fetcher Service
 *
 * Downloads the documents of one source for one game. Transient failures
 * are retried with bounded exponential backoff; missing documents are an
 * "absent" outcome rather than an error. Every request, from every game,
 * goes through one shared concurrency pool.
 */

import pLimit from 'p-limit';
import type { LimitFunction } from 'p-limit';
import { cfg } from '../core/config.js';
import { ABSENT_STATUSES, isRetryableStatus } from '../core/constants.js';
import { logger } from '../core/logger.js';
import { ApiError, FetchFailureError } from '../errors/index.js';
import { sourceUrls } from '../http/nhlApiClient.js';
import type { EndpointBases } from '../http/nhlApiClient.js';
import type { RawDocument, RawSource, SourceKind } from '../models/records.js';
import { nextDelayMs, sleep } from '../util/backoff.js';
import type { GameId } from '../util/gameId.js';
import { httpGet } from '../util/http.js';
import type { HttpGetter, HttpResponse } from '../util/http.js';

export type FetchOutcome = { status: 'ok'; raw: RawSource } | { status: 'absent'; reason: string };

type DocumentOutcome = { status: 'ok'; text: string } | { status: 'absent'; reason: string };

export interface FetcherOptions {
  http: HttpGetter;
  bases: EndpointBases;
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
  concurrency: number;
  userAgent: string;
  sleep: (ms: number) => Promise<void>;
  now: () => Date;
}

function isHtml(kind: SourceKind): boolean {
  return kind.startsWith('html_');
}

export class SourceFetcher {
  private readonly options: FetcherOptions;
  private readonly limit: LimitFunction;
  private readonly inFlight = new Map<string, Promise<DocumentOutcome>>();
  private requestCount = 0;

  constructor(options: Partial<FetcherOptions> = {}) {
    this.options = {
      http: httpGet,
      bases: cfg.nhl,
      maxRetries: cfg.fetch.maxRetries,
      baseDelayMs: cfg.fetch.baseDelayMs,
      maxDelayMs: cfg.fetch.maxDelayMs,
      timeoutMs: cfg.fetch.timeoutMs,
      concurrency: cfg.fetch.concurrency,
      userAgent: cfg.fetch.userAgent,
      sleep,
      now: () => new Date(),
      ...options,
    };
    this.limit = pLimit(this.options.concurrency);
  }

  /** HTTP requests issued so far, retries included */
  get requests(): number {
    return this.requestCount;
  }

  /**
   * Fetches every document of a source
   *
   * @throws FetchFailureError when a document could not be fetched within the retry budget
   */
  async fetchSource(gameId: GameId, kind: SourceKind): Promise<FetchOutcome> {
    const targets = sourceUrls(kind, gameId, this.options.bases);
    const outcomes = await Promise.all(targets.map(t => this.document(t.url, isHtml(kind))));

    const documents: RawDocument[] = [];
    for (const [i, outcome] of outcomes.entries()) {
      if (outcome.status === 'absent') {
        logger.info({ gameId: gameId.id, source: kind, url: targets[i].url, reason: outcome.reason }, 'source unavailable');
        return outcome;
      }
      documents.push({ url: targets[i].url, venue: targets[i].venue, text: outcome.text });
    }

    logger.debug({ gameId: gameId.id, source: kind, documents: documents.length }, 'source fetched');
    return {
      status: 'ok',
      raw: { kind, gameId: gameId.id, fetchedAt: this.options.now().toISOString(), documents },
    };
  }

  /**
   * Shares one download between concurrent callers of the same URL
   */
  private document(url: string, html: boolean): Promise<DocumentOutcome> {
    const pending = this.inFlight.get(url);
    if (pending) return pending;
    const request = this.download(url, html).finally(() => this.inFlight.delete(url));
    this.inFlight.set(url, request);
    return request;
  }

  private async download(url: string, html: boolean): Promise<DocumentOutcome> {
    const { maxRetries, baseDelayMs, maxDelayMs } = this.options;

    for (let attempt = 0; ; attempt++) {
      let res: HttpResponse<string>;
      try {
        res = await this.limit(() => {
          this.requestCount += 1;
          return this.options.http(url, {
            headers: { 'User-Agent': this.options.userAgent },
            encoding: html ? 'latin1' : 'utf8',
            timeoutMs: this.options.timeoutMs,
          });
        });
      } catch (err) {
        if (!(err instanceof ApiError)) throw err;
        // No response at all: treated as a retryable status 0
        res = { status: err.statusCode };
        if (attempt >= maxRetries) {
          throw new FetchFailureError(`Giving up on ${url}: ${err.message}`, url, attempt + 1, res.status, err);
        }
      }

      if (res.status >= 200 && res.status < 300) {
        const text = res.data ?? '';
        if (html && !/<html/i.test(text)) return { status: 'absent', reason: 'no HTML document in response' };
        return { status: 'ok', text };
      }
      if (ABSENT_STATUSES.has(res.status)) {
        return { status: 'absent', reason: `HTTP ${res.status}` };
      }
      if (!isRetryableStatus(res.status) || attempt >= maxRetries) {
        throw new FetchFailureError(`HTTP ${res.status} from ${url}`, url, attempt + 1, res.status);
      }

      const delayMs = nextDelayMs(attempt, baseDelayMs, maxDelayMs, res.retryAfterMs);
      logger.debug({ url, status: res.status, attempt: attempt + 1, delayMs }, 'retrying request');
      await this.options.sleep(delayMs);
    }
  }
}
