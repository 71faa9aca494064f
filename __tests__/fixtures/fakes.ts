/**
 * In-process stand-ins for the HTTP transport and Redis
 */

import type { HashClient } from '../../src/cache/artifactStore.js';
import { ApiError } from '../../src/errors/index.js';
import type { HttpGetOptions, HttpResponse } from '../../src/util/http.js';

/** A scripted reply: a status with an optional body, or a transport failure */
export type Reply = { status: number; body?: string; retryAfterMs?: number } | 'network-error';

/**
 * HttpGetter over a route table. Scripted replies are consumed in order
 * before the route's body is served; unknown URLs return 404.
 */
export class FakeHttp {
  readonly calls: { url: string; options: HttpGetOptions | undefined }[] = [];
  private readonly scripts = new Map<string, Reply[]>();

  constructor(private readonly routes: Map<string, string> = new Map()) {}

  script(url: string, ...replies: Reply[]): this {
    this.scripts.set(url, [...(this.scripts.get(url) ?? []), ...replies]);
    return this;
  }

  callsTo(url: string): number {
    return this.calls.filter(c => c.url === url).length;
  }

  readonly get = async (url: string, options?: HttpGetOptions): Promise<HttpResponse<string>> => {
    this.calls.push({ url, options });
    const reply = this.scripts.get(url)?.shift();
    if (reply === 'network-error') throw new ApiError('HTTP request failed: socket hang up', url, 0);
    if (reply) return { status: reply.status, data: reply.body ?? '', retryAfterMs: reply.retryAfterMs };

    const body = this.routes.get(url);
    return body === undefined ? { status: 404, data: 'Not Found' } : { status: 200, data: body };
  };
}

export class FakeRedis implements HashClient {
  readonly hashes = new Map<string, Map<string, string>>();
  failNext: Error | null = null;

  private check(): void {
    const err = this.failNext;
    this.failNext = null;
    if (err) throw err;
  }

  async hget(key: string, field: string): Promise<string | null> {
    this.check();
    return this.hashes.get(key)?.get(field) ?? null;
  }

  async hset(key: string, field: string, value: string): Promise<number> {
    this.check();
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    const added = hash.has(field) ? 0 : 1;
    hash.set(field, value);
    this.hashes.set(key, hash);
    return added;
  }

  async hkeys(key: string): Promise<string[]> {
    this.check();
    return [...(this.hashes.get(key)?.keys() ?? [])];
  }

  async hdel(key: string, ...fields: string[]): Promise<number> {
    this.check();
    const hash = this.hashes.get(key);
    return fields.filter(f => hash?.delete(f)).length;
  }

  async del(key: string): Promise<number> {
    this.check();
    return this.hashes.delete(key) ? 1 : 0;
  }
}

/** Sleep that records the delays instead of waiting */
export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
