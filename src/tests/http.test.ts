/**
 * Tests for the retry policy, response cache and resilient fetcher
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  FetchImpl,
  FileCacheStore,
  MemoryCacheStore,
  ResilientFetcher,
  ResponseCache,
  retryAfterFromHeaders
} from '../shared/http';
import { RetryPolicy } from '../shared/retry/policy';
import { FetchError, RateLimitedError } from '../shared/errors';

interface ScriptedReply {
  status: number;
  body?: string;
  headers?: Record<string, string>;
}

/**
 * fetch stand-in that replays a list of replies and records each call
 */
function scriptedFetch(replies: Array<ScriptedReply | Error>) {
  const calls: Array<{ url: string; init: RequestInit }> = [];
  const fetchImpl: FetchImpl = async (url, init) => {
    calls.push({ url, init });
    const reply = replies[Math.min(calls.length - 1, replies.length - 1)];
    if (reply instanceof Error) {
      throw reply;
    }
    return new Response(reply.body ?? '', { status: reply.status, headers: reply.headers });
  };
  return { fetchImpl, calls };
}

function recordingSleep() {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    }
  };
}

describe('RetryPolicy', () => {
  it('doubles the delay per retry up to the cap', () => {
    const policy = new RetryPolicy({ maxRetries: 6, baseDelayMs: 500, maxDelayMs: 8000 });

    expect([0, 1, 2, 3, 4, 5].map(n => policy.delayFor(n))).toEqual([500, 1000, 2000, 4000, 8000, 8000]);
  });

  it('uses a larger server hint, still within the cap', () => {
    const policy = new RetryPolicy({
      baseDelayMs: 500,
      maxDelayMs: 8000,
      retryAfterMs: error => (typeof error === 'number' ? error : undefined)
    });

    expect(policy.delayFor(0, 3000)).toBe(3000);
    expect(policy.delayFor(0, 20000)).toBe(8000);
    expect(policy.delayFor(2, 100)).toBe(2000);
  });

  it('does not retry errors the predicate rejects', async () => {
    const { delays, sleep } = recordingSleep();
    const policy = new RetryPolicy({ isRetryable: () => false, sleep });
    let calls = 0;

    await expect(policy.execute(async () => {
      calls++;
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(calls).toBe(1);
    expect(delays).toEqual([]);
  });

  it('rethrows the last error once retries are exhausted', async () => {
    const { delays, sleep } = recordingSleep();
    const policy = new RetryPolicy({ maxRetries: 2, baseDelayMs: 10, isRetryable: () => true, sleep });

    await expect(policy.execute(async attempt => {
      throw new Error(`attempt ${attempt}`);
    })).rejects.toThrow('attempt 2');

    expect(delays).toEqual([10, 20]);
  });

  it('rejects a negative retry count', () => {
    expect(() => new RetryPolicy({ maxRetries: -1 })).toThrow(RangeError);
  });
});

describe('Response cache', () => {
  it('evicts the oldest entry when the memory store is full', async () => {
    const store = new MemoryCacheStore(2);
    const cache = new ResponseCache(store);

    await cache.set('aa', { status: 200, headers: {}, body: 'one' });
    await cache.set('bb', { status: 200, headers: {}, body: 'two' });
    await cache.set('cc', { status: 200, headers: {}, body: 'three' });

    expect(store.size).toBe(2);
    expect(await cache.get('aa')).toBeUndefined();
    expect((await cache.get('cc'))?.body).toBe('three');
  });

  it('drops expired entries from the store when read', async () => {
    let now = 1_000_000;
    const store = new MemoryCacheStore();
    const cache = new ResponseCache(store, { ttlSeconds: 60 }, () => now);

    await cache.set('aa', { status: 200, headers: {}, body: 'fresh' });
    now += 60_000;
    expect((await cache.get('aa'))?.body).toBe('fresh');

    now += 1;
    expect(await cache.get('aa')).toBeUndefined();
    expect(await store.get('aa')).toBeUndefined();
  });

  it('keys on method, URL and Accept header', () => {
    const plain = ResponseCache.keyFor('GET', 'https://example.com/a');

    expect(ResponseCache.keyFor('get', 'https://example.com/a')).toBe(plain);
    expect(ResponseCache.keyFor('GET', 'https://example.com/a', 'text/html')).not.toBe(plain);
    expect(ResponseCache.keyFor('HEAD', 'https://example.com/a')).not.toBe(plain);
    expect(plain).toMatch(/^[a-f0-9]{64}$/);
  });

  it('stores nothing while disabled', async () => {
    const store = new MemoryCacheStore();
    const cache = new ResponseCache(store, { enabled: false });

    await cache.set('aa', { status: 200, headers: {}, body: 'x' });

    expect(store.size).toBe(0);
  });

  describe('FileCacheStore', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cache-test-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('persists entries as one file per key', async () => {
      const store = new FileCacheStore(dir);
      const entry = { key: 'abc123', status: 200, headers: { etag: 'x' }, body: '{"a":1}', storedAt: 5, ttlMs: 1000 };

      await store.set(entry);

      expect(await fs.readdir(dir)).toEqual(['abc123.json']);
      expect(await new FileCacheStore(dir).get('abc123')).toEqual(entry);
    });

    it('discards a malformed entry', async () => {
      const store = new FileCacheStore(dir);
      await fs.writeFile(path.join(dir, 'dead.json'), '{"key":"dead"', 'utf-8');

      expect(await store.get('dead')).toBeUndefined();
      expect(await fs.readdir(dir)).toEqual([]);
    });

    it('rejects keys that are not hex digests', async () => {
      const store = new FileCacheStore(dir);

      await expect(store.get('../escape')).rejects.toThrow('Invalid cache key: ../escape');
    });
  });
});

describe('ResilientFetcher', () => {
  it('succeeds after three 503 responses with exactly three delays', async () => {
    const { fetchImpl, calls } = scriptedFetch([
      { status: 503 },
      { status: 503 },
      { status: 503 },
      { status: 200, body: 'ok' }
    ]);
    const { delays, sleep } = recordingSleep();
    const fetcher = new ResilientFetcher({
      fetchImpl,
      sleep,
      retry: { maxRetries: 3, baseDelayMs: 500, maxDelayMs: 8000 }
    });

    const response = await fetcher.fetch({ url: 'https://example.com/data' });

    expect(response.status).toBe(200);
    expect(response.body).toBe('ok');
    expect(response.fromCache).toBe(false);
    expect(calls).toHaveLength(4);
    expect(delays).toEqual([500, 1000, 2000]);
  });

  it('gives up after maxRetries and reports the last status', async () => {
    const { fetchImpl, calls } = scriptedFetch([{ status: 502 }]);
    const { delays, sleep } = recordingSleep();
    const fetcher = new ResilientFetcher({ fetchImpl, sleep, retry: { maxRetries: 2, baseDelayMs: 100 } });

    const error = await fetcher.fetch({ url: 'https://example.com/data' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FetchError);
    expect(error instanceof FetchError && error.status).toBe(502);
    expect(calls).toHaveLength(3);
    expect(delays).toEqual([100, 200]);
  });

  it('does not retry a 404', async () => {
    const { fetchImpl, calls } = scriptedFetch([{ status: 404 }]);
    const { delays, sleep } = recordingSleep();
    const fetcher = new ResilientFetcher({ fetchImpl, sleep });

    const error = await fetcher.fetch({ url: 'https://example.com/missing' }).catch((e: unknown) => e);

    expect(error instanceof FetchError && error.retryable).toBe(false);
    expect(calls).toHaveLength(1);
    expect(delays).toEqual([]);
  });

  it('retries network failures', async () => {
    const { fetchImpl, calls } = scriptedFetch([new TypeError('fetch failed'), { status: 200, body: 'ok' }]);
    const { delays, sleep } = recordingSleep();
    const fetcher = new ResilientFetcher({ fetchImpl, sleep, retry: { baseDelayMs: 50 } });

    const response = await fetcher.fetch({ url: 'https://example.com/flaky' });

    expect(response.body).toBe('ok');
    expect(calls).toHaveLength(2);
    expect(delays).toEqual([50]);
  });

  it('serves a cache hit without touching the network', async () => {
    const { fetchImpl, calls } = scriptedFetch([{ status: 200, body: 'cached body', headers: { 'Content-Type': 'text/plain' } }]);
    const fetcher = new ResilientFetcher({ fetchImpl, cache: new ResponseCache() });

    await fetcher.fetch({ url: 'https://example.com/page' });
    const second = await fetcher.fetch({ url: 'https://example.com/page' });

    expect(calls).toHaveLength(1);
    expect(second.fromCache).toBe(true);
    expect(second.body).toBe('cached body');
    expect(second.headers['content-type']).toBe('text/plain');
  });

  it('makes exactly one new call for an expired entry', async () => {
    let now = 0;
    const { fetchImpl, calls } = scriptedFetch([{ status: 200, body: 'v1' }, { status: 200, body: 'v2' }]);
    const cache = new ResponseCache(new MemoryCacheStore(), { ttlSeconds: 60 }, () => now);
    const fetcher = new ResilientFetcher({ fetchImpl, cache });

    await fetcher.fetch({ url: 'https://example.com/page' });
    now = 61_000;
    const refreshed = await fetcher.fetch({ url: 'https://example.com/page' });
    const cached = await fetcher.fetch({ url: 'https://example.com/page' });

    expect(calls).toHaveLength(2);
    expect(refreshed.body).toBe('v2');
    expect(cached.fromCache).toBe(true);
    expect(cached.body).toBe('v2');
  });

  it('bypasses the cache when the request opts out', async () => {
    const { fetchImpl, calls } = scriptedFetch([{ status: 200, body: 'live' }]);
    const fetcher = new ResilientFetcher({ fetchImpl });

    await fetcher.fetch({ url: 'https://example.com/rate', cache: false });
    await fetcher.fetch({ url: 'https://example.com/rate', cache: false });

    expect(calls).toHaveLength(2);
    expect(await fetcher.isCached({ url: 'https://example.com/rate' })).toBe(false);
  });

  it('raises RateLimitedError for an exhausted GitHub quota', async () => {
    const { fetchImpl } = scriptedFetch([
      { status: 403, headers: { 'x-ratelimit-remaining': '0', 'x-ratelimit-reset': '1060' } }
    ]);
    const fetcher = new ResilientFetcher({ fetchImpl, retry: { maxRetries: 0 }, now: () => 1_000_000 });

    const error = await fetcher.fetch({ url: 'https://api.example.com/users' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError && error.retryAfterMs).toBe(60_000);
  });

  it('raises RateLimitedError for a secondary limit while quota remains', async () => {
    const { fetchImpl } = scriptedFetch([
      { status: 403, body: '{}', headers: { 'retry-after': '60', 'x-ratelimit-remaining': '4000' } }
    ]);
    const fetcher = new ResilientFetcher({ fetchImpl, retry: { maxRetries: 0 } });

    const error = await fetcher.fetch({ url: 'https://api.example.com/repos/octo/api/languages' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error instanceof RateLimitedError && error.retryAfterMs).toBe(60_000);
  });

  it('recognises a rate limit from the 403 message alone', async () => {
    const { fetchImpl } = scriptedFetch([
      { status: 403, body: '{"message":"You have exceeded a secondary rate limit."}' },
      { status: 403, body: '{"message":"Resource not accessible by integration"}' }
    ]);
    const fetcher = new ResilientFetcher({ fetchImpl, retry: { maxRetries: 0 } });

    const limited = await fetcher.fetch({ url: 'https://api.example.com/a' }).catch((e: unknown) => e);
    const forbidden = await fetcher.fetch({ url: 'https://api.example.com/b' }).catch((e: unknown) => e);

    expect(limited).toBeInstanceOf(RateLimitedError);
    expect(limited instanceof RateLimitedError && limited.retryAfterMs).toBeUndefined();
    expect(forbidden).toBeInstanceOf(FetchError);
    expect(forbidden instanceof FetchError && forbidden.status).toBe(403);
  });

  it('releases the body of a rate-limited response', async () => {
    const response = new Response('slow down', { status: 429 });
    const fetcher = new ResilientFetcher({ fetchImpl: async () => response, retry: { maxRetries: 0 } });

    await expect(fetcher.fetch({ url: 'https://example.com/busy' })).rejects.toBeInstanceOf(RateLimitedError);
    expect(response.bodyUsed).toBe(true);
  });

  it('waits for the Retry-After hint on a 429', async () => {
    const { fetchImpl, calls } = scriptedFetch([
      { status: 429, headers: { 'Retry-After': '2' } },
      { status: 200, body: 'ok' }
    ]);
    const { delays, sleep } = recordingSleep();
    const fetcher = new ResilientFetcher({ fetchImpl, sleep, retry: { baseDelayMs: 500, maxDelayMs: 8000 } });

    await fetcher.fetch({ url: 'https://example.com/busy' });

    expect(calls).toHaveLength(2);
    expect(delays).toEqual([2000]);
  });

  it('sends its User-Agent with the caller headers', async () => {
    const { fetchImpl, calls } = scriptedFetch([{ status: 200, body: '{}' }]);
    const fetcher = new ResilientFetcher({ fetchImpl, userAgent: 'test-agent/1.0' });

    await fetcher.fetch({ url: 'https://example.com/x', headers: { Accept: 'application/json' } });

    expect(calls[0].init.headers).toEqual({ 'User-Agent': 'test-agent/1.0', Accept: 'application/json' });
  });

  it('reports an unparseable JSON body without retrying', async () => {
    const { fetchImpl, calls } = scriptedFetch([{ status: 200, body: '<html>' }]);
    const { sleep } = recordingSleep();
    const fetcher = new ResilientFetcher({ fetchImpl, sleep });

    await expect(fetcher.fetchJson({ url: 'https://example.com/api' })).rejects.toBeInstanceOf(FetchError);
    expect(calls).toHaveLength(1);
  });
});

describe('retryAfterFromHeaders', () => {
  it('reads Retry-After seconds', () => {
    expect(retryAfterFromHeaders({ 'retry-after': '5' }, 0)).toBe(5000);
  });

  it('reads a Retry-After date', () => {
    const now = Date.parse('2024-01-01T00:00:00Z');
    expect(retryAfterFromHeaders({ 'retry-after': 'Mon, 01 Jan 2024 00:00:30 GMT' }, now)).toBe(30_000);
  });

  it('returns undefined without hints', () => {
    expect(retryAfterFromHeaders({}, 0)).toBeUndefined();
  });
});
