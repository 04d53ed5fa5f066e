/**
 * Resilient Fetcher
 *
 * Single choke point for outbound HTTP. Every request goes through:
 * 1. the response cache (GET only, unless the request opts out)
 * 2. a per-request timeout
 * 3. the shared retry policy for transient failures
 *
 * Failures are thrown as FetchError or RateLimitedError; nothing is
 * returned for a non-2xx status.
 */

import { ErrorHandler, FetchError, RateLimitedError } from '../errors';
import { loggers, serializeError, type Logger } from '../logger';
import { RetryPolicy, type RetryConfig } from '../retry/policy';
import { ResponseCache } from './cache';

export interface FetchRequest {
  url: string;
  method?: string;
  headers?: Record<string, string>;
  /** false bypasses the cache for both read and write */
  cache?: boolean;
}

export interface FetchResponse {
  url: string;
  status: number;
  /** Lower-cased header names */
  headers: Record<string, string>;
  body: string;
  fromCache: boolean;
}

export type FetchImpl = (input: string, init: RequestInit) => Promise<Response>;

export interface FetcherOptions {
  cache?: ResponseCache;
  retry?: Partial<RetryConfig>;
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: FetchImpl;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

export const DEFAULT_TIMEOUT_MS = 15000;
export const DEFAULT_USER_AGENT = 'resume-forge/1.0';

const RATE_LIMIT_MESSAGE = /rate limit/i;

export class ResilientFetcher {
  private readonly cache: ResponseCache;
  private readonly policy: RetryPolicy;
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchImpl;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: FetcherOptions = {}) {
    this.cache = options.cache ?? new ResponseCache();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? loggers.http;
    this.policy = new RetryPolicy({
      ...options.retry,
      sleep: options.sleep,
      isRetryable: error => ErrorHandler.isRetryable(error),
      retryAfterMs: error => (error instanceof RateLimitedError ? error.retryAfterMs : undefined),
      onRetry: ({ retry, delayMs, error }) => {
        this.log.warn({ retry: retry + 1, delayMs, err: serializeError(error) }, 'retrying request');
      }
    });
  }

  get retryConfig(): RetryConfig {
    return this.policy.config;
  }

  /**
   * Whether a live cache entry exists for the request
   */
  async isCached(request: FetchRequest): Promise<boolean> {
    if (!this.isCacheable(request)) {
      return false;
    }
    return this.cache.has(this.keyFor(request));
  }

  async fetch(request: FetchRequest): Promise<FetchResponse> {
    const method = (request.method ?? 'GET').toUpperCase();
    const cacheable = this.isCacheable(request);
    const key = this.keyFor(request);

    if (cacheable) {
      const hit = await this.cache.get(key);
      if (hit) {
        this.log.debug({ url: request.url }, 'cache hit');
        return {
          url: request.url,
          status: hit.status,
          headers: { ...hit.headers },
          body: hit.body,
          fromCache: true
        };
      }
    }

    const response = await this.policy.execute(attempt => this.attempt(request, method, attempt));

    if (cacheable) {
      await this.cache.set(key, response);
    }
    return response;
  }

  /**
   * Fetch and parse a JSON body
   */
  async fetchJson(request: FetchRequest): Promise<{ response: FetchResponse; data: unknown }> {
    const response = await this.fetch(request);
    try {
      return { response, data: JSON.parse(response.body) };
    } catch (error) {
      throw new FetchError({
        url: request.url,
        message: 'response body is not valid JSON',
        status: response.status,
        retryable: false,
        cause: error
      });
    }
  }

  private async attempt(request: FetchRequest, method: string, attempt: number): Promise<FetchResponse> {
    this.log.debug({ url: request.url, method, attempt }, 'request');

    let raw: Response;
    try {
      raw = await this.fetchImpl(request.url, {
        method,
        headers: { 'User-Agent': this.userAgent, ...request.headers },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      const timedOut = error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
      throw new FetchError({
        url: request.url,
        message: timedOut ? `timed out after ${this.timeoutMs}ms` : 'network error',
        retryable: true,
        cause: error
      });
    }

    const headers = headersToRecord(raw.headers);

    // GitHub's secondary limit is a 403 with retry-after while quota remains
    if (raw.status === 429 || (raw.status === 403
      && (headers['x-ratelimit-remaining'] === '0' || headers['retry-after'] !== undefined))) {
      await raw.body?.cancel();
      throw new RateLimitedError({
        url: request.url,
        retryAfterMs: retryAfterFromHeaders(headers, this.now())
      });
    }

    let body: string;
    try {
      body = await raw.text();
    } catch (error) {
      throw new FetchError({
        url: request.url,
        message: 'response body could not be read',
        status: raw.status,
        retryable: false,
        cause: error
      });
    }

    if (raw.status === 403 && RATE_LIMIT_MESSAGE.test(body)) {
      throw new RateLimitedError({
        url: request.url,
        retryAfterMs: retryAfterFromHeaders(headers, this.now())
      });
    }

    if (raw.status < 200 || raw.status >= 300) {
      throw new FetchError({
        url: request.url,
        message: `HTTP ${raw.status}`,
        status: raw.status,
        retryable: raw.status >= 500
      });
    }

    return { url: request.url, status: raw.status, headers, body, fromCache: false };
  }

  private isCacheable(request: FetchRequest): boolean {
    return this.cache.enabled
      && request.cache !== false
      && (request.method ?? 'GET').toUpperCase() === 'GET';
  }

  private keyFor(request: FetchRequest): string {
    return ResponseCache.keyFor(request.method ?? 'GET', request.url, acceptOf(request.headers));
  }
}

// ============================================================================
// Helpers
// ============================================================================

function acceptOf(headers: Record<string, string> | undefined): string | undefined {
  if (!headers) return undefined;
  const name = Object.keys(headers).find(h => h.toLowerCase() === 'accept');
  return name === undefined ? undefined : headers[name];
}

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, name) => {
    record[name.toLowerCase()] = value;
  });
  return record;
}

/**
 * Milliseconds until the server allows another request, from Retry-After
 * (seconds or HTTP date) or x-ratelimit-reset (epoch seconds)
 */
export function retryAfterFromHeaders(headers: Record<string, string>, now: number): number | undefined {
  const retryAfter = headers['retry-after'];
  if (retryAfter !== undefined) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) {
      return Math.max(0, seconds * 1000);
    }
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) {
      return Math.max(0, date - now);
    }
  }

  const reset = headers['x-ratelimit-reset'];
  if (reset !== undefined) {
    const epochSeconds = Number(reset);
    if (Number.isFinite(epochSeconds)) {
      return Math.max(0, epochSeconds * 1000 - now);
    }
  }

  return undefined;
}

/**
 * Value of a response header, case-insensitive
 */
export function headerOf(response: FetchResponse, name: string): string | undefined {
  return response.headers[name.toLowerCase()];
}
