/**
 * Response Cache
 *
 * Content-addressed store for HTTP responses with a time-to-live.
 * Entries are immutable once written; writing an existing key replaces the
 * whole entry (last writer wins), so concurrent collectors need no locking.
 *
 * Two stores sit behind the same interface:
 * - MemoryCacheStore: per-process, FIFO eviction at maxEntries
 * - FileCacheStore: one JSON file per key, survives across runs
 */

import { createHash, randomUUID } from 'crypto';
import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { loggers, type Logger } from '../logger';

/**
 * A stored response
 */
export interface CacheEntry {
  key: string;
  status: number;
  headers: Record<string, string>;
  body: string;
  /** epoch milliseconds */
  storedAt: number;
  ttlMs: number;
}

/**
 * Cache configuration
 */
export interface CacheConfig {
  enabled: boolean;
  ttlSeconds: number;
}

/**
 * Default cache configuration
 */
export const DEFAULT_CACHE_CONFIG: CacheConfig = {
  enabled: true,
  ttlSeconds: 86400 // 1 day
};

/**
 * Backing store for cache entries
 */
export interface CacheStore {
  get(key: string): Promise<CacheEntry | undefined>;
  set(entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

const CacheEntrySchema = z.object({
  key: z.string(),
  status: z.number().int(),
  headers: z.record(z.string()),
  body: z.string(),
  storedAt: z.number(),
  ttlMs: z.number()
});

// ============================================================================
// Stores
// ============================================================================

/**
 * In-memory store; evicts the oldest entry when full
 */
export class MemoryCacheStore implements CacheStore {
  private entries: Map<string, CacheEntry> = new Map();

  constructor(private readonly maxEntries: number = 1000) {}

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key);
  }

  async set(entry: CacheEntry): Promise<void> {
    // Re-inserting moves the key to the back of the FIFO order
    this.entries.delete(entry.key);
    if (this.entries.size >= this.maxEntries) {
      const firstKey = this.entries.keys().next().value;
      if (firstKey !== undefined) {
        this.entries.delete(firstKey);
      }
    }
    this.entries.set(entry.key, entry);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * File-backed store. Writes go to a temp file first and are renamed into
 * place, so a reader never sees a half-written entry.
 */
export class FileCacheStore implements CacheStore {
  private readonly rootPath: string;

  constructor(rootPath: string, private readonly log: Logger = loggers.http) {
    this.rootPath = path.resolve(rootPath);
  }

  private fileFor(key: string): string {
    if (!/^[a-f0-9]+$/.test(key)) {
      throw new Error(`Invalid cache key: ${key}`);
    }
    return path.join(this.rootPath, `${key}.json`);
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.fileFor(key), 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }

    try {
      const parsed = CacheEntrySchema.safeParse(JSON.parse(raw));
      if (parsed.success) {
        return parsed.data;
      }
      this.log.warn({ key }, 'discarding malformed cache entry');
    } catch (error) {
      this.log.warn({ key, err: error instanceof Error ? error.message : String(error) }, 'discarding unreadable cache entry');
    }
    await this.delete(key);
    return undefined;
  }

  async set(entry: CacheEntry): Promise<void> {
    const target = this.fileFor(entry.key);
    const temp = `${target}.${randomUUID()}.tmp`;
    await fs.mkdir(this.rootPath, { recursive: true });
    await fs.writeFile(temp, JSON.stringify(entry), 'utf-8');
    await fs.rename(temp, target);
  }

  async delete(key: string): Promise<void> {
    await fs.rm(this.fileFor(key), { force: true });
  }

  async clear(): Promise<void> {
    await fs.rm(this.rootPath, { recursive: true, force: true });
  }

  getRootPath(): string {
    return this.rootPath;
  }
}

// ============================================================================
// Cache
// ============================================================================

/**
 * TTL-aware response cache over a CacheStore
 */
export class ResponseCache {
  private readonly config: CacheConfig;

  constructor(
    private readonly store: CacheStore = new MemoryCacheStore(),
    config: Partial<CacheConfig> = {},
    private readonly now: () => number = Date.now
  ) {
    this.config = { ...DEFAULT_CACHE_CONFIG, ...config };
  }

  /**
   * Deterministic key from method, URL and the representation-selecting
   * Accept header
   */
  static keyFor(method: string, url: string, accept?: string): string {
    return createHash('sha256')
      .update(`${method.toUpperCase()}\n${url}\n${accept ?? ''}`)
      .digest('hex');
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Get a live entry; expired entries are evicted on the way
   */
  async get(key: string): Promise<CacheEntry | undefined> {
    if (!this.config.enabled) {
      return undefined;
    }

    const entry = await this.store.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.now() - entry.storedAt > entry.ttlMs) {
      await this.store.delete(key);
      return undefined;
    }

    return entry;
  }

  async has(key: string): Promise<boolean> {
    return (await this.get(key)) !== undefined;
  }

  /**
   * Store a response under the configured TTL
   */
  async set(
    key: string,
    response: { status: number; headers: Record<string, string>; body: string }
  ): Promise<void> {
    if (!this.config.enabled) {
      return;
    }

    await this.store.set({
      key,
      status: response.status,
      headers: { ...response.headers },
      body: response.body,
      storedAt: this.now(),
      ttlMs: this.config.ttlSeconds * 1000
    });
  }

  async clear(): Promise<void> {
    await this.store.clear();
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
