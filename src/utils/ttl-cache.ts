/**
 * In-memory TTL cache for slowly-changing per-user data (settings, question
 * summaries). Expired entries read as misses and are also dropped by a
 * periodic sweep. When full, the entry with the fewest hits (oldest first
 * on ties) is evicted, an approximation of LRU, not strict LRU.
 *
 * Writers to the underlying record must call invalidate() before reporting
 * success. A read-through load that overlaps an invalidation is returned to
 * its caller but never written back into the cache.
 */

import { logger } from '../middleware/logger.js';

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
  hitCount: number;
  createdAt: number;
}

interface InFlightLoad<V> {
  promise: Promise<V>;
  token: symbol;
}

export interface TtlCacheOptions {
  /** Used when set() is called without an explicit TTL. */
  defaultTtlSeconds: number;
  maxSize: number;
  sweepIntervalMs?: number;
  now?: () => number;
}

export interface TtlCacheStats {
  entries: number;
  hits: number;
  misses: number;
  evictions: number;
  expired: number;
}

const DEFAULT_SWEEP_INTERVAL_MS = 60_000;

/** Translate a key glob (`*` = any run, `?` = one char) into an anchored RegExp. */
export function globToRegExp(glob: string): RegExp {
  let source = '';
  for (const ch of glob) {
    if (ch === '*') source += '.*';
    else if (ch === '?') source += '.';
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp(`^${source}$`);
}

export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly loading = new Map<string, InFlightLoad<V>>();
  private readonly defaultTtlMs: number;
  private readonly maxSize: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private counters = { hits: 0, misses: 0, evictions: 0, expired: 0 };

  constructor(options: TtlCacheOptions) {
    if (options.maxSize < 1) throw new RangeError('TtlCache maxSize must be at least 1');
    this.defaultTtlMs = options.defaultTtlSeconds * 1000;
    this.maxSize = options.maxSize;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.counters.misses += 1;
      return undefined;
    }

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.counters.misses += 1;
      this.counters.expired += 1;
      return undefined;
    }

    entry.hitCount += 1;
    this.counters.hits += 1;
    return entry.value;
  }

  set(key: string, value: V, ttlSeconds?: number): void {
    const now = this.now();
    const ttlMs = ttlSeconds === undefined ? this.defaultTtlMs : ttlSeconds * 1000;

    if (!this.entries.has(key) && this.entries.size >= this.maxSize) {
      this.makeRoom(now);
    }

    this.entries.set(key, { value, expiresAt: now + ttlMs, hitCount: 0, createdAt: now });
  }

  /**
   * Read-through lookup. Concurrent misses for the same key share one load.
   */
  async getOrLoad(key: string, loader: () => Promise<V>, ttlSeconds?: number): Promise<V> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const inFlight = this.loading.get(key);
    if (inFlight) return inFlight.promise;

    const token = Symbol(key);
    const isCurrent = (): boolean => this.loading.get(key)?.token === token;
    const promise = Promise.resolve()
      .then(loader)
      .then((value) => {
        if (isCurrent()) this.set(key, value, ttlSeconds);
        return value;
      })
      .finally(() => {
        if (isCurrent()) this.loading.delete(key);
      });

    this.loading.set(key, { promise, token });
    return promise;
  }

  invalidate(key: string): boolean {
    this.loading.delete(key);
    return this.entries.delete(key);
  }

  /** Remove every key matching the glob. Returns the number of cached entries removed. */
  invalidatePattern(glob: string): number {
    const pattern = globToRegExp(glob);
    for (const key of this.loading.keys()) {
      if (pattern.test(key)) this.loading.delete(key);
    }

    let removed = 0;
    for (const key of this.entries.keys()) {
      if (pattern.test(key)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  cleanupExpired(now: number = this.now()): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    this.counters.expired += removed;
    if (removed > 0) logger.debug({ removed, remaining: this.entries.size }, 'Expired cache entries removed');
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.loading.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): TtlCacheStats {
    return { entries: this.entries.size, ...this.counters };
  }

  /** Start the background expiry sweep. The timer never keeps the process alive. */
  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.cleanupExpired();
    }, this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private makeRoom(now: number): void {
    if (this.cleanupExpired(now) > 0) return;

    let victimKey: string | null = null;
    let victim: CacheEntry<V> | null = null;
    for (const [key, entry] of this.entries) {
      if (
        victim === null
        || entry.hitCount < victim.hitCount
        || (entry.hitCount === victim.hitCount && entry.createdAt < victim.createdAt)
      ) {
        victimKey = key;
        victim = entry;
      }
    }

    if (victimKey !== null) {
      this.entries.delete(victimKey);
      this.counters.evictions += 1;
      logger.debug({ key: victimKey, hitCount: victim?.hitCount }, 'Cache entry evicted');
    }
  }
}
