import { Logger } from '@nestjs/common';
import {
  CacheConfig,
  CacheEntry,
  CacheLoader,
  CacheProvider,
  CacheStats,
} from './cache.interface';
import { Clock, systemClock } from './clock';

/**
 * In-memory cache with a fixed TTL per instance and a bounded entry count.
 *
 * The backing `Map` keeps keys in recency order: a hit re-inserts its key at
 * the end, so the first key is always the least recently used one and is the
 * one evicted when `maxSize` is exceeded. Expired entries are dropped lazily
 * on read, or in bulk through {@link sweepExpired}.
 *
 * All mutation is synchronous, so callers on the event loop never observe a
 * half-applied update.
 */
export class TtlCache<T> implements CacheProvider<T> {
  private readonly logger: Logger;
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, Promise<T | null>>();
  private stats = {
    hits: 0,
    misses: 0,
    evictions: 0,
  };

  constructor(
    private readonly config: CacheConfig,
    private readonly clock: Clock = systemClock,
  ) {
    if (config.ttlMs <= 0) {
      throw new Error(`Cache TTL must be positive, got ${config.ttlMs}`);
    }
    if (config.maxSize < 1) {
      throw new Error(`Cache max size must be at least 1, got ${config.maxSize}`);
    }
    this.logger = new Logger(`${TtlCache.name}:${config.namespace}`);
  }

  get namespace(): string {
    return this.config.namespace;
  }

  get(key: string): T | null {
    const entry = this.entries.get(key);

    if (!entry) {
      this.stats.misses++;
      this.logger.debug(`Cache miss for key: ${key}`);
      return null;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.stats.misses++;
      this.logger.debug(`Cache entry expired for key: ${key}`);
      return null;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.stats.hits++;
    this.logger.debug(`Cache hit for key: ${key}`);
    return entry.value;
  }

  put(key: string, value: T): void {
    this.entries.delete(key);
    this.entries.set(key, { value, insertedAt: this.clock() });

    while (this.entries.size > this.config.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.stats.evictions++;
      this.logger.debug(`Evicted least recently used key: ${oldest.value}`);
    }
  }

  /**
   * Return the cached value, or run `loader` and cache what it returns.
   * Null results and loader errors are never cached. Concurrent misses on the
   * same key share a single loader call. A load still running when its key is
   * invalidated returns its result to its callers but does not cache it.
   */
  getOrLoad(key: string, loader: CacheLoader<T>): Promise<T | null> {
    const cached = this.get(key);
    if (cached !== null) {
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    // loader runs in a later microtask, after the in-flight slot is taken
    const load: Promise<T | null> = Promise.resolve()
      .then(() => loader(key))
      .then((loaded) => {
        if (loaded === null || loaded === undefined) {
          return null;
        }
        // invalidated mid-load: the result is stale
        if (this.inFlight.get(key) === load) {
          this.put(key, loaded);
        }
        return loaded;
      })
      .finally(() => {
        if (this.inFlight.get(key) === load) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, load);
    return load;
  }

  invalidate(key: string): boolean {
    const pending = this.inFlight.delete(key);
    return this.entries.delete(key) || pending;
  }

  invalidateAll(): void {
    const size = this.entries.size;
    this.entries.clear();
    this.inFlight.clear();
    this.logger.log(`Cleared cache: ${size} entries removed`);
  }

  size(): number {
    return this.entries.size;
  }

  /**
   * Remove every expired entry. Returns the number removed.
   */
  sweepExpired(): number {
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      this.logger.debug(`Cleaned up ${removed} expired cache entries`);
    }

    return removed;
  }

  getStats(): CacheStats {
    const lookups = this.stats.hits + this.stats.misses;
    return {
      namespace: this.config.namespace,
      hits: this.stats.hits,
      misses: this.stats.misses,
      hitRate: lookups === 0 ? 0 : this.stats.hits / lookups,
      entries: this.entries.size,
      maxSize: this.config.maxSize,
      evictions: this.stats.evictions,
    };
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.clock() - entry.insertedAt >= this.config.ttlMs;
  }
}
