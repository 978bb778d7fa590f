export interface CacheEntry<T> {
  value: T;
  insertedAt: number;
}

export interface CacheConfig {
  /** Logical partition name, used in logs and stats. */
  namespace: string;
  /** Time-to-live for every entry in this cache, in milliseconds. */
  ttlMs: number;
  maxSize: number;
}

export type CacheLoader<T> = (key: string) => Promise<T | null | undefined>;

export interface CacheProvider<T> {
  get(key: string): T | null;
  put(key: string, value: T): void;
  getOrLoad(key: string, loader: CacheLoader<T>): Promise<T | null>;
  invalidate(key: string): boolean;
  invalidateAll(): void;
  size(): number;
  /** Drop expired entries and return how many were removed. */
  sweepExpired(): number;
  getStats(): CacheStats;
}

export interface CacheStats {
  namespace: string;
  hits: number;
  misses: number;
  hitRate: number;
  entries: number;
  maxSize: number;
  evictions: number;
}
