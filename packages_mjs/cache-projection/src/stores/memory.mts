/**
 * In-memory store for projection cache entries
 */

import type { CachedDocument, ProjectionCacheStore } from '../types.mjs';

/**
 * LRU cache entry
 */
interface LruEntry {
  entry: CachedDocument;
  writtenAt: number;
}

/**
 * In-memory cache store with LRU eviction and a hard lifetime cap.
 * Per-entry TTL is the cache manager's concern; this store only bounds the
 * entry count and drops anything older than `hardMaxTtlMs` since its write.
 */
export class MemoryCacheStore implements ProjectionCacheStore {
  private cache: Map<string, LruEntry> = new Map();
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  private readonly maxEntries: number;
  private readonly hardMaxTtlMs: number;
  private readonly cleanupIntervalMs: number;

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? 10000;
    this.hardMaxTtlMs = options.hardMaxTtlMs ?? 120000; // 2 minutes
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? 60000; // 1 minute

    this.startCleanup();
  }

  private startCleanup(): void {
    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, this.cleanupIntervalMs);

    // Unref to not prevent process exit
    if (this.cleanupInterval.unref) {
      this.cleanupInterval.unref();
    }
  }

  private isStale(lru: LruEntry, now: number): boolean {
    return lru.writtenAt + this.hardMaxTtlMs <= now;
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [key, lru] of [...this.cache.entries()]) {
      if (this.isStale(lru, now)) {
        this.cache.delete(key);
      }
    }
  }

  private evictIfNeeded(): void {
    while (this.cache.size >= this.maxEntries && this.cache.size > 0) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey === undefined) {
        return;
      }
      this.cache.delete(oldestKey);
    }
  }

  private lookup(key: string): LruEntry | null {
    const lru = this.cache.get(key);
    if (!lru) {
      return null;
    }
    if (this.isStale(lru, Date.now())) {
      this.cache.delete(key);
      return null;
    }
    return lru;
  }

  async get(key: string): Promise<CachedDocument | null> {
    const lru = this.lookup(key);
    if (!lru) {
      return null;
    }

    // Move to end for LRU
    this.cache.delete(key);
    this.cache.set(key, lru);

    return lru.entry;
  }

  async set(key: string, entry: CachedDocument): Promise<void> {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    }

    this.evictIfNeeded();
    this.cache.set(key, { entry, writtenAt: Date.now() });
  }

  async has(key: string): Promise<boolean> {
    return this.lookup(key) !== null;
  }

  async delete(key: string): Promise<boolean> {
    return this.cache.delete(key);
  }

  async clear(): Promise<void> {
    this.cache.clear();
  }

  async size(): Promise<number> {
    this.cleanup();
    return this.cache.size;
  }

  async keys(): Promise<string[]> {
    this.cleanup();
    return Array.from(this.cache.keys());
  }

  async close(): Promise<void> {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
  }

  /**
   * Get cache statistics
   */
  getStats(): MemoryCacheStats {
    return {
      entries: this.cache.size,
      maxEntries: this.maxEntries,
      hardMaxTtlMs: this.hardMaxTtlMs,
      utilizationPercent: (this.cache.size / this.maxEntries) * 100,
    };
  }
}

/**
 * Options for memory cache store
 */
export interface MemoryCacheStoreOptions {
  /** Maximum number of entries. Default: 10000 */
  maxEntries?: number;
  /** Lifetime cap from the time of write. Default: 120000 */
  hardMaxTtlMs?: number;
  /** Cleanup interval in milliseconds. Default: 60000 */
  cleanupIntervalMs?: number;
}

/**
 * Memory cache statistics
 */
export interface MemoryCacheStats {
  entries: number;
  maxEntries: number;
  hardMaxTtlMs: number;
  utilizationPercent: number;
}

/**
 * Create a memory cache store
 */
export function createMemoryCacheStore(options?: MemoryCacheStoreOptions): MemoryCacheStore {
  return new MemoryCacheStore(options);
}
