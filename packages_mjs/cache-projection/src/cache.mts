/**
 * Projection cache manager
 */

import pino from 'pino';
import type { JsonValue } from '@fieldcast/field-projection';
import type {
  CachedDocument,
  ProjectionCacheConfig,
  ProjectionCacheStore,
  PutOptions,
  ProjectionCacheEvent,
  ProjectionCacheEventListener,
} from './types.mjs';
import { CacheKey, extractPathFromKey } from './key.mjs';
import { createCachedDocument, isExpired } from './entry.mjs';
import { generateEtag, matchesIfNoneMatch, isNotModifiedSince } from './validators.mjs';
import { buildPathPattern, hasPlaceholders, resolvePathVariables } from './pattern.mjs';
import { MemoryCacheStore } from './stores/memory.mjs';

const defaultLogger = pino({
  name: 'cache-projection',
  level: process.env.LOG_LEVEL ?? 'info',
});

/**
 * Default projection cache configuration
 */
export const DEFAULT_PROJECTION_CACHE_CONFIG: Required<ProjectionCacheConfig> = {
  enabled: true,
  defaultTtlMs: 60000,
  collectionTtlMs: 10000,
  maxEntries: 10000,
  hardMaxTtlMs: 120000, // 2 x defaultTtlMs
  conditional: true,
  manualEviction: true,
};

/**
 * Merge user config with defaults. An unset hard cap follows the merged
 * default TTL.
 */
export function mergeProjectionCacheConfig(
  config?: ProjectionCacheConfig
): Required<ProjectionCacheConfig> {
  if (!config) {
    return { ...DEFAULT_PROJECTION_CACHE_CONFIG };
  }

  const defaultTtlMs = config.defaultTtlMs ?? DEFAULT_PROJECTION_CACHE_CONFIG.defaultTtlMs;

  return {
    enabled: config.enabled ?? DEFAULT_PROJECTION_CACHE_CONFIG.enabled,
    defaultTtlMs,
    collectionTtlMs: config.collectionTtlMs ?? DEFAULT_PROJECTION_CACHE_CONFIG.collectionTtlMs,
    maxEntries: config.maxEntries ?? DEFAULT_PROJECTION_CACHE_CONFIG.maxEntries,
    hardMaxTtlMs: config.hardMaxTtlMs ?? defaultTtlMs * 2,
    conditional: config.conditional ?? DEFAULT_PROJECTION_CACHE_CONFIG.conditional,
    manualEviction: config.manualEviction ?? DEFAULT_PROJECTION_CACHE_CONFIG.manualEviction,
  };
}

/**
 * ProjectionCache - holds full, unfiltered documents per request identity
 *
 * Every projection of a resource is served from the same entry, so a new
 * field selection never refetches the document. Entries carry an ETag and a
 * last-modified time for conditional requests.
 *
 * @example
 * const cache = new ProjectionCache({ defaultTtlMs: 30000 });
 * const key = CacheKey.of('GET', '/users/1');
 *
 * const hit = await cache.get(key);
 * if (!hit) {
 *   await cache.put(key, await loadUser(1));
 * }
 *
 * // After a write
 * await cache.evictByPathPattern('/users/{id}');
 */
export class ProjectionCache {
  private readonly config: Required<ProjectionCacheConfig>;
  private readonly store: ProjectionCacheStore;
  private readonly logger: pino.BaseLogger;
  private readonly listeners: Set<ProjectionCacheEventListener> = new Set();

  constructor(config?: ProjectionCacheConfig, store?: ProjectionCacheStore, logger?: pino.BaseLogger) {
    this.config = mergeProjectionCacheConfig(config);
    this.store =
      store ??
      new MemoryCacheStore({
        maxEntries: this.config.maxEntries,
        hardMaxTtlMs: this.config.hardMaxTtlMs,
      });
    this.logger = logger ?? defaultLogger;
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  get conditional(): boolean {
    return this.config.conditional;
  }

  /**
   * Look up a live entry. Expired entries are removed on sight.
   */
  async get(key: CacheKey): Promise<CachedDocument | null> {
    if (!this.config.enabled) {
      return null;
    }

    const entry = await this.store.get(key.value);
    if (!entry) {
      this.emit({ type: 'cache:miss', key: key.value, timestamp: Date.now() });
      return null;
    }

    if (isExpired(entry)) {
      await this.store.delete(key.value);
      this.logger.debug({ key: key.value }, 'Cache entry expired');
      this.emit({ type: 'cache:expire', key: key.value, timestamp: Date.now() });
      return null;
    }

    this.emit({ type: 'cache:hit', key: key.value, timestamp: Date.now() });
    return entry;
  }

  /**
   * Store the full document. TTL: explicit `ttlMs` when > 0, else the
   * collection TTL for collections, else the default TTL.
   */
  async put(key: CacheKey, document: JsonValue, options: PutOptions = {}): Promise<CachedDocument | null> {
    if (!this.config.enabled) {
      return null;
    }

    const ttlMs = this.effectiveTtl(options);
    const now = Date.now();
    const entry = createCachedDocument({
      document,
      ttlMs,
      cachedAt: now,
      ...(this.config.conditional && { etag: generateEtag(document), lastModified: now }),
    });

    await this.store.set(key.value, entry);
    this.logger.debug({ key: key.value, ttlMs }, 'Cached response');
    this.emit({
      type: 'cache:store',
      key: key.value,
      timestamp: now,
      metadata: { ttlMs, expiresAt: entry.expiresAt },
    });

    return entry;
  }

  /**
   * Whether the client's If-None-Match value matches the stored ETag
   */
  async validateEtag(key: CacheKey, clientEtag: string | null | undefined): Promise<boolean> {
    if (!this.config.conditional || !clientEtag) {
      return false;
    }
    const entry = await this.get(key);
    if (!entry?.etag) {
      return false;
    }
    return matchesIfNoneMatch(entry.etag, clientEtag);
  }

  /**
   * Whether the client's copy is not older than the stored entry
   */
  async validateLastModified(key: CacheKey, clientTimestamp: number | Date | null | undefined): Promise<boolean> {
    if (!this.config.conditional || clientTimestamp === null || clientTimestamp === undefined) {
      return false;
    }
    const entry = await this.get(key);
    if (entry?.lastModified === undefined) {
      return false;
    }
    const client = clientTimestamp instanceof Date ? clientTimestamp.getTime() : clientTimestamp;
    return isNotModifiedSince(entry.lastModified, client);
  }

  /**
   * Remove one entry
   */
  async evict(key: CacheKey): Promise<boolean> {
    if (!this.config.enabled) {
      return false;
    }
    const removed = await this.store.delete(key.value);
    if (removed) {
      this.logger.debug({ key: key.value }, 'Evicted cache entry');
      this.emit({ type: 'cache:evict', key: key.value, timestamp: Date.now() });
    }
    return removed;
  }

  /**
   * Remove entries whose path matches a template.
   * A template without placeholders removes only its GET and HEAD entries.
   *
   * @returns number of entries removed
   */
  async evictByPathPattern(template: string): Promise<number> {
    if (!this.config.enabled || !this.config.manualEviction) {
      return 0;
    }

    if (!hasPlaceholders(template)) {
      let removed = 0;
      for (const method of ['GET', 'HEAD']) {
        if (await this.evict(CacheKey.of(method, template))) {
          removed++;
        }
      }
      return removed;
    }

    const pattern = buildPathPattern(template);
    let removed = 0;

    for (const key of await this.store.keys()) {
      if (!pattern.test(extractPathFromKey(key))) {
        continue;
      }
      if (await this.store.delete(key)) {
        removed++;
        this.logger.debug({ key, template }, 'Evicted by pattern');
        this.emit({ type: 'cache:evict', key, timestamp: Date.now(), metadata: { template } });
      }
    }

    return removed;
  }

  /**
   * Resolve each template against route params, then evict by pattern
   */
  async evictPaths(
    templates: readonly string[],
    params?: Readonly<Record<string, unknown>> | null
  ): Promise<number> {
    let removed = 0;
    for (const template of templates) {
      removed += await this.evictByPathPattern(resolvePathVariables(template, params));
    }
    return removed;
  }

  async evictAll(): Promise<void> {
    await this.store.clear();
    this.logger.debug('Evicted all cache entries');
  }

  async size(): Promise<number> {
    return this.store.size();
  }

  /**
   * Add event listener
   */
  on(listener: ProjectionCacheEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Remove event listener
   */
  off(listener: ProjectionCacheEventListener): void {
    this.listeners.delete(listener);
  }

  private emit(event: ProjectionCacheEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.warn({ err: error, event: event.type }, 'Cache event listener failed');
      }
    }
  }

  private effectiveTtl(options: PutOptions): number {
    if (options.ttlMs !== undefined && options.ttlMs > 0) {
      return options.ttlMs;
    }
    return options.collection ? this.config.collectionTtlMs : this.config.defaultTtlMs;
  }

  /**
   * Close the cache and release resources
   */
  async close(): Promise<void> {
    await this.store.close();
    this.listeners.clear();
  }
}

/**
 * Create a projection cache instance
 */
export function createProjectionCache(
  config?: ProjectionCacheConfig,
  store?: ProjectionCacheStore,
  logger?: pino.BaseLogger
): ProjectionCache {
  return new ProjectionCache(config, store, logger);
}
