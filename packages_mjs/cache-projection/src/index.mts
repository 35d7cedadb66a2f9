/**
 * @fieldcast/cache-projection
 *
 * Response cache for field projection. Holds the full document per request
 * identity so any field selection can be served from one entry:
 * - Normalized cache keys (`METHOD:/path?sorted&query[@user]`)
 * - Per-entry TTL with separate collection TTL and a hard lifetime cap
 * - ETag / Last-Modified validators for conditional requests
 * - Exact and `{placeholder}` path-template eviction
 * - Pluggable storage (in-memory LRU)
 *
 * @example
 * ```typescript
 * import { ProjectionCache, CacheKey } from '@fieldcast/cache-projection';
 *
 * const cache = new ProjectionCache({ defaultTtlMs: 60000, collectionTtlMs: 10000 });
 * const key = CacheKey.of('GET', '/users/1', 'expand=true');
 *
 * const entry = (await cache.get(key)) ?? (await cache.put(key, await loadUser(1)));
 *
 * if (await cache.validateEtag(key, request.headers['if-none-match'])) {
 *   // 304
 * }
 *
 * await cache.evictByPathPattern('/users/{id}');
 * ```
 */

// Types
export type {
  CachedDocument,
  ProjectionCacheStore,
  ProjectionCacheConfig,
  PutOptions,
  ProjectionCacheEventType,
  ProjectionCacheEvent,
  ProjectionCacheEventListener,
} from './types.mjs';

// Cache
export {
  ProjectionCache,
  createProjectionCache,
  DEFAULT_PROJECTION_CACHE_CONFIG,
  mergeProjectionCacheConfig,
} from './cache.mjs';

// Keys
export { CacheKey, normalizePath, normalizeQuery, extractPathFromKey } from './key.mjs';

// Entries
export { createCachedDocument, isExpired, remainingTtl, type CachedDocumentInit } from './entry.mjs';

// Validators
export {
  canonicalJson,
  generateEtag,
  normalizeEtag,
  matchesIfNoneMatch,
  formatEtag,
  parseHttpDate,
  formatHttpDate,
  isNotModifiedSince,
} from './validators.mjs';

// Path patterns
export {
  hasPlaceholders,
  sanitizeGroupName,
  escapeRegExp,
  buildPathPattern,
  resolvePathVariables,
} from './pattern.mjs';

// Stores
export {
  MemoryCacheStore,
  createMemoryCacheStore,
  type MemoryCacheStoreOptions,
  type MemoryCacheStats,
} from './stores/index.mjs';
