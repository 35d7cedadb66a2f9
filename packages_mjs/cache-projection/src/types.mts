/**
 * Types for the projection response cache
 */

import type { JsonValue } from '@fieldcast/field-projection';

/**
 * Full, unfiltered document held for one cache key
 */
export interface CachedDocument {
  /** Source document before any projection */
  readonly document: JsonValue;
  /** Hex digest of the document, when conditional validators are on */
  readonly etag?: string;
  /** Last-modified timestamp (Unix ms) */
  readonly lastModified?: number;
  /** When the entry was stored (Unix ms) */
  readonly cachedAt: number;
  /** When the entry stops being served (Unix ms) */
  readonly expiresAt: number;
}

/**
 * Cache store interface
 */
export interface ProjectionCacheStore {
  /**
   * Get an entry by key
   */
  get(key: string): Promise<CachedDocument | null>;

  /**
   * Store an entry
   */
  set(key: string, entry: CachedDocument): Promise<void>;

  /**
   * Check if a key exists
   */
  has(key: string): Promise<boolean>;

  /**
   * Delete an entry
   */
  delete(key: string): Promise<boolean>;

  /**
   * Remove every entry
   */
  clear(): Promise<void>;

  /**
   * Number of live entries
   */
  size(): Promise<number>;

  /**
   * Snapshot of live keys
   */
  keys(): Promise<string[]>;

  /**
   * Release timers and memory
   */
  close(): Promise<void>;
}

/**
 * Projection cache configuration
 */
export interface ProjectionCacheConfig {
  /** Serve and store cached documents. Default: true */
  enabled?: boolean;
  /** TTL for single resources. Default: 60000 */
  defaultTtlMs?: number;
  /** TTL for collection endpoints. Default: 10000 */
  collectionTtlMs?: number;
  /** Maximum number of entries before LRU eviction. Default: 10000 */
  maxEntries?: number;
  /** Upper bound on any entry's lifetime. Default: 2 x defaultTtlMs */
  hardMaxTtlMs?: number;
  /** Compute ETag / Last-Modified and answer conditional checks. Default: true */
  conditional?: boolean;
  /** Allow explicit and pattern eviction. Default: true */
  manualEviction?: boolean;
}

/**
 * Per-put TTL policy
 */
export interface PutOptions {
  /** Explicit TTL; used when > 0 */
  ttlMs?: number;
  /** Use the collection TTL when no explicit TTL is given */
  collection?: boolean;
}

/**
 * Cache event types
 */
export type ProjectionCacheEventType =
  | 'cache:hit'
  | 'cache:miss'
  | 'cache:store'
  | 'cache:expire'
  | 'cache:evict';

/**
 * Cache event
 */
export interface ProjectionCacheEvent {
  type: ProjectionCacheEventType;
  key: string;
  timestamp: number;
  metadata?: Record<string, unknown>;
}

/**
 * Event listener type
 */
export type ProjectionCacheEventListener = (event: ProjectionCacheEvent) => void;
