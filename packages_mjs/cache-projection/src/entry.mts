/**
 * Cache entry construction and expiry
 */

import type { JsonValue } from '@fieldcast/field-projection';
import type { CachedDocument } from './types.mjs';

export interface CachedDocumentInit {
  document: JsonValue;
  ttlMs: number;
  etag?: string;
  lastModified?: number;
  cachedAt?: number;
}

/**
 * Build a frozen entry. `expiresAt` is `cachedAt + ttlMs`.
 */
export function createCachedDocument(init: CachedDocumentInit): CachedDocument {
  const cachedAt = init.cachedAt ?? Date.now();
  const entry: CachedDocument = {
    document: init.document,
    cachedAt,
    expiresAt: cachedAt + Math.max(0, init.ttlMs),
    ...(init.etag !== undefined && { etag: init.etag }),
    ...(init.lastModified !== undefined && { lastModified: init.lastModified }),
  };
  return Object.freeze(entry);
}

export function isExpired(entry: CachedDocument, now: number = Date.now()): boolean {
  return now >= entry.expiresAt;
}

/**
 * Remaining lifetime in ms, never negative
 */
export function remainingTtl(entry: CachedDocument, now: number = Date.now()): number {
  return Math.max(0, entry.expiresAt - now);
}
