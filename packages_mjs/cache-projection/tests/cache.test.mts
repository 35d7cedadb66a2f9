/**
 * Tests for ProjectionCache
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import pino from 'pino';
import {
  ProjectionCache,
  createProjectionCache,
  DEFAULT_PROJECTION_CACHE_CONFIG,
  mergeProjectionCacheConfig,
} from '../src/cache.mjs';
import { CacheKey } from '../src/key.mjs';
import { MemoryCacheStore } from '../src/stores/memory.mjs';
import type { ProjectionCacheConfig, ProjectionCacheEvent } from '../src/types.mjs';

const logger = pino({ level: 'silent' });

function makeCache(config?: ProjectionCacheConfig): ProjectionCache {
  return new ProjectionCache(config, undefined, logger);
}

const get = (path: string, query?: string, user?: string): CacheKey => CacheKey.of('GET', path, query, user);

describe('mergeProjectionCacheConfig', () => {
  it('should return defaults without config', () => {
    expect(mergeProjectionCacheConfig()).toEqual(DEFAULT_PROJECTION_CACHE_CONFIG);
    expect(DEFAULT_PROJECTION_CACHE_CONFIG.defaultTtlMs).toBe(60000);
    expect(DEFAULT_PROJECTION_CACHE_CONFIG.collectionTtlMs).toBe(10000);
    expect(DEFAULT_PROJECTION_CACHE_CONFIG.hardMaxTtlMs).toBe(120000);
  });

  it('should derive the hard cap from the default TTL', () => {
    expect(mergeProjectionCacheConfig({ defaultTtlMs: 5000 }).hardMaxTtlMs).toBe(10000);
  });

  it('should keep an explicit hard cap', () => {
    expect(mergeProjectionCacheConfig({ defaultTtlMs: 5000, hardMaxTtlMs: 7000 }).hardMaxTtlMs).toBe(7000);
  });

  it('should override individual fields', () => {
    const merged = mergeProjectionCacheConfig({ conditional: false, maxEntries: 5 });
    expect(merged.conditional).toBe(false);
    expect(merged.maxEntries).toBe(5);
    expect(merged.manualEviction).toBe(true);
  });
});

describe('ProjectionCache', () => {
  let cache: ProjectionCache;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T12:00:00.000Z'));
    cache = makeCache();
  });

  afterEach(async () => {
    await cache.close();
    vi.useRealTimers();
  });

  describe('get/put', () => {
    it('should return the stored document', async () => {
      const key = get('/users/1');
      await cache.put(key, { id: 1, name: 'Test' });

      expect((await cache.get(key))?.document).toEqual({ id: 1, name: 'Test' });
    });

    it('should return null for a missing key', async () => {
      expect(await cache.get(get('/nonexistent'))).toBeNull();
    });

    it('should find an entry regardless of query order and method case', async () => {
      await cache.put(CacheKey.of('get', '/users', 'b=2&a=1'), [{ id: 1 }]);
      expect(await cache.get(CacheKey.of('GET', '/users/', 'a=1&b=2'))).not.toBeNull();
    });

    it('should return the stored entry with validators', async () => {
      const entry = await cache.put(get('/users/1'), { id: 1 });

      expect(entry?.etag).toMatch(/^[0-9a-f]{32}$/);
      expect(entry?.lastModified).toBe(Date.parse('2024-03-01T12:00:00.000Z'));
      expect(entry?.cachedAt).toBe(Date.parse('2024-03-01T12:00:00.000Z'));
      expect(entry?.expiresAt).toBe(Date.parse('2024-03-01T12:01:00.000Z'));
    });

    it('should keep users apart', async () => {
      await cache.put(get('/me', undefined, 'alice'), { name: 'alice' });
      await cache.put(get('/me', undefined, 'bob'), { name: 'bob' });

      expect((await cache.get(get('/me', undefined, 'alice')))?.document).toEqual({ name: 'alice' });
      expect(await cache.get(get('/me'))).toBeNull();
    });
  });

  describe('TTL', () => {
    it('should expire entries after the default TTL', async () => {
      const key = get('/users/1');
      await cache.put(key, { id: 1 });

      vi.advanceTimersByTime(59999);
      expect(await cache.get(key)).not.toBeNull();

      vi.advanceTimersByTime(1);
      expect(await cache.get(key)).toBeNull();
      expect(await cache.size()).toBe(0);
    });

    it('should use the collection TTL for collections', async () => {
      const key = get('/users');
      const entry = await cache.put(key, [{ id: 1 }], { collection: true });
      expect(entry?.expiresAt).toBe(Date.now() + 10000);

      vi.advanceTimersByTime(10000);
      expect(await cache.get(key)).toBeNull();
    });

    it('should prefer an explicit positive TTL', async () => {
      const key = get('/users/1');
      await cache.put(key, { id: 1 }, { ttlMs: 500, collection: true });

      vi.advanceTimersByTime(499);
      expect(await cache.get(key)).not.toBeNull();
      vi.advanceTimersByTime(1);
      expect(await cache.get(key)).toBeNull();
    });

    it('should fall back to the policy TTL for zero or negative values', async () => {
      const zero = await cache.put(get('/a'), 1, { ttlMs: 0 });
      const negative = await cache.put(get('/b'), 1, { ttlMs: -1, collection: true });

      expect(zero?.expiresAt).toBe(Date.now() + 60000);
      expect(negative?.expiresAt).toBe(Date.now() + 10000);
    });

    it('should cap any entry at the hard lifetime', async () => {
      await cache.close();
      cache = makeCache({ defaultTtlMs: 1000 });

      const key = get('/users/1');
      await cache.put(key, { id: 1 }, { ttlMs: 5000 });

      vi.advanceTimersByTime(1999);
      expect(await cache.get(key)).not.toBeNull();
      vi.advanceTimersByTime(1);
      expect(await cache.get(key)).toBeNull();
    });
  });

  describe('disabled', () => {
    beforeEach(async () => {
      await cache.close();
      cache = makeCache({ enabled: false });
    });

    it('should not store anything', async () => {
      expect(await cache.put(get('/users/1'), { id: 1 })).toBeNull();
      expect(await cache.size()).toBe(0);
      expect(cache.enabled).toBe(false);
    });

    it('should always miss', async () => {
      expect(await cache.get(get('/users/1'))).toBeNull();
    });

    it('should not evict by pattern', async () => {
      expect(await cache.evictByPathPattern('/users/{id}')).toBe(0);
    });
  });

  describe('validateEtag', () => {
    const key = get('/users/1');
    let etag: string;

    beforeEach(async () => {
      const entry = await cache.put(key, { id: 1 });
      etag = entry?.etag ?? '';
    });

    it('should match the stored tag in bare, quoted and weak forms', async () => {
      expect(await cache.validateEtag(key, etag)).toBe(true);
      expect(await cache.validateEtag(key, `"${etag}"`)).toBe(true);
      expect(await cache.validateEtag(key, `W/"${etag}"`)).toBe(true);
    });

    it('should match a member of a list and the wildcard', async () => {
      expect(await cache.validateEtag(key, `"other", "${etag}"`)).toBe(true);
      expect(await cache.validateEtag(key, '*')).toBe(true);
    });

    it('should reject a different tag', async () => {
      expect(await cache.validateEtag(key, 'wrong-etag')).toBe(false);
    });

    it('should reject absent tags and missing entries', async () => {
      expect(await cache.validateEtag(key, null)).toBe(false);
      expect(await cache.validateEtag(get('/users/2'), '*')).toBe(false);
    });

    it('should reject everything with conditional validators off', async () => {
      await cache.close();
      cache = makeCache({ conditional: false });
      const entry = await cache.put(key, { id: 1 });

      expect(entry?.etag).toBeUndefined();
      expect(entry?.lastModified).toBeUndefined();
      expect(await cache.validateEtag(key, '*')).toBe(false);
      expect(await cache.validateLastModified(key, Date.now())).toBe(false);
    });
  });

  describe('validateLastModified', () => {
    const key = get('/users/1');

    beforeEach(async () => {
      vi.setSystemTime(new Date('2024-03-01T12:00:00.400Z'));
      await cache.put(key, { id: 1 });
    });

    it('should accept a client time in the same second or later', async () => {
      expect(await cache.validateLastModified(key, new Date('2024-03-01T12:00:00.000Z'))).toBe(true);
      expect(await cache.validateLastModified(key, Date.parse('2024-03-01T12:05:00.000Z'))).toBe(true);
    });

    it('should reject an older client time', async () => {
      expect(await cache.validateLastModified(key, new Date('2024-03-01T11:59:59.000Z'))).toBe(false);
    });

    it('should reject absent values and missing entries', async () => {
      expect(await cache.validateLastModified(key, null)).toBe(false);
      expect(await cache.validateLastModified(get('/users/2'), Date.now())).toBe(false);
    });
  });

  describe('evict', () => {
    it('should remove one entry', async () => {
      const key = get('/users/1');
      await cache.put(key, { id: 1 });

      expect(await cache.evict(key)).toBe(true);
      expect(await cache.get(key)).toBeNull();
      expect(await cache.evict(key)).toBe(false);
    });

    it('should clear everything with evictAll', async () => {
      await cache.put(get('/users/1'), { id: 1 });
      await cache.put(get('/users/2'), { id: 2 });
      await cache.evictAll();

      expect(await cache.size()).toBe(0);
    });
  });

  describe('evictByPathPattern', () => {
    beforeEach(async () => {
      await cache.put(get('/users'), []);
      await cache.put(get('/users/1'), { id: 1 });
      await cache.put(CacheKey.of('HEAD', '/users/1'), { id: 1 });
      await cache.put(get('/users/1', 'expand=true'), { id: 1 });
      await cache.put(get('/users/2'), { id: 2 });
      await cache.put(get('/users/3', undefined, 'alice'), { id: 3 });
      await cache.put(get('/users/1/orders'), []);
      await cache.put(get('/profiles/2'), { id: 2 });
    });

    it('should remove only the GET and HEAD entries for a literal path', async () => {
      expect(await cache.evictByPathPattern('/users/1')).toBe(2);

      expect(await cache.get(get('/users/1'))).toBeNull();
      expect(await cache.get(CacheKey.of('HEAD', '/users/1'))).toBeNull();
      expect(await cache.get(get('/users/1', 'expand=true'))).not.toBeNull();
      expect(await cache.get(get('/users/2'))).not.toBeNull();
    });

    it('should normalize a literal path', async () => {
      expect(await cache.evictByPathPattern('users/2/')).toBe(1);
      expect(await cache.get(get('/users/2'))).toBeNull();
    });

    it('should remove every single-segment match for a placeholder', async () => {
      expect(await cache.evictByPathPattern('/users/{id}')).toBe(5);

      expect(await cache.get(get('/users/2'))).toBeNull();
      expect(await cache.get(get('/users/1', 'expand=true'))).toBeNull();
      expect(await cache.get(get('/users/3', undefined, 'alice'))).toBeNull();
      expect(await cache.get(get('/users'))).not.toBeNull();
      expect(await cache.get(get('/users/1/orders'))).not.toBeNull();
      expect(await cache.get(get('/profiles/2'))).not.toBeNull();
    });

    it.each(['/users/{user-id}', '/users/{1id}', '/users/{???}'])(
      'should match with the placeholder %s',
      async (template) => {
        expect(await cache.evictByPathPattern(template)).toBe(5);
        expect(await cache.get(get('/profiles/2'))).not.toBeNull();
      }
    );

    it('should do nothing with manual eviction off', async () => {
      await cache.close();
      cache = makeCache({ manualEviction: false });
      await cache.put(get('/users/1'), { id: 1 });

      expect(await cache.evictByPathPattern('/users/{id}')).toBe(0);
      expect(await cache.evictByPathPattern('/users/1')).toBe(0);
      expect(await cache.size()).toBe(1);
    });
  });

  describe('evictPaths', () => {
    beforeEach(async () => {
      await cache.put(get('/users'), []);
      await cache.put(get('/users/1'), { id: 1 });
      await cache.put(get('/users/2'), { id: 2 });
      await cache.put(get('/users/1/orders/9'), {});
      await cache.put(get('/users/1/orders/8'), {});
    });

    it('should resolve params before evicting', async () => {
      expect(await cache.evictPaths(['/users/{id}', '/users'], { id: 1 })).toBe(2);

      expect(await cache.get(get('/users/1'))).toBeNull();
      expect(await cache.get(get('/users'))).toBeNull();
      expect(await cache.get(get('/users/2'))).not.toBeNull();
    });

    it('should keep unresolved placeholders as patterns', async () => {
      expect(await cache.evictPaths(['/users/{id}/orders/{orderId}'], { id: '1' })).toBe(2);
      expect(await cache.size()).toBe(3);
    });
  });

  describe('events', () => {
    it('should emit store, hit, miss and evict', async () => {
      const events: ProjectionCacheEvent[] = [];
      cache.on((event) => events.push(event));

      const key = get('/users/1');
      await cache.get(key);
      await cache.put(key, { id: 1 });
      await cache.get(key);
      await cache.evict(key);

      expect(events.map((e) => e.type)).toEqual(['cache:miss', 'cache:store', 'cache:hit', 'cache:evict']);
      expect(events[1].metadata).toEqual({ ttlMs: 60000, expiresAt: Date.now() + 60000 });
    });

    it('should emit expire when an expired entry is read', async () => {
      const events: string[] = [];
      cache.on((event) => events.push(event.type));

      await cache.put(get('/users/1'), { id: 1 }, { ttlMs: 100 });
      vi.advanceTimersByTime(100);
      await cache.get(get('/users/1'));

      expect(events).toEqual(['cache:store', 'cache:expire']);
    });

    it('should stop delivering after unsubscribe', async () => {
      const listener = vi.fn();
      const unsubscribe = cache.on(listener);
      unsubscribe();
      await cache.get(get('/users/1'));

      cache.on(listener);
      cache.off(listener);
      await cache.get(get('/users/1'));

      expect(listener).not.toHaveBeenCalled();
    });

    it('should keep working when a listener throws', async () => {
      cache.on(() => {
        throw new Error('listener failed');
      });

      await cache.put(get('/users/1'), { id: 1 });
      expect(await cache.get(get('/users/1'))).not.toBeNull();
    });
  });

  describe('store injection', () => {
    it('should use the given store', async () => {
      const store = new MemoryCacheStore({ maxEntries: 1 });
      const custom = createProjectionCache({}, store, logger);

      await custom.put(get('/a'), 1);
      await custom.put(get('/b'), 2);

      expect(await store.keys()).toEqual(['GET:/b']);
      await custom.close();
    });
  });
});
