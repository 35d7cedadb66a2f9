/**
 * Cache stores for projection caching
 */

export {
  MemoryCacheStore,
  createMemoryCacheStore,
  type MemoryCacheStoreOptions,
  type MemoryCacheStats,
} from './memory.mjs';
