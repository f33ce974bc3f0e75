export { CacheManager, cacheKey, companySlug } from './cache-manager.js';
export type { CacheLookup, CacheManagerOptions, CacheSchema, LoadOptions } from './cache-manager.js';
export { MemoryCacheStore, FileCacheStore } from './cache-store.js';
export type { CacheEntry, CacheStore } from './cache-store.js';
