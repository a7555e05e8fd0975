/**
 * Cache Infrastructure
 *
 * A pluggable caching layer with silent degradation.
 * Cache failures never cause request failures.
 *
 * @example
 * ```typescript
 * const { cache, keyBuilder } = initCache({ config: createCacheConfig(appConfig), logger });
 * const invalidator = makeCacheInvalidator(cache, logger);
 *
 * const search = withCacheResult(repo.search.bind(repo), cache, {
 *   ttlMs: 300_000,
 *   keyGenerator: ([q]) =>
 *     keyBuilder.build(CacheNamespace.PEOPLE, 'search', q.term, q.page, q.limit),
 *   decode: decodePage,
 * });
 *
 * await invalidator.invalidate('person'); // clears people:* and dashboard:*
 * ```
 */

// Ports (interfaces)
export type { CachePort, SilentCachePort, CacheSetOptions, CacheStats } from './ports.js';
export { CacheError } from './ports.js';

// Key generation
export { CacheNamespace, createKeyBuilder, type KeyBuilder, type KeyPart } from './key-builder.js';
export { globToRegExp, matchesGlob } from './glob.js';

// Serialization
export { serialize, deserialize } from './serialization.js';

// Adapters
export {
  createNoopCache,
  createMemoryCache,
  createRedisCache,
  createRedisCacheFromClient,
  type MemoryCacheOptions,
  type RedisCacheOptions,
  type RedisCacheClient,
} from './adapters/index.js';

// Wrappers
export { createSilentCache, type SilentCacheOptions } from './wrappers/index.js';

// Read-through helpers
export { withCache, withCacheResult, type WithCacheOptions } from './with-cache.js';

// Invalidation
export {
  CACHE_INVALIDATION_PATTERNS,
  makeCacheInvalidator,
  noopCacheInvalidator,
  type CacheInvalidator,
  type CachedEntity,
} from './invalidation.js';

// Client factory
export {
  initCache,
  createCacheConfig,
  type CacheClient,
  type CacheConfig,
  type InitCacheOptions,
} from './client.js';
