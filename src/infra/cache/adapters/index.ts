export { createMemoryCache, type MemoryCacheOptions } from './memory-cache.js';
export { createNoopCache } from './noop-cache.js';
export {
  createRedisCache,
  createRedisCacheFromClient,
  type RedisCacheOptions,
  type RedisCacheClient,
} from './redis-cache.js';
