/**
 * Cache client factory - creates and configures cache instances.
 */

import { createMemoryCache, createNoopCache, createRedisCache } from './adapters/index.js';
import { createKeyBuilder, type KeyBuilder } from './key-builder.js';
import { createSilentCache } from './wrappers/index.js';

import type { CachePort, SilentCachePort } from './ports.js';
import type { AppConfig } from '../config/env.js';
import type { Logger } from 'pino';

export type CacheConfig = AppConfig['cache'] & {
  /** Redis connection URL (required if backend is 'redis') */
  redisUrl: string | undefined;
};

export interface CacheClient {
  /** Silent cache port for application use */
  cache: SilentCachePort;
  /** Key builder for generating cache keys */
  keyBuilder: KeyBuilder;
  /** Low-level cache port (for testing/advanced use) */
  rawCache: CachePort;
}

/**
 * Build the cache configuration from the application config.
 */
export const createCacheConfig = (config: AppConfig): CacheConfig => ({
  ...config.cache,
  redisUrl: config.redis.url,
});

export interface InitCacheOptions {
  config: CacheConfig;
  logger: Logger;
}

/**
 * Initialize the cache infrastructure.
 * Returns a cache client with silent degradation.
 */
export const initCache = (options: InitCacheOptions): CacheClient => {
  const { config, logger } = options;

  let rawCache: CachePort;

  switch (config.backend) {
    case 'disabled':
      logger.info('[Cache] Using NoOp cache (disabled)');
      rawCache = createNoopCache();
      break;

    case 'redis':
      if (config.redisUrl === undefined || config.redisUrl === '') {
        logger.warn('[Cache] Redis URL not configured, falling back to memory cache');
        rawCache = createMemoryCache({
          maxEntries: config.memoryMaxEntries,
          defaultTtlMs: config.defaultTtlMs,
        });
      } else {
        logger.info(
          { redisUrl: config.redisUrl.replace(/\/\/.*@/, '//<redacted>@') },
          '[Cache] Using Redis cache'
        );
        rawCache = createRedisCache({
          url: config.redisUrl,
          keyPrefix: config.keyPrefix,
          defaultTtlMs: config.defaultTtlMs,
        });
      }
      break;

    case 'memory':
      logger.info(
        { maxEntries: config.memoryMaxEntries, defaultTtlMs: config.defaultTtlMs },
        '[Cache] Using in-memory LRU cache'
      );
      rawCache = createMemoryCache({
        maxEntries: config.memoryMaxEntries,
        defaultTtlMs: config.defaultTtlMs,
      });
      break;
  }

  return {
    cache: createSilentCache(rawCache, { logger }),
    keyBuilder: createKeyBuilder(),
    rawCache,
  };
};
