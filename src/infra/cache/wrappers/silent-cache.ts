/**
 * Silent degradation wrapper for cache ports.
 * Errors are logged and swallowed - never propagated to callers.
 */

import type { CachePort, CacheSetOptions, CacheStats, SilentCachePort } from '../ports.js';
import type { Logger } from 'pino';

export interface SilentCacheOptions {
  /** Logger for recording cache errors */
  logger: Logger;
}

/**
 * Create a silent cache wrapper that swallows errors.
 * All cache failures are logged and treated as cache misses.
 */
export const createSilentCache = (
  cache: CachePort,
  options: SilentCacheOptions
): SilentCachePort => {
  const log = options.logger.child({ component: 'Cache' });

  return {
    async get(key: string): Promise<unknown> {
      const result = await cache.get(key);

      if (result.isErr()) {
        log.warn({ err: result.error, key }, `Cache get failed: ${result.error.message}`);
        return undefined;
      }

      return result.value;
    },

    async set(key: string, value: unknown, setOptions?: CacheSetOptions): Promise<void> {
      const result = await cache.set(key, value, setOptions);

      if (result.isErr()) {
        log.warn({ err: result.error, key }, `Cache set failed: ${result.error.message}`);
      }
    },

    async delete(key: string): Promise<boolean> {
      const result = await cache.delete(key);

      if (result.isErr()) {
        log.warn({ err: result.error, key }, `Cache delete failed: ${result.error.message}`);
        return false;
      }

      return result.value;
    },

    async has(key: string): Promise<boolean> {
      const result = await cache.has(key);

      if (result.isErr()) {
        log.warn({ err: result.error, key }, `Cache has failed: ${result.error.message}`);
        return false;
      }

      return result.value;
    },

    async clearByPattern(pattern: string): Promise<number> {
      const result = await cache.clearByPattern(pattern);

      if (result.isErr()) {
        log.warn(
          { err: result.error, pattern },
          `Cache clearByPattern failed: ${result.error.message}`
        );
        return 0;
      }

      return result.value;
    },

    async clear(): Promise<void> {
      const result = await cache.clear();

      if (result.isErr()) {
        log.warn({ err: result.error }, `Cache clear failed: ${result.error.message}`);
      }
    },

    async stats(): Promise<CacheStats> {
      return cache.stats();
    },
  };
};
