/**
 * Unit tests for cache client configuration
 */

import { describe, expect, it } from 'vitest';

import { createCacheConfig, initCache } from '@/infra/cache/index.js';

import { makeTestConfig } from '../../../fixtures/builders.js';
import { makeCapturingLogger } from '../../../fixtures/fakes.js';

describe('Cache Client', () => {
  describe('createCacheConfig', () => {
    it('copies the cache settings and the Redis URL', () => {
      const config = createCacheConfig(
        makeTestConfig({ redis: { url: 'redis://localhost:6379' } })
      );

      expect(config).toEqual({
        backend: 'memory',
        defaultTtlMs: 300_000,
        memoryMaxEntries: 100,
        keyPrefix: 'test',
        redisUrl: 'redis://localhost:6379',
      });
    });
  });

  describe('initCache', () => {
    it('stores values with the memory backend', async () => {
      const { logger } = makeCapturingLogger();
      const { cache } = initCache({ config: createCacheConfig(makeTestConfig()), logger });

      await cache.set('farms:list', [1, 2]);

      expect(await cache.get('farms:list')).toEqual([1, 2]);
    });

    it('stores nothing when caching is disabled', async () => {
      const { logger } = makeCapturingLogger();
      const config = createCacheConfig(
        makeTestConfig({ cache: { ...makeTestConfig().cache, backend: 'disabled' } })
      );
      const { cache } = initCache({ config, logger });

      await cache.set('farms:list', [1, 2]);

      expect(await cache.get('farms:list')).toBeUndefined();
    });

    it('falls back to memory when Redis is selected without a URL', async () => {
      const { logger, entries } = makeCapturingLogger();
      const config = createCacheConfig(
        makeTestConfig({ cache: { ...makeTestConfig().cache, backend: 'redis' } })
      );
      const { cache } = initCache({ config, logger });

      await cache.set('farms:list', 'cached');

      expect(await cache.get('farms:list')).toBe('cached');
      expect(entries()).toContainEqual(
        expect.objectContaining({
          level: 40,
          msg: '[Cache] Redis URL not configured, falling back to memory cache',
        })
      );
    });

    it('returns a key builder', () => {
      const { logger } = makeCapturingLogger();
      const { keyBuilder } = initCache({ config: createCacheConfig(makeTestConfig()), logger });

      expect(keyBuilder.build('dashboard', 'summary', '2024-06-01')).toBe(
        'dashboard:summary:2024-06-01'
      );
    });
  });
});
