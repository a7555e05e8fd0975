import { describe, expect, it } from 'vitest';

import { createSilentCache } from '@/infra/cache/wrappers/silent-cache.js';
import { CacheError } from '@/infra/cache/ports.js';

import { makeCapturingLogger, makeFakeCachePort } from '../../../fixtures/fakes.js';

const failing = () =>
  makeFakeCachePort({ failWithError: CacheError.connection('Connection refused') });

describe('SilentCache', () => {
  describe('when the cache works', () => {
    it('passes values through', async () => {
      const { logger, entries } = makeCapturingLogger();
      const cache = createSilentCache(makeFakeCachePort(), { logger });

      await cache.set('key', { total: 1 });

      expect(await cache.get('key')).toEqual({ total: 1 });
      expect(await cache.has('key')).toBe(true);
      expect(await cache.clearByPattern('k*')).toBe(1);
      expect(await cache.delete('key')).toBe(false);
      expect(entries()).toEqual([]);
    });
  });

  describe('when the cache fails', () => {
    it('returns undefined from get and logs a warning', async () => {
      const { logger, entries } = makeCapturingLogger();
      const cache = createSilentCache(failing(), { logger });

      const value = await cache.get('people:search:ana:1:10');

      expect(value).toBeUndefined();
      expect(entries()).toEqual([
        expect.objectContaining({
          level: 40,
          component: 'Cache',
          key: 'people:search:ana:1:10',
          msg: 'Cache get failed: Connection refused',
        }),
      ]);
    });

    it('ignores set failures', async () => {
      const { logger, entries } = makeCapturingLogger();
      const cache = createSilentCache(failing(), { logger });

      await expect(cache.set('key', 'value')).resolves.toBeUndefined();
      expect(entries()).toHaveLength(1);
    });

    it('reports nothing deleted or present', async () => {
      const { logger } = makeCapturingLogger();
      const cache = createSilentCache(failing(), { logger });

      expect(await cache.delete('key')).toBe(false);
      expect(await cache.has('key')).toBe(false);
      expect(await cache.clearByPattern('people:*')).toBe(0);
      await expect(cache.clear()).resolves.toBeUndefined();
    });

    it('still reports statistics from the adapter', async () => {
      const { logger } = makeCapturingLogger();
      const cache = createSilentCache(failing(), { logger });

      await cache.get('a');
      await cache.get('b');

      expect(await cache.stats()).toEqual({ hits: 0, misses: 0, errors: 2, size: 0 });
    });
  });
});
