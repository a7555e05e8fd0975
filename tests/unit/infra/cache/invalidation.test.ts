import { describe, expect, it } from 'vitest';

import {
  CACHE_INVALIDATION_PATTERNS,
  createSilentCache,
  makeCacheInvalidator,
  noopCacheInvalidator,
} from '@/infra/cache/index.js';
import { createMemoryCache } from '@/infra/cache/adapters/memory-cache.js';

import { makeTestLogger } from '../../../fixtures/fakes.js';

describe('CACHE_INVALIDATION_PATTERNS', () => {
  it('clears deadline lookups when documents or debts change', () => {
    expect(CACHE_INVALIDATION_PATTERNS.document).toEqual([
      'documents:*',
      'deadlines:*',
      'dashboard:*',
    ]);
    expect(CACHE_INVALIDATION_PATTERNS.debt).toEqual(['debts:*', 'deadlines:*', 'dashboard:*']);
  });

  it('clears deadline lookups when people or farms change', () => {
    expect(CACHE_INVALIDATION_PATTERNS.person).toEqual(['people:*', 'deadlines:*', 'dashboard:*']);
    expect(CACHE_INVALIDATION_PATTERNS.farm).toEqual(['farms:*', 'deadlines:*', 'dashboard:*']);
  });

  it('clears the dashboard for every entity', () => {
    for (const patterns of Object.values(CACHE_INVALIDATION_PATTERNS)) {
      expect(patterns).toContain('dashboard:*');
    }
  });
});

describe('makeCacheInvalidator', () => {
  it('removes the keys of the changed entity and the dashboard', async () => {
    const cache = createSilentCache(createMemoryCache(), { logger: makeTestLogger() });
    await cache.set('people:search:ana:1:10', { items: [], total: 0 });
    await cache.set('dashboard:summary:2024-06-01', { people: 1 });
    await cache.set('farms:list', []);
    const invalidator = makeCacheInvalidator(cache, makeTestLogger());

    const removed = await invalidator.invalidate('person');

    expect(removed).toBe(2);
    expect(await cache.get('people:search:ana:1:10')).toBeUndefined();
    expect(await cache.get('dashboard:summary:2024-06-01')).toBeUndefined();
    expect(await cache.get('farms:list')).toEqual([]);
  });
});

describe('noopCacheInvalidator', () => {
  it('removes nothing', async () => {
    expect(await noopCacheInvalidator.invalidate('alert')).toBe(0);
  });
});
