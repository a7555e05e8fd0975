import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createMemoryCache } from '@/infra/cache/adapters/memory-cache.js';

describe('MemoryCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns undefined for missing keys', async () => {
    const cache = createMemoryCache({ maxEntries: 10, defaultTtlMs: 1000 });
    const result = await cache.get('missing');
    expect(result.isOk()).toBe(true);
    expect(result._unsafeUnwrap()).toBeUndefined();
  });

  it('stores and retrieves values', async () => {
    const cache = createMemoryCache({ maxEntries: 10, defaultTtlMs: 1000 });
    await cache.set('key', 'value');
    const result = await cache.get('key');
    expect(result._unsafeUnwrap()).toBe('value');
  });

  it('returns a copy of stored objects', async () => {
    const cache = createMemoryCache();
    const obj = { name: 'Fazenda Boa Vista', hectares: 120 };
    await cache.set('key', obj);
    obj.hectares = 0;

    const result = await cache.get('key');
    expect(result._unsafeUnwrap()).toEqual({ name: 'Fazenda Boa Vista', hectares: 120 });
  });

  it('rejects values that cannot be serialized', async () => {
    const cache = createMemoryCache();
    const result = await cache.set('key', { amount: 10n });

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().type).toBe('SerializationError');
    expect((await cache.has('key'))._unsafeUnwrap()).toBe(false);
  });

  it('respects TTL expiration', async () => {
    const cache = createMemoryCache({ maxEntries: 10, defaultTtlMs: 50 });
    await cache.set('key', 'value');
    vi.advanceTimersByTime(100);
    const result = await cache.get('key');
    expect(result._unsafeUnwrap()).toBeUndefined();
  });

  it('allows custom TTL per set operation', async () => {
    const cache = createMemoryCache({ maxEntries: 10, defaultTtlMs: 1000 });
    await cache.set('short', 'value', { ttlMs: 50 });
    await cache.set('long', 'value', { ttlMs: 5000 });

    vi.advanceTimersByTime(100);

    expect((await cache.get('short'))._unsafeUnwrap()).toBeUndefined();
    expect((await cache.get('long'))._unsafeUnwrap()).toBe('value');
  });

  it('evicts LRU entries when at capacity', async () => {
    const cache = createMemoryCache({ maxEntries: 2, defaultTtlMs: 10000 });
    await cache.set('a', '1');
    await cache.set('b', '2');
    await cache.set('c', '3'); // Should evict 'a'

    expect((await cache.get('a'))._unsafeUnwrap()).toBeUndefined();
    expect((await cache.get('b'))._unsafeUnwrap()).toBe('2');
    expect((await cache.get('c'))._unsafeUnwrap()).toBe('3');
  });

  it('refreshes LRU order on get', async () => {
    const cache = createMemoryCache({ maxEntries: 2, defaultTtlMs: 10000 });
    await cache.set('a', '1');
    await cache.set('b', '2');

    await cache.get('a');
    await cache.set('c', '3');

    expect((await cache.get('a'))._unsafeUnwrap()).toBe('1');
    expect((await cache.get('b'))._unsafeUnwrap()).toBeUndefined();
    expect((await cache.get('c'))._unsafeUnwrap()).toBe('3');
  });

  it('overwrites an existing key without evicting others', async () => {
    const cache = createMemoryCache({ maxEntries: 2 });
    await cache.set('a', '1');
    await cache.set('b', '2');
    await cache.set('a', '3');

    expect((await cache.get('a'))._unsafeUnwrap()).toBe('3');
    expect((await cache.get('b'))._unsafeUnwrap()).toBe('2');
  });

  it('deletes existing keys', async () => {
    const cache = createMemoryCache();
    await cache.set('key', 'value');
    const deleted = await cache.delete('key');
    expect(deleted._unsafeUnwrap()).toBe(true);
    expect((await cache.get('key'))._unsafeUnwrap()).toBeUndefined();
  });

  it('returns false when deleting non-existent key', async () => {
    const cache = createMemoryCache();
    const deleted = await cache.delete('nonexistent');
    expect(deleted._unsafeUnwrap()).toBe(false);
  });

  it('has() returns false for expired keys', async () => {
    const cache = createMemoryCache({ defaultTtlMs: 50 });
    await cache.set('key', 'value');

    expect((await cache.has('key'))._unsafeUnwrap()).toBe(true);
    vi.advanceTimersByTime(100);
    expect((await cache.has('key'))._unsafeUnwrap()).toBe(false);
  });

  it('clears entries matching a glob pattern', async () => {
    const cache = createMemoryCache();
    await cache.set('people:search:ana:1:10', '1');
    await cache.set('people:search:bia:1:10', '2');
    await cache.set('farms:list', '3');

    const cleared = await cache.clearByPattern('people:*');
    expect(cleared._unsafeUnwrap()).toBe(2);

    expect((await cache.get('people:search:ana:1:10'))._unsafeUnwrap()).toBeUndefined();
    expect((await cache.get('people:search:bia:1:10'))._unsafeUnwrap()).toBeUndefined();
    expect((await cache.get('farms:list'))._unsafeUnwrap()).toBe('3');
  });

  it('matches single characters with ?', async () => {
    const cache = createMemoryCache();
    await cache.set('alerts:stats:1', 'a');
    await cache.set('alerts:stats:12', 'b');

    const cleared = await cache.clearByPattern('alerts:stats:?');

    expect(cleared._unsafeUnwrap()).toBe(1);
    expect((await cache.get('alerts:stats:12'))._unsafeUnwrap()).toBe('b');
  });

  it('tracks and resets statistics', async () => {
    const cache = createMemoryCache();
    await cache.set('key', 'value');

    await cache.get('key');
    await cache.get('key');
    await cache.get('missing');

    expect(await cache.stats()).toEqual({ hits: 2, misses: 1, errors: 0, size: 1 });

    await cache.clear();

    expect(await cache.stats()).toEqual({ hits: 0, misses: 0, errors: 0, size: 0 });
  });
});
