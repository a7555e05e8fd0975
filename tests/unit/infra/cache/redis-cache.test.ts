import { describe, expect, it } from 'vitest';

import { createRedisCacheFromClient, type RedisCacheClient } from '@/infra/cache/index.js';
import { matchesGlob } from '@/infra/cache/glob.js';

interface StoredValue {
  value: string;
  ttlMs: number;
}

/**
 * In-process stand-in for the ioredis calls the adapter makes. SCAN returns
 * one key per page from a snapshot taken at cursor 0, so cursors are exercised.
 */
const makeFakeRedis = (options: { failWith?: Error } = {}) => {
  const store = new Map<string, StoredValue>();
  let snapshot: string[] = [];

  const guard = (): void => {
    if (options.failWith !== undefined) throw options.failWith;
  };

  const client: RedisCacheClient = {
    async get(key) {
      guard();
      return store.get(key)?.value ?? null;
    },
    async set(key, value, _mode, ttlMs) {
      guard();
      store.set(key, { value, ttlMs });
      return 'OK';
    },
    async del(...keys) {
      guard();
      return keys.filter((key) => store.delete(key)).length;
    },
    async exists(key) {
      guard();
      return store.has(key) ? 1 : 0;
    },
    async scan(cursor, _match, pattern) {
      guard();
      if (cursor === '0') {
        snapshot = [...store.keys()].filter((key) => matchesGlob(pattern, key)).sort();
      }
      const index = Number(cursor);
      const next = index + 1 < snapshot.length ? String(index + 1) : '0';
      const key = snapshot[index];
      return [next, key === undefined ? [] : [key]];
    },
  };

  return { client, store };
};

describe('RedisCache', () => {
  it('prefixes keys and stores JSON with the default TTL', async () => {
    const { client, store } = makeFakeRedis();
    const cache = createRedisCacheFromClient(client, { keyPrefix: 'agro', defaultTtlMs: 1000 });

    await cache.set('people:search:ana:1:10', { total: 2 });

    expect(store.get('agro:people:search:ana:1:10')).toEqual({
      value: '{"total":2}',
      ttlMs: 1000,
    });
    expect((await cache.get('people:search:ana:1:10'))._unsafeUnwrap()).toEqual({ total: 2 });
  });

  it('uses the TTL given per set', async () => {
    const { client, store } = makeFakeRedis();
    const cache = createRedisCacheFromClient(client, {});

    await cache.set('key', 'value', { ttlMs: 42 });

    expect(store.get('agro:key')?.ttlMs).toBe(42);
  });

  it('counts hits and misses', async () => {
    const { client } = makeFakeRedis();
    const cache = createRedisCacheFromClient(client, {});

    await cache.set('key', 1);
    await cache.get('key');
    await cache.get('missing');

    expect(await cache.stats()).toEqual({ hits: 1, misses: 1, errors: 0, size: 0 });
  });

  it('reports a corrupted value as a serialization error', async () => {
    const { client, store } = makeFakeRedis();
    store.set('agro:key', { value: '{broken', ttlMs: 1000 });
    const cache = createRedisCacheFromClient(client, {});

    const result = await cache.get('key');

    expect(result._unsafeUnwrapErr().type).toBe('SerializationError');
  });

  it('deletes and checks keys', async () => {
    const { client } = makeFakeRedis();
    const cache = createRedisCacheFromClient(client, {});
    await cache.set('key', 'value');

    expect((await cache.has('key'))._unsafeUnwrap()).toBe(true);
    expect((await cache.delete('key'))._unsafeUnwrap()).toBe(true);
    expect((await cache.delete('key'))._unsafeUnwrap()).toBe(false);
    expect((await cache.has('key'))._unsafeUnwrap()).toBe(false);
  });

  it('clears every page of keys matching a pattern', async () => {
    const { client, store } = makeFakeRedis();
    const cache = createRedisCacheFromClient(client, {});
    await cache.set('people:search:a:1:10', 1);
    await cache.set('people:search:b:1:10', 2);
    await cache.set('people:search:c:1:10', 3);
    await cache.set('farms:list', 4);

    const cleared = await cache.clearByPattern('people:*');

    expect(cleared._unsafeUnwrap()).toBe(3);
    expect([...store.keys()]).toEqual(['agro:farms:list']);
  });

  it('clears only keys under its prefix', async () => {
    const { client, store } = makeFakeRedis();
    store.set('other:key', { value: '1', ttlMs: 1000 });
    const cache = createRedisCacheFromClient(client, {});
    await cache.set('key', 'value');

    const result = await cache.clear();

    expect(result.isOk()).toBe(true);
    expect([...store.keys()]).toEqual(['other:key']);
  });

  it('maps failures to connection and timeout errors', async () => {
    const refused = createRedisCacheFromClient(
      makeFakeRedis({ failWith: new Error('connect ECONNREFUSED') }).client,
      {}
    );
    const slow = createRedisCacheFromClient(
      makeFakeRedis({ failWith: new Error('Command timed out') }).client,
      {}
    );

    expect((await refused.get('key'))._unsafeUnwrapErr()).toMatchObject({
      type: 'ConnectionError',
      message: 'Failed to get key: key',
    });
    expect((await slow.set('key', 1))._unsafeUnwrapErr()).toMatchObject({
      type: 'TimeoutError',
      message: 'Failed to set key: key',
    });
    expect((await refused.stats()).errors).toBe(1);
  });
});
