/**
 * In-memory LRU cache with TTL expiration.
 */

import { err, ok } from 'neverthrow';

import { globToRegExp } from '../glob.js';
import { deserialize, serialize } from '../serialization.js';

import type { CachePort, CacheSetOptions, CacheStats } from '../ports.js';

interface CacheEntry {
  /** Serialized value, so callers never share mutable references */
  value: string;
  /** Expiration timestamp (ms since epoch) */
  expiresAt: number;
}

export interface MemoryCacheOptions {
  /** Maximum number of entries. Default: 1000 */
  maxEntries?: number;
  /** Default TTL in milliseconds. Default: 300000 (5 minutes) */
  defaultTtlMs?: number;
}

/**
 * Create an in-memory LRU cache with TTL.
 */
export const createMemoryCache = (options: MemoryCacheOptions = {}): CachePort => {
  const maxEntries = options.maxEntries ?? 1000;
  const defaultTtlMs = options.defaultTtlMs ?? 300_000;

  // Map maintains insertion order, enabling LRU eviction
  const store = new Map<string, CacheEntry>();

  let hits = 0;
  let misses = 0;

  const isExpired = (entry: CacheEntry): boolean => {
    return Date.now() >= entry.expiresAt;
  };

  const evictLru = (): void => {
    const lruKey = store.keys().next().value;
    if (lruKey !== undefined) {
      store.delete(lruKey);
    }
  };

  return {
    get(key: string) {
      const entry = store.get(key);

      if (entry === undefined) {
        misses++;
        return Promise.resolve(ok(undefined));
      }

      if (isExpired(entry)) {
        store.delete(key);
        misses++;
        return Promise.resolve(ok(undefined));
      }

      // Refresh LRU order
      store.delete(key);
      store.set(key, entry);

      const result = deserialize(entry.value);
      if (result.isErr()) {
        // Corrupted entry, remove it
        store.delete(key);
        misses++;
        return Promise.resolve(ok(undefined));
      }

      hits++;
      return Promise.resolve(ok(result.value));
    },

    set(key: string, value: unknown, setOptions?: CacheSetOptions) {
      const serialized = serialize(value);
      if (serialized.isErr()) {
        return Promise.resolve(err(serialized.error));
      }

      const ttlMs = setOptions?.ttlMs ?? defaultTtlMs;

      if (store.has(key)) {
        store.delete(key);
      } else if (store.size >= maxEntries) {
        evictLru();
      }

      store.set(key, {
        value: serialized.value,
        expiresAt: Date.now() + ttlMs,
      });

      return Promise.resolve(ok(undefined));
    },

    delete(key: string) {
      return Promise.resolve(ok(store.delete(key)));
    },

    has(key: string) {
      const entry = store.get(key);

      if (entry === undefined) {
        return Promise.resolve(ok(false));
      }

      if (isExpired(entry)) {
        store.delete(key);
        return Promise.resolve(ok(false));
      }

      return Promise.resolve(ok(true));
    },

    clearByPattern(pattern: string) {
      const matcher = globToRegExp(pattern);
      let count = 0;
      for (const key of [...store.keys()]) {
        if (matcher.test(key)) {
          store.delete(key);
          count++;
        }
      }
      return Promise.resolve(ok(count));
    },

    clear() {
      store.clear();
      hits = 0;
      misses = 0;
      return Promise.resolve(ok(undefined));
    },

    stats(): Promise<CacheStats> {
      return Promise.resolve({ hits, misses, errors: 0, size: store.size });
    },
  };
};
