/**
 * Backend for `CACHE_BACKEND=disabled`: keeps nothing, so every read is a
 * miss and every lookup goes to the database.
 */

import { ok, type Result } from 'neverthrow';

import type { CacheError, CachePort } from '../ports.js';

const settle = <T>(value: T): Promise<Result<T, CacheError>> => Promise.resolve(ok(value));

export const createNoopCache = (): CachePort => {
  let misses = 0;

  return {
    get: () => {
      misses++;
      return settle<unknown>(undefined);
    },
    set: () => settle<void>(undefined),
    delete: () => settle(false),
    has: () => settle(false),
    clearByPattern: () => settle(0),
    clear: () => settle<void>(undefined),
    stats: () => Promise.resolve({ hits: 0, misses, errors: 0, size: 0 }),
  };
};
