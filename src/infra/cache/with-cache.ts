/**
 * Read-through caching for query functions.
 */

import { ok, type Result } from 'neverthrow';

import type { CacheSetOptions, SilentCachePort } from './ports.js';

export interface WithCacheOptions<TArgs extends unknown[], TResult> {
  /** TTL in milliseconds */
  ttlMs?: number;
  /** Function to generate cache key from method arguments */
  keyGenerator: (args: TArgs) => string;
  /**
   * Turns a cached value back into a typed result.
   * Returning undefined treats the entry as a miss (stale shape, corruption).
   */
  decode: (value: unknown) => TResult | undefined;
}

/**
 * Wrap a function with caching.
 * On first call, executes the function and caches the result.
 * On subsequent calls with same key, returns cached result.
 *
 * @example
 * ```typescript
 * const cachedSearch = withCache(repo.search.bind(repo), cache, {
 *   ttlMs: 300_000,
 *   keyGenerator: ([query]) => keyBuilder.build(CacheNamespace.PEOPLE, 'search', query.term),
 *   decode: (value) => (Value.Check(PageSchema, value) ? value : undefined),
 * });
 * ```
 */
export const withCache = <TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => Promise<TResult>,
  cache: SilentCachePort,
  options: WithCacheOptions<TArgs, TResult>
): ((...args: TArgs) => Promise<TResult>) => {
  const { ttlMs, keyGenerator, decode } = options;

  return async (...args: TArgs): Promise<TResult> => {
    const key = keyGenerator(args);

    const cached = await cache.get(key);
    if (cached !== undefined) {
      const decoded = decode(cached);
      if (decoded !== undefined) {
        return decoded;
      }
    }

    const result = await fn(...args);

    const setOptions: CacheSetOptions | undefined = ttlMs !== undefined ? { ttlMs } : undefined;
    await cache.set(key, result, setOptions);

    return result;
  };
};

/**
 * Wrap a function that returns a Result with caching.
 * Only successful results are cached.
 */
export const withCacheResult = <TArgs extends unknown[], TValue, TError>(
  fn: (...args: TArgs) => Promise<Result<TValue, TError>>,
  cache: SilentCachePort,
  options: WithCacheOptions<TArgs, TValue>
): ((...args: TArgs) => Promise<Result<TValue, TError>>) => {
  const { ttlMs, keyGenerator, decode } = options;

  return async (...args: TArgs): Promise<Result<TValue, TError>> => {
    const key = keyGenerator(args);

    const cached = await cache.get(key);
    if (cached !== undefined) {
      const decoded = decode(cached);
      if (decoded !== undefined) {
        return ok(decoded);
      }
    }

    const result = await fn(...args);

    if (result.isOk()) {
      const setOptions: CacheSetOptions | undefined = ttlMs !== undefined ? { ttlMs } : undefined;
      await cache.set(key, result.value, setOptions);
    }

    return result;
  };
};
