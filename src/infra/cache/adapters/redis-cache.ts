/**
 * Redis cache adapter using ioredis.
 */

import { Redis } from 'ioredis';
import { err, ok, type Result } from 'neverthrow';

import {
  CacheError as CacheErrorFactory,
  type CacheError,
  type CachePort,
  type CacheSetOptions,
  type CacheStats,
} from '../ports.js';
import { deserialize, serialize } from '../serialization.js';

export interface RedisCacheOptions {
  /** Redis connection URL */
  url: string;
  /** Key prefix for all cache keys. Default: 'agro' */
  keyPrefix?: string;
  /** Default TTL in milliseconds. Default: 300000 (5 minutes) */
  defaultTtlMs?: number;
  /** Connection timeout in milliseconds. Default: 5000 */
  connectTimeoutMs?: number;
  /** Command timeout in milliseconds. Default: 1000 */
  commandTimeoutMs?: number;
}

/**
 * The ioredis commands the adapter relies on.
 * `Redis` satisfies it; tests can pass an in-process stand-in.
 */
export interface RedisCacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', ttlMs: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  exists(key: string): Promise<number>;
  scan(
    cursor: string,
    matchToken: 'MATCH',
    pattern: string,
    countToken: 'COUNT',
    count: number
  ): Promise<[string, string[]]>;
}

const SCAN_BATCH_SIZE = 100;

/**
 * Wrap a Redis operation with error handling.
 */
const wrapRedisOp = async <T>(
  op: () => Promise<T>,
  errorMessage: string
): Promise<Result<T, CacheError>> => {
  try {
    const result = await op();
    return ok(result);
  } catch (cause) {
    if (cause instanceof Error) {
      if (cause.message.includes('ETIMEDOUT') || cause.message.includes('timed out')) {
        return err(CacheErrorFactory.timeout(errorMessage, cause));
      }
    }
    return err(CacheErrorFactory.connection(errorMessage, cause));
  }
};

/**
 * Create a Redis cache adapter with its own connection.
 */
export const createRedisCache = (options: RedisCacheOptions): CachePort => {
  const client = new Redis(options.url, {
    connectTimeout: options.connectTimeoutMs ?? 5000,
    commandTimeout: options.commandTimeoutMs ?? 1000,
    maxRetriesPerRequest: 1,
    retryStrategy: (times: number) => Math.min(times * 100, 30000),
    lazyConnect: true,
  });

  return createRedisCacheFromClient(client, {
    ...(options.keyPrefix !== undefined && { keyPrefix: options.keyPrefix }),
    ...(options.defaultTtlMs !== undefined && { defaultTtlMs: options.defaultTtlMs }),
  });
};

/**
 * Create a Redis cache from an existing client.
 */
export const createRedisCacheFromClient = (
  client: RedisCacheClient,
  options: { keyPrefix?: string; defaultTtlMs?: number }
): CachePort => {
  const keyPrefix = options.keyPrefix ?? 'agro';
  const defaultTtlMs = options.defaultTtlMs ?? 300_000;

  let hits = 0;
  let misses = 0;
  let errors = 0;

  const buildKey = (key: string): string => `${keyPrefix}:${key}`;

  const track = <T>(result: Result<T, CacheError>): Result<T, CacheError> => {
    if (result.isErr()) errors++;
    return result;
  };

  /**
   * SCAN + DEL every key matching a (prefixed) pattern.
   */
  const deleteMatching = async (fullPattern: string): Promise<number> => {
    let cursor = '0';
    let totalDeleted = 0;

    do {
      const [nextCursor, keys] = await client.scan(
        cursor,
        'MATCH',
        fullPattern,
        'COUNT',
        SCAN_BATCH_SIZE
      );
      cursor = nextCursor;

      if (keys.length > 0) {
        totalDeleted += await client.del(...keys);
      }
    } while (cursor !== '0');

    return totalDeleted;
  };

  return {
    async get(key: string) {
      const result = track(
        await wrapRedisOp(() => client.get(buildKey(key)), `Failed to get key: ${key}`)
      );

      if (result.isErr()) {
        return err(result.error);
      }

      if (result.value === null) {
        misses++;
        return ok(undefined);
      }

      const deserialized = track(deserialize(result.value));
      if (deserialized.isErr()) {
        misses++;
        return err(deserialized.error);
      }

      hits++;
      return ok(deserialized.value);
    },

    async set(key: string, value: unknown, setOptions?: CacheSetOptions) {
      const serialized = track(serialize(value));
      if (serialized.isErr()) {
        return err(serialized.error);
      }

      const ttlMs = setOptions?.ttlMs ?? defaultTtlMs;
      const result = track(
        await wrapRedisOp(
          () => client.set(buildKey(key), serialized.value, 'PX', ttlMs),
          `Failed to set key: ${key}`
        )
      );

      return result.map(() => undefined);
    },

    async delete(key: string) {
      const result = track(
        await wrapRedisOp(() => client.del(buildKey(key)), `Failed to delete key: ${key}`)
      );
      return result.map((deleted) => deleted > 0);
    },

    async has(key: string) {
      const result = track(
        await wrapRedisOp(
          () => client.exists(buildKey(key)),
          `Failed to check key existence: ${key}`
        )
      );
      return result.map((count) => count > 0);
    },

    async clearByPattern(pattern: string) {
      return track(
        await wrapRedisOp(
          () => deleteMatching(buildKey(pattern)),
          `Failed to clear by pattern: ${pattern}`
        )
      );
    },

    async clear() {
      const result = track(
        await wrapRedisOp(() => deleteMatching(`${keyPrefix}:*`), 'Failed to clear cache')
      );

      if (result.isErr()) {
        return err(result.error);
      }

      hits = 0;
      misses = 0;
      return ok(undefined);
    },

    stats(): Promise<CacheStats> {
      // Key count is not tracked: SCAN over the whole keyspace is too expensive for health checks
      return Promise.resolve({ hits, misses, errors, size: 0 });
    },
  };
};
