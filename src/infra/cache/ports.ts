/**
 * Cache contracts.
 *
 * Adapters implement `CachePort` and report failures as values. The
 * application talks to `SilentCachePort`, the same operations with every
 * failure already logged and turned into a miss.
 *
 * Keys are namespaced by entity (`people:list`, `deadlines:upcoming:…`) so a
 * write can clear its namespace with a glob. Values are plain JSON; typed
 * readers decode them (see `withCache`).
 */

import type { Result } from 'neverthrow';

export type CacheErrorType = 'ConnectionError' | 'SerializationError' | 'TimeoutError';

export interface CacheError {
  type: CacheErrorType;
  message: string;
  cause?: unknown;
}

const cacheError =
  (type: CacheErrorType) =>
  (message: string, cause?: unknown): CacheError => ({ type, message, cause });

export const CacheError = {
  /** The backend refused or dropped the command */
  connection: cacheError('ConnectionError'),
  /** The value could not be written to or read back from JSON */
  serialization: cacheError('SerializationError'),
  /** The backend accepted the command but did not answer in time */
  timeout: cacheError('TimeoutError'),
} as const;

export interface CacheSetOptions {
  /** Falls back to the adapter's default TTL */
  ttlMs?: number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  errors: number;
  size: number;
}

export interface CachePort {
  /** `ok(undefined)` on a miss */
  get(key: string): Promise<Result<unknown, CacheError>>;
  set(key: string, value: unknown, options?: CacheSetOptions): Promise<Result<void, CacheError>>;
  /** `ok(false)` when there was nothing to delete */
  delete(key: string): Promise<Result<boolean, CacheError>>;
  has(key: string): Promise<Result<boolean, CacheError>>;
  /**
   * Deletes the keys matching a glob (`*` any run, `?` one character,
   * `\` escapes either) and returns how many went.
   */
  clearByPattern(pattern: string): Promise<Result<number, CacheError>>;
  clear(): Promise<Result<void, CacheError>>;
  stats(): Promise<CacheStats>;
}

/** The value an operation yields once its failure has become a miss */
type Settled<R> = R extends Result<infer T, CacheError> ? T : R;

export type SilentCachePort = {
  [Operation in keyof CachePort]: (
    ...args: Parameters<CachePort[Operation]>
  ) => Promise<Settled<Awaited<ReturnType<CachePort[Operation]>>>>;
};
