/**
 * Write-side cache invalidation.
 *
 * Every write to an entity clears the cached reads of that entity and of
 * the aggregates derived from it. Obligations carry person and farm names,
 * so people and farm writes clear deadline lookups too.
 */

import { CacheNamespace, createKeyBuilder } from './key-builder.js';

import type { SilentCachePort } from './ports.js';
import type { Logger } from 'pino';

export type CachedEntity = 'person' | 'farm' | 'document' | 'debt' | 'alert';

const keys = createKeyBuilder();

export const CACHE_INVALIDATION_PATTERNS: Readonly<Record<CachedEntity, readonly string[]>> = {
  person: [
    keys.pattern(CacheNamespace.PEOPLE),
    keys.pattern(CacheNamespace.DEADLINES),
    keys.pattern(CacheNamespace.DASHBOARD),
  ],
  farm: [
    keys.pattern(CacheNamespace.FARMS),
    keys.pattern(CacheNamespace.DEADLINES),
    keys.pattern(CacheNamespace.DASHBOARD),
  ],
  document: [
    keys.pattern(CacheNamespace.DOCUMENTS),
    keys.pattern(CacheNamespace.DEADLINES),
    keys.pattern(CacheNamespace.DASHBOARD),
  ],
  debt: [
    keys.pattern(CacheNamespace.DEBTS),
    keys.pattern(CacheNamespace.DEADLINES),
    keys.pattern(CacheNamespace.DASHBOARD),
  ],
  alert: [keys.pattern(CacheNamespace.ALERTS), keys.pattern(CacheNamespace.DASHBOARD)],
};

/**
 * Port used by write use cases.
 */
export interface CacheInvalidator {
  /** Clears every pattern registered for the entity; returns removed key count */
  invalidate(entity: CachedEntity): Promise<number>;
}

export const makeCacheInvalidator = (cache: SilentCachePort, logger: Logger): CacheInvalidator => {
  const log = logger.child({ component: 'CacheInvalidator' });

  return {
    async invalidate(entity: CachedEntity): Promise<number> {
      const patterns = CACHE_INVALIDATION_PATTERNS[entity];
      const counts = await Promise.all(patterns.map((pattern) => cache.clearByPattern(pattern)));
      const removed = counts.reduce((sum, count) => sum + count, 0);

      log.debug({ entity, patterns, removed }, 'Invalidated cached reads');
      return removed;
    },
  };
};

/**
 * Invalidator that does nothing, for wiring without a cache.
 */
export const noopCacheInvalidator: CacheInvalidator = {
  invalidate: () => Promise.resolve(0),
};
