/**
 * Dependency checks wired into the readiness report.
 */

import { sql, type Kysely } from 'kysely';
import { err, ok } from 'neverthrow';

import type { CachePort } from '../../../../infra/cache/index.js';
import type { DependencyCheck } from '../../core/ports.js';

/** Never written; a miss is a successful round trip */
const CACHE_READINESS_KEY = 'health:readiness';

export const databaseDependency = <T>(db: Kysely<T>): DependencyCheck => ({
  component: 'database',
  critical: true,
  ping: async () => {
    await sql`SELECT 1`.execute(db);
    return ok(undefined);
  },
});

/**
 * Takes the raw port: the silent wrapper turns a dead cache into a miss.
 */
export const cacheDependency = (cache: CachePort): DependencyCheck => ({
  component: 'cache',
  critical: false,
  ping: async () => {
    const result = await cache.has(CACHE_READINESS_KEY);
    return result.isErr() ? err(result.error.message) : ok(undefined);
  },
});
