/**
 * Cache key generation with namespaces for targeted invalidation.
 *
 * Keys are colon separated (`people:search:ana:1:10`). The global prefix is
 * applied by the backend adapter, so keys built here are backend-agnostic.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Namespaces
// ─────────────────────────────────────────────────────────────────────────────

export const CacheNamespace = {
  /** People lookups (search autocomplete) */
  PEOPLE: 'people',
  FARMS: 'farms',
  DOCUMENTS: 'documents',
  DEBTS: 'debts',
  /** Upcoming deadlines derived from documents and debts */
  DEADLINES: 'deadlines',
  /** Alert history and statistics */
  ALERTS: 'alerts',
  /** Aggregated landing-page counters */
  DASHBOARD: 'dashboard',
} as const;

export type CacheNamespace = (typeof CacheNamespace)[keyof typeof CacheNamespace];

// ─────────────────────────────────────────────────────────────────────────────
// Key Builder Interface
// ─────────────────────────────────────────────────────────────────────────────

export type KeyPart = string | number;

export interface KeyBuilder {
  /**
   * Build a cache key from namespace and parts.
   * Format: `{namespace}:{part1}:{part2}...`
   */
  build(namespace: CacheNamespace, ...parts: KeyPart[]): string;

  /**
   * Glob pattern matching every key of a namespace: `{namespace}:*`
   */
  pattern(namespace: CacheNamespace): string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create a key builder instance.
 */
export const createKeyBuilder = (): KeyBuilder => {
  return {
    build(namespace: CacheNamespace, ...parts: KeyPart[]): string {
      return [namespace, ...parts.map(String)].join(':');
    },

    pattern(namespace: CacheNamespace): string {
      return `${namespace}:*`;
    },
  };
};
