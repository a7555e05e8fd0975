/**
 * Cache wrapper factories for repository methods.
 *
 * Each wrapper returns the same repository interface with selected reads
 * going through the cache. Writes are delegated untouched; the use cases
 * invalidate the affected namespaces after them.
 */

import { Value } from '@sinclair/typebox/value';

import {
  CacheNamespace,
  withCacheResult,
  type KeyBuilder,
  type SilentCachePort,
} from '../infra/cache/index.js';
import {
  DASHBOARD_CACHE_TTL_MS,
  DashboardSummarySchema,
  type DashboardRepository,
} from '../modules/dashboard/index.js';
import {
  ALERT_STATS_CACHE_TTL_MS,
  AlertStatsSchema,
  OBLIGATION_CACHE_TTL_MS,
  ObligationSchema,
  type AlertRecordsRepository,
  type ObligationsRepository,
} from '../modules/deadline-alerts/index.js';
import {
  PersonSearchHitsSchema,
  SEARCH_CACHE_TTL_MS,
  type PeopleRepository,
} from '../modules/people/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// People Repository Wrapper
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Caches the autocomplete search under `people:search:{term}:{page}:{limit}`.
 */
export const wrapPeopleRepo = (
  repo: PeopleRepository,
  cache: SilentCachePort,
  keyBuilder: KeyBuilder
): PeopleRepository => ({
  create: repo.create.bind(repo),
  findById: repo.findById.bind(repo),
  list: repo.list.bind(repo),
  update: repo.update.bind(repo),
  delete: repo.delete.bind(repo),
  countFarmlessDocuments: repo.countFarmlessDocuments.bind(repo),

  search: withCacheResult(repo.search.bind(repo), cache, {
    ttlMs: SEARCH_CACHE_TTL_MS,
    keyGenerator: ([query]) =>
      keyBuilder.build(CacheNamespace.PEOPLE, 'search', query.term, query.page, query.limit),
    decode: (value) => (Value.Check(PersonSearchHitsSchema, value) ? value : undefined),
  }),
});

// ─────────────────────────────────────────────────────────────────────────────
// Dashboard Repository Wrapper
// ─────────────────────────────────────────────────────────────────────────────

export const wrapDashboardRepo = (
  repo: DashboardRepository,
  cache: SilentCachePort,
  keyBuilder: KeyBuilder
): DashboardRepository => ({
  getSummary: withCacheResult(repo.getSummary.bind(repo), cache, {
    ttlMs: DASHBOARD_CACHE_TTL_MS,
    keyGenerator: ([window]) => keyBuilder.build(CacheNamespace.DASHBOARD, 'summary', window.today),
    decode: (value) => (Value.Check(DashboardSummarySchema, value) ? value : undefined),
  }),
});

// ─────────────────────────────────────────────────────────────────────────────
// Deadline Alerts Repository Wrappers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Single-obligation lookups only; the alert run always reads fresh data.
 */
export const wrapObligationsRepo = (
  repo: ObligationsRepository,
  cache: SilentCachePort,
  keyBuilder: KeyBuilder
): ObligationsRepository => ({
  listActive: repo.listActive.bind(repo),

  find: withCacheResult(repo.find.bind(repo), cache, {
    ttlMs: OBLIGATION_CACHE_TTL_MS,
    keyGenerator: ([kind, id]) => keyBuilder.build(CacheNamespace.DEADLINES, kind, id),
    decode: (value) => (Value.Check(ObligationSchema, value) ? value : undefined),
  }),
});

export const wrapAlertRecordsRepo = (
  repo: AlertRecordsRepository,
  cache: SilentCachePort,
  keyBuilder: KeyBuilder
): AlertRecordsRepository => ({
  findSentThresholds: repo.findSentThresholds.bind(repo),
  insert: repo.insert.bind(repo),
  list: repo.list.bind(repo),
  deleteOlderThan: repo.deleteOlderThan.bind(repo),

  getStats: withCacheResult(repo.getStats.bind(repo), cache, {
    ttlMs: ALERT_STATS_CACHE_TTL_MS,
    keyGenerator: ([window]) =>
      keyBuilder.build(CacheNamespace.ALERTS, 'stats', window.timeZone, window.today),
    decode: (value) => (Value.Check(AlertStatsSchema, value) ? value : undefined),
  }),
});
