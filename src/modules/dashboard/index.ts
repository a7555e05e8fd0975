/**
 * Dashboard Module - Public API
 *
 * Landing-page counters over people, farms, documents and debts.
 */

export type { DashboardSummary, DashboardWindow } from './core/types.js';
export { DashboardSummarySchema, DASHBOARD_CACHE_TTL_MS, DUE_SOON_DAYS } from './core/types.js';

export type { DashboardRepository } from './core/ports.js';

export {
  getDashboardSummary,
  getHttpStatusForError,
  DASHBOARD_ERROR_HTTP_STATUS,
  type DashboardError,
  type GetDashboardSummaryDeps,
} from './core/usecases/get-dashboard-summary.js';

export { makeDashboardRepo, type DashboardRepoOptions } from './shell/repo/dashboard-repo.js';
export { makeDashboardRoutes, type MakeDashboardRoutesDeps } from './shell/rest/routes.js';
