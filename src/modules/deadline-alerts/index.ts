/**
 * Deadline Alerts Module - Public API
 *
 * Email warnings before documents expire and debts or installments fall due,
 * their history, and the jobs that run them.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ObligationKind,
  Obligation,
  ObligationDetails,
  DocumentObligationDetails,
  DebtObligationDetails,
  InstallmentObligationDetails,
  AlertRecord,
  NewAlertRecord,
  SentThreshold,
  AlertHistoryFilter,
  DueAlert,
  SkippedAlert,
  AlertPlan,
  AlertRunSummary,
  UpcomingAlert,
  AlertStats,
  RenderedAlertEmail,
} from './core/types.js';

export {
  OBLIGATION_KINDS,
  DOCUMENT_THRESHOLDS,
  DEBT_THRESHOLDS,
  DEFAULT_RETENTION_DAYS,
  OBLIGATION_CACHE_TTL_MS,
  ALERT_STATS_CACHE_TTL_MS,
  ObligationSchema,
  AlertStatsSchema,
  isObligationKind,
} from './core/types.js';

export {
  buildDocumentObligation,
  buildDebtObligation,
  buildInstallmentObligation,
  type DocumentObligationSource,
  type DebtObligationSource,
  type InstallmentObligationSource,
} from './core/obligations.js';

export {
  planDeadlineAlerts,
  computeUpcomingAlerts,
  sentAlertKey,
  uniqueThresholds,
} from './core/planning.js';

export {
  getPeriodLabel,
  getUrgencyColor,
  buildSubject,
  formatMoney,
  formatRate,
} from './core/email-content.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { DeadlineAlertsError, ObligationNotFoundError, RenderError } from './core/errors.js';

export {
  createObligationNotFoundError,
  createRenderError,
  DEADLINE_ALERTS_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Ports & Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export type {
  ObligationsRepository,
  AlertRecordsRepository,
  AlertEmailRenderer,
  AlertRunContext,
  StatsWindow,
} from './core/ports.js';

export {
  planDeadlineAlertsForDay,
  type PlanDeadlineAlertsDeps,
} from './core/usecases/plan-deadline-alerts.js';
export {
  runDeadlineAlerts,
  buildAlertIdempotencyKey,
  type RunDeadlineAlertsInput,
} from './core/usecases/run-deadline-alerts.js';
export {
  listUpcomingAlerts,
  type ListUpcomingAlertsDeps,
} from './core/usecases/list-upcoming-alerts.js';
export { listAlertHistory, type ListAlertHistoryDeps } from './core/usecases/list-alert-history.js';
export {
  purgeAlertHistory,
  type PurgeAlertHistoryDeps,
  type PurgeAlertHistoryOutput,
} from './core/usecases/purge-alert-history.js';
export { getAlertStats, type GetAlertStatsDeps } from './core/usecases/get-alert-stats.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { makeObligationsRepo, type ObligationsRepoOptions } from './shell/repo/obligations-repo.js';
export {
  makeAlertRecordsRepo,
  type AlertRecordsRepoOptions,
} from './shell/repo/alert-records-repo.js';
export {
  makeDeadlineAlertRenderer,
  type DeadlineAlertRendererConfig,
} from './shell/renderer/index.js';
export {
  DEADLINE_ALERTS_QUEUE,
  RUN_ALERTS_JOB,
  PURGE_HISTORY_JOB,
  scheduleDeadlineAlertJobs,
  type DeadlineAlertsJobData,
  type DeadlineAlertsJobResult,
  type DeadlineAlertsSchedule,
} from './shell/queue/jobs.js';
export {
  makeDeadlineAlertsProcessor,
  type DeadlineAlertsJob,
  type DeadlineAlertsProcessor,
  type DeadlineAlertsProcessorDeps,
} from './shell/queue/processor.js';
export {
  makeDeadlineAlertRoutes,
  ALERTS_API_KEY_HEADER,
  type MakeDeadlineAlertRoutesDeps,
} from './shell/rest/routes.js';
