/**
 * Deadline Alerts Module - Port Interfaces
 */

import type { DatabaseError, RenderError } from './errors.js';
import type {
  AlertHistoryFilter,
  AlertRecord,
  AlertStats,
  DueAlert,
  NewAlertRecord,
  Obligation,
  ObligationKind,
  SentThreshold,
  RenderedAlertEmail,
} from './types.js';
import type { IsoDate } from '../../../common/dates.js';
import type { OffsetPage } from '../../../common/constants/pagination.js';
import type { CacheInvalidator } from '../../../infra/cache/index.js';
import type { EmailSender } from '../../../infra/email/index.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Repositories
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read-only view of documents and debts as obligations.
 */
export interface ObligationsRepository {
  /**
   * Active obligations of a kind whose due date is strictly after `after`.
   */
  listActive(kind: ObligationKind, after: IsoDate): Promise<Result<Obligation[], DatabaseError>>;

  /**
   * Any obligation by ID, active or not. Null when missing.
   */
  find(kind: ObligationKind, id: string): Promise<Result<Obligation | null, DatabaseError>>;
}

export interface StatsWindow {
  timeZone: string;
  today: IsoDate;
  monthStart: IsoDate;
}

export interface AlertRecordsRepository {
  /**
   * Thresholds with a successful record, for the given obligations.
   */
  findSentThresholds(
    kind: ObligationKind,
    obligationIds: readonly string[]
  ): Promise<Result<SentThreshold[], DatabaseError>>;

  insert(record: NewAlertRecord): Promise<Result<AlertRecord, DatabaseError>>;

  /** Newest first */
  list(filter: AlertHistoryFilter): Promise<Result<OffsetPage<AlertRecord>, DatabaseError>>;

  /** Returns the number of deleted records */
  deleteOlderThan(cutoff: Date): Promise<Result<number, DatabaseError>>;

  getStats(window: StatsWindow): Promise<Result<AlertStats, DatabaseError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

export interface AlertEmailRenderer {
  render(alert: DueAlert): Promise<Result<RenderedAlertEmail, RenderError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Run context
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Everything an alert run touches. Absent outside a running application.
 */
export interface AlertRunContext {
  obligationsRepo: ObligationsRepository;
  alertRecordsRepo: AlertRecordsRepository;
  emailSender: EmailSender;
  renderer: AlertEmailRenderer;
  cacheInvalidator: CacheInvalidator;
  logger: Logger;
  timeZone: string;
  now: () => Date;
}
