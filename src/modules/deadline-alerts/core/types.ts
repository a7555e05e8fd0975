/**
 * Deadline Alerts Module - Core Types
 *
 * Documents that expire, debts that reach their final due date and unpaid
 * debt installments are all "obligations".
 * An obligation is warned once per threshold, on the exact day its remaining
 * days equal the threshold.
 */

import { Type, type Static } from '@sinclair/typebox';

import type { IsoDate } from '../../../common/dates.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const OBLIGATION_KINDS = ['document', 'debt', 'installment'] as const;
export type ObligationKind = (typeof OBLIGATION_KINDS)[number];

export const isObligationKind = (value: string): value is ObligationKind =>
  OBLIGATION_KINDS.some((kind) => kind === value);

/** Days before expiry at which a document is warned */
export const DOCUMENT_THRESHOLDS: readonly number[] = [30, 15, 7, 3, 1];

/** Days before the due date at which a debt or an unpaid installment is warned */
export const DEBT_THRESHOLDS: readonly number[] = [180, 90, 30, 15, 7, 3, 1];

/** History older than this is purged by the scheduled job */
export const DEFAULT_RETENTION_DAYS = 90;

export const OBLIGATION_CACHE_TTL_MS = 5 * 60 * 1000;
export const ALERT_STATS_CACHE_TTL_MS = 5 * 60 * 1000;

export const DEFAULT_HISTORY_LIMIT = 50;
export const MAX_HISTORY_LIMIT = 200;

// ─────────────────────────────────────────────────────────────────────────────
// Obligations
// ─────────────────────────────────────────────────────────────────────────────

export const DocumentObligationDetailsSchema = Type.Object({
  kind: Type.Literal('document'),
  /** Kind label, the custom kind for 'other' */
  documentKind: Type.String(),
  issuedOn: Type.String(),
  farmName: Type.Union([Type.String(), Type.Null()]),
  personName: Type.Union([Type.String(), Type.Null()]),
});

/**
 * Amounts are decimal strings; they are only displayed.
 */
export const DebtObligationDetailsSchema = Type.Object({
  kind: Type.Literal('debt'),
  bank: Type.String(),
  proposalNumber: Type.String(),
  interestRate: Type.String(),
  rateBasis: Type.String(),
  amount: Type.String(),
  outstandingAmount: Type.String(),
  people: Type.Array(Type.String()),
});

/**
 * An installment carries the alert settings of its debt.
 */
export const InstallmentObligationDetailsSchema = Type.Object({
  kind: Type.Literal('installment'),
  debtId: Type.String(),
  bank: Type.String(),
  proposalNumber: Type.String(),
  amount: Type.String(),
  people: Type.Array(Type.String()),
});

/**
 * Obligations are plain JSON so lookups can be cached.
 */
export const ObligationSchema = Type.Object({
  kind: Type.Union([
    Type.Literal('document'),
    Type.Literal('debt'),
    Type.Literal('installment'),
  ]),
  id: Type.String(),
  title: Type.String(),
  dueOn: Type.String(),
  /** Normalized, possibly empty */
  recipients: Type.Array(Type.String()),
  active: Type.Boolean(),
  thresholds: Type.Array(Type.Integer()),
  details: Type.Union([
    DocumentObligationDetailsSchema,
    DebtObligationDetailsSchema,
    InstallmentObligationDetailsSchema,
  ]),
});

export type DocumentObligationDetails = Static<typeof DocumentObligationDetailsSchema>;
export type DebtObligationDetails = Static<typeof DebtObligationDetailsSchema>;
export type InstallmentObligationDetails = Static<typeof InstallmentObligationDetailsSchema>;
export type ObligationDetails =
  | DocumentObligationDetails
  | DebtObligationDetails
  | InstallmentObligationDetails;
export type Obligation = Static<typeof ObligationSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Alert Records
// ─────────────────────────────────────────────────────────────────────────────

export interface AlertRecord {
  id: string;
  kind: ObligationKind;
  obligationId: string;
  thresholdDays: number;
  daysRemaining: number;
  sentAt: Date;
  success: boolean;
  recipients: string[];
  errorMessage: string | null;
  emailId: string | null;
}

export type NewAlertRecord = Omit<AlertRecord, 'id' | 'sentAt'>;

/**
 * A threshold already warned successfully.
 */
export interface SentThreshold {
  obligationId: string;
  thresholdDays: number;
}

export interface AlertHistoryFilter {
  kind?: ObligationKind;
  obligationId?: string;
  limit: number;
  offset: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Planning
// ─────────────────────────────────────────────────────────────────────────────

export interface DueAlert {
  obligation: Obligation;
  thresholdDays: number;
  daysRemaining: number;
}

export interface SkippedAlert {
  kind: ObligationKind;
  obligationId: string;
  thresholdDays: number;
  reason: 'no_recipients';
}

export interface AlertPlan {
  today: IsoDate;
  due: DueAlert[];
  skipped: SkippedAlert[];
}

export interface AlertRunSummary {
  /** null when the run was aborted before resolving the date */
  today: IsoDate | null;
  aborted: boolean;
  /** Alerts sent and recorded successfully */
  processed: number;
  failed: number;
  skipped: number;
  due: number;
}

export interface UpcomingAlert {
  thresholdDays: number;
  sendOn: IsoDate;
  daysUntilSend: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Statistics (JSON-safe, cached)
// ─────────────────────────────────────────────────────────────────────────────

export const AlertStatsSchema = Type.Object({
  total: Type.Integer({ minimum: 0 }),
  successful: Type.Integer({ minimum: 0 }),
  failed: Type.Integer({ minimum: 0 }),
  sentToday: Type.Integer({ minimum: 0 }),
  sentThisMonth: Type.Integer({ minimum: 0 }),
});

export type AlertStats = Static<typeof AlertStatsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Rendered email
// ─────────────────────────────────────────────────────────────────────────────

export interface RenderedAlertEmail {
  subject: string;
  html: string;
  text: string;
}
