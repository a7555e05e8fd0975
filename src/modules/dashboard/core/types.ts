/**
 * Dashboard Module - Core Types
 */

import { Type, type Static } from '@sinclair/typebox';

import type { IsoDate } from '../../../common/dates.js';

/** Window for the "soon" counters */
export const DUE_SOON_DAYS = 30;

export const DASHBOARD_CACHE_TTL_MS = 5 * 60 * 1000;

export const DashboardSummarySchema = Type.Object({
  people: Type.Integer({ minimum: 0 }),
  farms: Type.Integer({ minimum: 0 }),
  documents: Type.Integer({ minimum: 0 }),
  debts: Type.Integer({ minimum: 0 }),
  documentsExpiringSoon: Type.Integer({ minimum: 0 }),
  debtsDueSoon: Type.Integer({ minimum: 0 }),
  /** Unpaid installments, two decimal places */
  outstandingAmount: Type.String(),
});

export type DashboardSummary = Static<typeof DashboardSummarySchema>;

/**
 * Inclusive date range of the "soon" counters.
 */
export interface DashboardWindow {
  today: IsoDate;
  until: IsoDate;
}
