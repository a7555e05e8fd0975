/**
 * Get Dashboard Summary Use Case
 */

import { err, type Result } from 'neverthrow';

import { addDays, isIsoDate, type IsoDate } from '../../../../common/dates.js';
import {
  createValidationError,
  type DatabaseError,
  type ValidationError,
} from '../../../../common/errors.js';
import { DUE_SOON_DAYS, type DashboardSummary } from '../types.js';

import type { DashboardRepository } from '../ports.js';

export type DashboardError = DatabaseError | ValidationError;

export const DASHBOARD_ERROR_HTTP_STATUS: Record<DashboardError['type'], number> = {
  DatabaseError: 500,
  ValidationError: 400,
};

export const getHttpStatusForError = (error: DashboardError): number =>
  DASHBOARD_ERROR_HTTP_STATUS[error.type];

export interface GetDashboardSummaryDeps {
  dashboardRepo: DashboardRepository;
}

export interface GetDashboardSummaryInput {
  today: IsoDate;
}

export async function getDashboardSummary(
  deps: GetDashboardSummaryDeps,
  input: GetDashboardSummaryInput
): Promise<Result<DashboardSummary, DashboardError>> {
  const { today } = input;
  if (!isIsoDate(today)) {
    return err(createValidationError(`Invalid date '${today}'`, 'today'));
  }

  return deps.dashboardRepo.getSummary({ today, until: addDays(today, DUE_SOON_DAYS) });
}
