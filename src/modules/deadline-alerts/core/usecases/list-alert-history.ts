/**
 * List Alert History Use Case
 */

import type { Result } from 'neverthrow';

import { clampLimit, type OffsetPage } from '../../../../common/constants/pagination.js';
import { DEFAULT_HISTORY_LIMIT, MAX_HISTORY_LIMIT } from '../types.js';

import type { DatabaseError } from '../errors.js';
import type { AlertRecordsRepository } from '../ports.js';
import type { AlertHistoryFilter, AlertRecord, ObligationKind } from '../types.js';

export interface ListAlertHistoryDeps {
  alertRecordsRepo: AlertRecordsRepository;
}

export interface ListAlertHistoryInput {
  kind?: ObligationKind;
  obligationId?: string;
  limit?: number;
  offset?: number;
}

export async function listAlertHistory(
  deps: ListAlertHistoryDeps,
  input: ListAlertHistoryInput
): Promise<Result<OffsetPage<AlertRecord>, DatabaseError>> {
  const { kind, obligationId } = input;

  const filter: AlertHistoryFilter = {
    limit: clampLimit(input.limit, DEFAULT_HISTORY_LIMIT, MAX_HISTORY_LIMIT),
    offset: Math.max(0, Math.trunc(input.offset ?? 0)),
    ...(kind !== undefined && { kind }),
    ...(obligationId !== undefined && { obligationId }),
  };

  return deps.alertRecordsRepo.list(filter);
}
