/**
 * Purge Alert History Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { createValidationError, type DeadlineAlertsError } from '../errors.js';
import { DEFAULT_RETENTION_DAYS } from '../types.js';

import type { CacheInvalidator } from '../../../../infra/cache/index.js';
import type { AlertRecordsRepository } from '../ports.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface PurgeAlertHistoryDeps {
  alertRecordsRepo: AlertRecordsRepository;
  cacheInvalidator: CacheInvalidator;
}

export interface PurgeAlertHistoryInput {
  olderThanDays?: number;
  now: Date;
}

export interface PurgeAlertHistoryOutput {
  deleted: number;
  cutoff: Date;
}

/**
 * Deletes records sent before `now - olderThanDays`.
 */
export async function purgeAlertHistory(
  deps: PurgeAlertHistoryDeps,
  input: PurgeAlertHistoryInput
): Promise<Result<PurgeAlertHistoryOutput, DeadlineAlertsError>> {
  const olderThanDays = input.olderThanDays ?? DEFAULT_RETENTION_DAYS;
  if (!Number.isInteger(olderThanDays) || olderThanDays < 1) {
    return err(createValidationError('olderThanDays must be a positive integer', 'olderThanDays'));
  }

  const cutoff = new Date(input.now.getTime() - olderThanDays * MS_PER_DAY);

  const result = await deps.alertRecordsRepo.deleteOlderThan(cutoff);
  if (result.isErr()) {
    return err(result.error);
  }

  await deps.cacheInvalidator.invalidate('alert');

  return ok({ deleted: result.value, cutoff });
}
