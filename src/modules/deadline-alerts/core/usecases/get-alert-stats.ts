/**
 * Get Alert Stats Use Case
 *
 * "Today" and "this month" are calendar periods in the alert timezone and
 * count successful sends only.
 */

import type { Result } from 'neverthrow';

import { startOfMonth, todayIn } from '../../../../common/dates.js';

import type { DatabaseError } from '../errors.js';
import type { AlertRecordsRepository } from '../ports.js';
import type { AlertStats } from '../types.js';

export interface GetAlertStatsDeps {
  alertRecordsRepo: AlertRecordsRepository;
}

export interface GetAlertStatsInput {
  now: Date;
  timeZone: string;
}

export async function getAlertStats(
  deps: GetAlertStatsDeps,
  input: GetAlertStatsInput
): Promise<Result<AlertStats, DatabaseError>> {
  const today = todayIn(input.timeZone, input.now);

  return deps.alertRecordsRepo.getStats({
    timeZone: input.timeZone,
    today,
    monthStart: startOfMonth(today),
  });
}
