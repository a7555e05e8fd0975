/**
 * List Upcoming Alerts Use Case
 */

import { err, ok, type Result } from 'neverthrow';

import { computeUpcomingAlerts } from '../planning.js';
import { createObligationNotFoundError, type DeadlineAlertsError } from '../errors.js';

import type { IsoDate } from '../../../../common/dates.js';
import type { AlertRecordsRepository, ObligationsRepository } from '../ports.js';
import type { ObligationKind, UpcomingAlert } from '../types.js';

export interface ListUpcomingAlertsDeps {
  obligationsRepo: ObligationsRepository;
  alertRecordsRepo: AlertRecordsRepository;
}

export interface ListUpcomingAlertsInput {
  kind: ObligationKind;
  obligationId: string;
  today: IsoDate;
}

export async function listUpcomingAlerts(
  deps: ListUpcomingAlertsDeps,
  input: ListUpcomingAlertsInput
): Promise<Result<UpcomingAlert[], DeadlineAlertsError>> {
  const { kind, obligationId, today } = input;

  const found = await deps.obligationsRepo.find(kind, obligationId);
  if (found.isErr()) {
    return err(found.error);
  }
  if (found.value === null) {
    return err(createObligationNotFoundError(kind, obligationId));
  }

  const sentResult = await deps.alertRecordsRepo.findSentThresholds(kind, [obligationId]);
  if (sentResult.isErr()) {
    return err(sentResult.error);
  }

  const sent = new Set(sentResult.value.map((row) => row.thresholdDays));
  return ok(computeUpcomingAlerts(found.value, sent, today));
}
