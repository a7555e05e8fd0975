/**
 * Plan Deadline Alerts Use Case
 *
 * Loads the active obligations of both kinds and decides which alerts are
 * due on the given day. Nothing is sent.
 */

import { err, ok, type Result } from 'neverthrow';

import { isIsoDate, type IsoDate } from '../../../../common/dates.js';
import { createValidationError, type DeadlineAlertsError } from '../errors.js';
import { planDeadlineAlerts, sentAlertKey } from '../planning.js';
import { OBLIGATION_KINDS, type AlertPlan, type Obligation } from '../types.js';

import type { AlertRecordsRepository, ObligationsRepository } from '../ports.js';

export interface PlanDeadlineAlertsDeps {
  obligationsRepo: ObligationsRepository;
  alertRecordsRepo: AlertRecordsRepository;
}

export interface PlanDeadlineAlertsInput {
  today: IsoDate;
}

export async function planDeadlineAlertsForDay(
  deps: PlanDeadlineAlertsDeps,
  input: PlanDeadlineAlertsInput
): Promise<Result<AlertPlan, DeadlineAlertsError>> {
  const { today } = input;
  if (!isIsoDate(today)) {
    return err(createValidationError(`Invalid date '${today}'`, 'date'));
  }

  const obligations: Obligation[] = [];
  const sent = new Set<string>();

  for (const kind of OBLIGATION_KINDS) {
    const activeResult = await deps.obligationsRepo.listActive(kind, today);
    if (activeResult.isErr()) {
      return err(activeResult.error);
    }

    const active = activeResult.value;
    if (active.length === 0) continue;

    const sentResult = await deps.alertRecordsRepo.findSentThresholds(
      kind,
      active.map((obligation) => obligation.id)
    );
    if (sentResult.isErr()) {
      return err(sentResult.error);
    }

    for (const { obligationId, thresholdDays } of sentResult.value) {
      sent.add(sentAlertKey(kind, obligationId, thresholdDays));
    }
    obligations.push(...active);
  }

  return ok(planDeadlineAlerts(obligations, sent, today));
}
