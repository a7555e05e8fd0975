/**
 * Pure scheduling logic for deadline alerts.
 */

import { addDays, daysBetween, type IsoDate } from '../../../common/dates.js';

import type {
  AlertPlan,
  DueAlert,
  Obligation,
  ObligationKind,
  SkippedAlert,
  UpcomingAlert,
} from './types.js';

/**
 * Key of a (kind, obligation, threshold) triple in the sent index.
 */
export const sentAlertKey = (
  kind: ObligationKind,
  obligationId: string,
  thresholdDays: number
): string => `${kind}:${obligationId}:${String(thresholdDays)}`;

/**
 * Thresholds without duplicates, largest first.
 */
export const uniqueThresholds = (thresholds: readonly number[]): number[] =>
  [...new Set(thresholds)].sort((a, b) => b - a);

/**
 * Decides which alerts are due today.
 *
 * A threshold is due only on the exact day the remaining days equal it, and
 * only when no successful alert exists for it in `sent`. Inactive, past-due
 * and same-day obligations produce nothing. A due obligation without
 * recipients is reported as skipped.
 */
export const planDeadlineAlerts = (
  obligations: readonly Obligation[],
  sent: ReadonlySet<string>,
  today: IsoDate
): AlertPlan => {
  const due: DueAlert[] = [];
  const skipped: SkippedAlert[] = [];

  for (const obligation of obligations) {
    if (!obligation.active) continue;

    const daysRemaining = daysBetween(today, obligation.dueOn);
    if (daysRemaining <= 0) continue;

    for (const thresholdDays of uniqueThresholds(obligation.thresholds)) {
      if (thresholdDays !== daysRemaining) continue;
      if (sent.has(sentAlertKey(obligation.kind, obligation.id, thresholdDays))) continue;

      if (obligation.recipients.length === 0) {
        skipped.push({
          kind: obligation.kind,
          obligationId: obligation.id,
          thresholdDays,
          reason: 'no_recipients',
        });
        continue;
      }

      due.push({ obligation, thresholdDays, daysRemaining });
    }
  }

  return { today, due, skipped };
};

/**
 * Future send dates of an obligation, soonest first.
 */
export const computeUpcomingAlerts = (
  obligation: Obligation,
  sentThresholds: ReadonlySet<number>,
  today: IsoDate
): UpcomingAlert[] => {
  if (!obligation.active) return [];

  const upcoming: UpcomingAlert[] = [];
  for (const thresholdDays of uniqueThresholds(obligation.thresholds)) {
    if (sentThresholds.has(thresholdDays)) continue;

    const sendOn = addDays(obligation.dueOn, -thresholdDays);
    const daysUntilSend = daysBetween(today, sendOn);
    if (daysUntilSend < 0) continue;

    upcoming.push({ thresholdDays, sendOn, daysUntilSend });
  }

  return upcoming;
};
