/**
 * Run Deadline Alerts Use Case
 *
 * Sends every alert due today and records the outcome of each send.
 * One email goes to all recipients of an obligation. A failed send is
 * recorded and left for the next scheduled run; nothing is retried here.
 */

import { err, ok, type Result } from 'neverthrow';

import { todayIn, type IsoDate } from '../../../../common/dates.js';

import { planDeadlineAlertsForDay } from './plan-deadline-alerts.js';

import type { DeadlineAlertsError } from '../errors.js';
import type { AlertRunContext } from '../ports.js';
import type { AlertRunSummary, DueAlert, NewAlertRecord } from '../types.js';
import type { Logger } from 'pino';

export interface RunDeadlineAlertsInput {
  /** Defaults to today in the context's timezone */
  today?: IsoDate;
  /** Used when no context is available */
  logger: Logger;
}

type SendOutcome = 'sent' | 'failed';

/**
 * Idempotency key of one alert on one day.
 */
export const buildAlertIdempotencyKey = (alert: DueAlert, today: IsoDate): string =>
  `${alert.obligation.kind}-${alert.obligation.id}-${String(alert.thresholdDays)}-${today}`;

const sendAndRecord = async (
  context: AlertRunContext,
  alert: DueAlert,
  today: IsoDate,
  log: Logger
): Promise<SendOutcome> => {
  const { obligation, thresholdDays, daysRemaining } = alert;
  const base = {
    kind: obligation.kind,
    obligationId: obligation.id,
    thresholdDays,
    daysRemaining,
    recipients: obligation.recipients,
  };

  let record: NewAlertRecord;

  const rendered = await context.renderer.render(alert);
  if (rendered.isErr()) {
    log.error({ err: rendered.error, ...base }, 'Failed to render deadline alert');
    record = { ...base, success: false, errorMessage: rendered.error.message, emailId: null };
  } else {
    const sendResult = await context.emailSender.send({
      to: obligation.recipients,
      subject: rendered.value.subject,
      html: rendered.value.html,
      text: rendered.value.text,
      idempotencyKey: buildAlertIdempotencyKey(alert, today),
      tags: [
        { name: 'obligation_kind', value: obligation.kind },
        { name: 'threshold_days', value: String(thresholdDays) },
      ],
    });

    if (sendResult.isErr()) {
      log.warn({ err: sendResult.error, ...base }, 'Deadline alert email failed');
      record = { ...base, success: false, errorMessage: sendResult.error.message, emailId: null };
    } else {
      record = { ...base, success: true, errorMessage: null, emailId: sendResult.value.emailId };
    }
  }

  const inserted = await context.alertRecordsRepo.insert(record);
  if (inserted.isErr()) {
    log.error(
      { err: inserted.error, ...base, emailId: record.emailId },
      'Failed to record deadline alert'
    );
    return 'failed';
  }

  return record.success ? 'sent' : 'failed';
};

export async function runDeadlineAlerts(
  context: AlertRunContext | undefined,
  input: RunDeadlineAlertsInput
): Promise<Result<AlertRunSummary, DeadlineAlertsError>> {
  if (context === undefined) {
    input.logger.warn('Deadline alert run requested without an application context; skipping');
    return ok({
      today: input.today ?? null,
      aborted: true,
      processed: 0,
      failed: 0,
      skipped: 0,
      due: 0,
    });
  }

  const log = context.logger.child({ component: 'DeadlineAlerts' });
  const today = input.today ?? todayIn(context.timeZone, context.now());

  const planResult = await planDeadlineAlertsForDay(context, { today });
  if (planResult.isErr()) {
    log.error({ err: planResult.error, today }, 'Failed to load obligations');
    return err(planResult.error);
  }

  const plan = planResult.value;
  let processed = 0;
  let failed = 0;

  for (const alert of plan.due) {
    const outcome = await sendAndRecord(context, alert, today, log);
    if (outcome === 'sent') {
      processed++;
    } else {
      failed++;
    }
  }

  if (processed + failed > 0) {
    await context.cacheInvalidator.invalidate('alert');
  }

  const summary: AlertRunSummary = {
    today,
    aborted: false,
    processed,
    failed,
    skipped: plan.skipped.length,
    due: plan.due.length,
  };

  log.info(summary, 'Deadline alert run finished');
  return ok(summary);
}
