/**
 * Deadline Alerts Job Processor
 *
 * Resolves the run context when a job starts. During shutdown the context is
 * gone and jobs finish without doing anything.
 */

import { purgeAlertHistory } from '../../core/usecases/purge-alert-history.js';
import { runDeadlineAlerts } from '../../core/usecases/run-deadline-alerts.js';

import {
  PURGE_HISTORY_JOB,
  RUN_ALERTS_JOB,
  type DeadlineAlertsJobData,
  type DeadlineAlertsJobResult,
} from './jobs.js';

import type { AlertRunContext } from '../../core/ports.js';
import type { Job } from 'bullmq';
import type { Logger } from 'pino';

/** The job fields the processor reads */
export type DeadlineAlertsJob = Pick<Job<DeadlineAlertsJobData>, 'id' | 'name' | 'data'>;

export type DeadlineAlertsProcessor = (job: DeadlineAlertsJob) => Promise<DeadlineAlertsJobResult>;

export interface DeadlineAlertsProcessorDeps {
  getContext: () => AlertRunContext | undefined;
  retentionDays: number;
  logger: Logger;
}

export const makeDeadlineAlertsProcessor = (
  deps: DeadlineAlertsProcessorDeps
): DeadlineAlertsProcessor => {
  const log = deps.logger.child({ component: 'DeadlineAlertsProcessor' });

  return async (job: DeadlineAlertsJob): Promise<DeadlineAlertsJobResult> => {
    log.debug({ jobId: job.id, jobName: job.name }, 'Processing deadline alerts job');

    const context = deps.getContext();

    if (job.name === PURGE_HISTORY_JOB) {
      if (context === undefined) {
        log.warn({ jobId: job.id }, 'No application context; skipping history purge');
        return { job: PURGE_HISTORY_JOB, aborted: true, deleted: 0 };
      }

      const result = await purgeAlertHistory(context, {
        olderThanDays: job.data.olderThanDays ?? deps.retentionDays,
        now: context.now(),
      });
      if (result.isErr()) {
        throw new Error(result.error.message);
      }
      return { job: PURGE_HISTORY_JOB, aborted: false, deleted: result.value.deleted };
    }

    if (job.name !== RUN_ALERTS_JOB) {
      throw new Error(`Unknown deadline alerts job '${job.name}'`);
    }

    const result = await runDeadlineAlerts(context, {
      logger: log,
      ...(job.data.date !== undefined && { today: job.data.date }),
    });
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    return { job: RUN_ALERTS_JOB, summary: result.value };
  };
};
