/**
 * Deadline alert jobs: queue name, job names, payloads and schedulers.
 */

import type { IsoDate } from '../../../../common/dates.js';
import type { AlertRunSummary } from '../../core/types.js';
import type { Queue } from 'bullmq';
import type { Logger } from 'pino';

export const DEADLINE_ALERTS_QUEUE = 'deadline-alerts';

export const RUN_ALERTS_JOB = 'run-alerts';
export const PURGE_HISTORY_JOB = 'purge-history';

export interface DeadlineAlertsJobData {
  /** run-alerts: overrides today */
  date?: IsoDate;
  /** purge-history: retention override */
  olderThanDays?: number;
}

export type DeadlineAlertsJobResult =
  | { job: typeof RUN_ALERTS_JOB; summary: AlertRunSummary }
  | { job: typeof PURGE_HISTORY_JOB; aborted: boolean; deleted: number };

export interface DeadlineAlertsSchedule {
  runCron: string;
  purgeCron: string;
  timeZone: string;
  retentionDays: number;
}

/**
 * Registers (or updates) the repeatable jobs. Each job runs once per firing;
 * a failed send waits for the next firing.
 */
export const scheduleDeadlineAlertJobs = async (
  queue: Queue<DeadlineAlertsJobData>,
  schedule: DeadlineAlertsSchedule,
  logger: Logger
): Promise<void> => {
  const log = logger.child({ component: 'DeadlineAlertsScheduler' });
  const jobOptions = { attempts: 1, removeOnComplete: 100, removeOnFail: 500 };

  await queue.upsertJobScheduler(
    RUN_ALERTS_JOB,
    { pattern: schedule.runCron, tz: schedule.timeZone },
    { name: RUN_ALERTS_JOB, data: {}, opts: jobOptions }
  );

  await queue.upsertJobScheduler(
    PURGE_HISTORY_JOB,
    { pattern: schedule.purgeCron, tz: schedule.timeZone },
    {
      name: PURGE_HISTORY_JOB,
      data: { olderThanDays: schedule.retentionDays },
      opts: jobOptions,
    }
  );

  log.info(
    { runCron: schedule.runCron, purgeCron: schedule.purgeCron, timeZone: schedule.timeZone },
    'Deadline alert jobs scheduled'
  );
};
