/**
 * Deadline Alerts REST Routes
 *
 * Read endpoints are open; the manual run and purge triggers require the
 * `x-alerts-api-key` header.
 */

import {
  HistoryQuerySchema,
  PurgeBodySchema,
  RunBodySchema,
  UpcomingQuerySchema,
  type HistoryQuery,
  type PurgeBody,
  type RunBody,
  type UpcomingQuery,
} from './schemas.js';
import { todayIn } from '../../../../common/dates.js';
import { sendData, sendError } from '../../../../common/http.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { getAlertStats } from '../../core/usecases/get-alert-stats.js';
import { listAlertHistory } from '../../core/usecases/list-alert-history.js';
import { listUpcomingAlerts } from '../../core/usecases/list-upcoming-alerts.js';
import { planDeadlineAlertsForDay } from '../../core/usecases/plan-deadline-alerts.js';
import { purgeAlertHistory } from '../../core/usecases/purge-alert-history.js';
import { runDeadlineAlerts } from '../../core/usecases/run-deadline-alerts.js';

import type { CacheInvalidator } from '../../../../infra/cache/index.js';
import type {
  AlertRecordsRepository,
  AlertRunContext,
  ObligationsRepository,
} from '../../core/ports.js';
import type { AlertPlan, AlertRecord } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import type { Logger } from 'pino';

export const ALERTS_API_KEY_HEADER = 'x-alerts-api-key';

export interface MakeDeadlineAlertRoutesDeps {
  obligationsRepo: ObligationsRepository;
  alertRecordsRepo: AlertRecordsRepository;
  cacheInvalidator: CacheInvalidator;
  /** Run context of the live application; undefined once it shuts down */
  getRunContext: () => AlertRunContext | undefined;
  /** When unset, the trigger endpoints reject every request */
  triggerApiKey: string | undefined;
  timeZone: string;
  logger: Logger;
  now?: () => Date;
}

const formatRecord = (record: AlertRecord) => ({
  ...record,
  sentAt: record.sentAt.toISOString(),
});

const formatPlan = (plan: AlertPlan) => ({
  today: plan.today,
  due: plan.due.map(({ obligation, thresholdDays, daysRemaining }) => ({
    kind: obligation.kind,
    obligationId: obligation.id,
    title: obligation.title,
    dueOn: obligation.dueOn,
    thresholdDays,
    daysRemaining,
    recipients: obligation.recipients,
  })),
  skipped: plan.skipped,
});

export const makeDeadlineAlertRoutes = (deps: MakeDeadlineAlertRoutesDeps): FastifyPluginAsync => {
  const {
    obligationsRepo,
    alertRecordsRepo,
    cacheInvalidator,
    getRunContext,
    triggerApiKey,
    timeZone,
    logger,
    now = () => new Date(),
  } = deps;
  const log = logger.child({ routes: 'deadline-alerts' });

  // eslint-disable-next-line @typescript-eslint/require-await -- FastifyPluginAsync contract
  return async (fastify) => {
    const authenticateApiKey = (
      request: FastifyRequest,
      reply: FastifyReply,
      done: (err?: Error) => void
    ): void => {
      const apiKey = request.headers[ALERTS_API_KEY_HEADER];

      if (triggerApiKey === undefined || apiKey !== triggerApiKey) {
        log.warn({ hasKey: apiKey !== undefined }, 'Invalid or missing alerts API key');
        void reply
          .status(401)
          .send({ ok: false, error: 'UnauthorizedError', message: 'Invalid API key' });
        return;
      }
      done();
    };

    fastify.get('/api/v1/alerts/stats', async (_request, reply) => {
      const result = await getAlertStats({ alertRecordsRepo }, { now: now(), timeZone });
      if (result.isErr()) {
        return sendError(reply, result.error, getHttpStatusForError);
      }
      return sendData(reply, result.value);
    });

    fastify.get<{ Querystring: HistoryQuery }>(
      '/api/v1/alerts/history',
      { schema: { querystring: HistoryQuerySchema } },
      async (request, reply) => {
        const result = await listAlertHistory({ alertRecordsRepo }, request.query);
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        const { items, total, limit, offset } = result.value;
        return sendData(reply, { items: items.map(formatRecord), total, limit, offset });
      }
    );

    fastify.get<{ Querystring: UpcomingQuery }>(
      '/api/v1/alerts/upcoming',
      { schema: { querystring: UpcomingQuerySchema } },
      async (request, reply) => {
        const result = await listUpcomingAlerts(
          { obligationsRepo, alertRecordsRepo },
          { ...request.query, today: todayIn(timeZone, now()) }
        );
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, result.value);
      }
    );

    fastify.post<{ Body: RunBody }>(
      '/api/v1/alerts/run',
      { preHandler: authenticateApiKey, schema: { body: RunBodySchema } },
      async (request, reply) => {
        const { date, dryRun = false } = request.body;

        if (dryRun) {
          const today = date ?? todayIn(timeZone, now());
          const result = await planDeadlineAlertsForDay(
            { obligationsRepo, alertRecordsRepo },
            { today }
          );
          if (result.isErr()) {
            return sendError(reply, result.error, getHttpStatusForError);
          }
          return sendData(reply, { dryRun: true, plan: formatPlan(result.value) });
        }

        const result = await runDeadlineAlerts(getRunContext(), {
          logger: log,
          ...(date !== undefined && { today: date }),
        });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, { dryRun: false, summary: result.value });
      }
    );

    fastify.post<{ Body: PurgeBody }>(
      '/api/v1/alerts/purge',
      { preHandler: authenticateApiKey, schema: { body: PurgeBodySchema } },
      async (request, reply) => {
        const result = await purgeAlertHistory(
          { alertRecordsRepo, cacheInvalidator },
          {
            now: now(),
            ...(request.body.olderThanDays !== undefined && {
              olderThanDays: request.body.olderThanDays,
            }),
          }
        );
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, {
          deleted: result.value.deleted,
          cutoff: result.value.cutoff.toISOString(),
        });
      }
    );
  };
};
