/**
 * Dashboard REST Routes
 */

import { todayIn } from '../../../../common/dates.js';
import { sendData, sendError } from '../../../../common/http.js';
import {
  getDashboardSummary,
  getHttpStatusForError,
} from '../../core/usecases/get-dashboard-summary.js';

import type { DashboardRepository } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeDashboardRoutesDeps {
  dashboardRepo: DashboardRepository;
  timeZone: string;
  now?: () => Date;
}

export const makeDashboardRoutes = (deps: MakeDashboardRoutesDeps): FastifyPluginAsync => {
  const { dashboardRepo, timeZone, now = () => new Date() } = deps;

  // eslint-disable-next-line @typescript-eslint/require-await -- FastifyPluginAsync contract
  return async (fastify) => {
    fastify.get('/api/v1/dashboard', async (_request, reply) => {
      const result = await getDashboardSummary(
        { dashboardRepo },
        { today: todayIn(timeZone, now()) }
      );
      if (result.isErr()) {
        return sendError(reply, result.error, getHttpStatusForError);
      }
      return sendData(reply, result.value);
    });
  };
};
