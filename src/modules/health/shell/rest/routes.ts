/**
 * Health Routes
 *
 * `/health/live` never touches a dependency, so a database outage does not
 * get the process restarted. `/health/ready` answers 503 while a critical
 * dependency is down.
 */

import {
  DEFAULT_CHECK_TIMEOUT_MS,
  LivenessReportSchema,
  ReadinessReportSchema,
  type LivenessReport,
  type ReadinessReport,
} from '../../core/types.js';
import { checkReadiness } from '../../core/usecases/check-readiness.js';

import type { DependencyCheck } from '../../core/ports.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeHealthRoutesDeps {
  checks?: readonly DependencyCheck[];
  version?: string | undefined;
  timeoutMs?: number;
  now?: () => Date;
}

export const makeHealthRoutes = (deps: MakeHealthRoutesDeps = {}): FastifyPluginAsync => {
  const {
    checks = [],
    version,
    timeoutMs = DEFAULT_CHECK_TIMEOUT_MS,
    now = () => new Date(),
  } = deps;
  const startedAt = now().getTime();
  const uptimeSeconds = (at: Date): number =>
    Math.max(0, Math.floor((at.getTime() - startedAt) / 1000));

  // eslint-disable-next-line @typescript-eslint/require-await -- FastifyPluginAsync contract
  return async (fastify) => {
    fastify.get<{ Reply: LivenessReport }>(
      '/health/live',
      { schema: { response: { 200: LivenessReportSchema } } },
      async (_request, reply) => {
        return reply.send({ state: 'alive', uptimeSeconds: uptimeSeconds(now()) });
      }
    );

    fastify.get<{ Reply: ReadinessReport }>(
      '/health/ready',
      { schema: { response: { 200: ReadinessReportSchema, 503: ReadinessReportSchema } } },
      async (_request, reply) => {
        const at = now();
        const report = await checkReadiness(
          { checks, timeoutMs },
          { checkedAt: at.toISOString(), uptimeSeconds: uptimeSeconds(at), version }
        );
        return reply.status(report.state === 'unavailable' ? 503 : 200).send(report);
      }
    );
  };
};
