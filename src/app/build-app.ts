/**
 * Fastify application factory
 *
 * This is the composition root where all modules are wired together.
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { createAppContextHolder, makeAlertRunContext } from './app-context.js';
import {
  wrapAlertRecordsRepo,
  wrapDashboardRepo,
  wrapObligationsRepo,
  wrapPeopleRepo,
} from './cache-wrappers.js';
import {
  createCacheConfig,
  initCache,
  makeCacheInvalidator,
  type CacheClient,
} from '../infra/cache/index.js';
import { registerCors, registerSecurityHeaders } from '../infra/plugins/index.js';
import { makeDashboardRepo, makeDashboardRoutes } from '../modules/dashboard/index.js';
import {
  makeAlertRecordsRepo,
  makeDeadlineAlertRoutes,
  makeObligationsRepo,
  type AlertRunContext,
} from '../modules/deadline-alerts/index.js';
import { makeDebtRoutes, makeDebtsRepo } from '../modules/debts/index.js';
import { makeDocumentRoutes, makeDocumentsRepo } from '../modules/documents/index.js';
import { makeFarmRoutes, makeFarmsRepo } from '../modules/farms/index.js';
import {
  cacheDependency,
  databaseDependency,
  makeHealthRoutes,
  type DependencyCheck,
} from '../modules/health/index.js';
import { makePeopleRepo, makePeopleRoutes } from '../modules/people/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { FarmDbClient } from '../infra/database/client.js';
import type { EmailSender } from '../infra/email/index.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  db: FarmDbClient;
  /** Logger for repositories and components; Fastify keeps its own request logger */
  logger: Logger;
  /** Auto-initialized from config if not provided */
  cacheClient?: CacheClient;
  /** Defaults to the database and the cache */
  healthChecks?: DependencyCheck[];
  /** Without a sender, manual alert runs report an aborted run */
  emailSender?: EmailSender;
  now?: () => Date;
}

export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
  version?: string | undefined;
}

/**
 * Request validation settings. Unknown body fields fail with 400 instead of
 * being stripped by Ajv.
 */
export const AJV_OPTIONS = { customOptions: { removeAdditional: false } } as const;

export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps, version } = options;
  const { config, db, logger, emailSender, now } = deps;
  const timeZone = config.alerts.timeZone;

  const app = fastifyLib({
    ...fastifyOptions,
    ajv: AJV_OPTIONS,
  });

  await registerCors(app, config);
  await registerSecurityHeaders(app, config);

  // ─────────────────────────────────────────────────────────────────────────────
  // Cache
  // ─────────────────────────────────────────────────────────────────────────────
  const { cache, keyBuilder, rawCache } =
    deps.cacheClient ?? initCache({ config: createCacheConfig(config), logger });
  const cacheInvalidator = makeCacheInvalidator(cache, logger);

  // ─────────────────────────────────────────────────────────────────────────────
  // Repositories
  // ─────────────────────────────────────────────────────────────────────────────
  const peopleRepo = wrapPeopleRepo(makePeopleRepo({ db, logger }), cache, keyBuilder);
  const farmsRepo = makeFarmsRepo({ db, logger });
  const documentsRepo = makeDocumentsRepo({ db, logger });
  const debtsRepo = makeDebtsRepo({ db, logger });
  const dashboardRepo = wrapDashboardRepo(makeDashboardRepo({ db, logger }), cache, keyBuilder);
  const obligationsRepo = wrapObligationsRepo(
    makeObligationsRepo({ db, logger }),
    cache,
    keyBuilder
  );
  const alertRecordsRepo = wrapAlertRecordsRepo(
    makeAlertRecordsRepo({ db, logger }),
    cache,
    keyBuilder
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // Alert run context (manual triggers)
  // ─────────────────────────────────────────────────────────────────────────────
  const runContext = createAppContextHolder<AlertRunContext>();
  if (emailSender !== undefined) {
    runContext.set(
      makeAlertRunContext({
        obligationsRepo,
        alertRecordsRepo,
        emailSender,
        cacheInvalidator,
        logger,
        timeZone,
        ...(now !== undefined && { now }),
      })
    );
  } else {
    logger.warn('Email is not configured; manual alert runs will be skipped');
  }

  app.addHook('onClose', (_instance, done) => {
    runContext.clear();
    done();
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Error handling
  // ─────────────────────────────────────────────────────────────────────────────
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    if (error.validation !== undefined) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    if (error.statusCode !== undefined) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Routes
  // ─────────────────────────────────────────────────────────────────────────────
  await app.register(
    makeHealthRoutes({
      version,
      checks: deps.healthChecks ?? [databaseDependency(db), cacheDependency(rawCache)],
    })
  );

  await app.register(makePeopleRoutes({ peopleRepo, cacheInvalidator }));
  await app.register(makeFarmRoutes({ farmsRepo, cacheInvalidator }));
  await app.register(makeDocumentRoutes({ documentsRepo, cacheInvalidator, timeZone }));
  await app.register(
    makeDebtRoutes({
      debtsRepo,
      cacheInvalidator,
      timeZone,
      ...(now !== undefined && { now }),
    })
  );
  await app.register(
    makeDashboardRoutes({ dashboardRepo, timeZone, ...(now !== undefined && { now }) })
  );
  await app.register(
    makeDeadlineAlertRoutes({
      obligationsRepo,
      alertRecordsRepo,
      cacheInvalidator,
      getRunContext: runContext.get,
      triggerApiKey: config.alerts.apiKey,
      timeZone,
      logger,
      ...(now !== undefined && { now }),
    })
  );

  return app;
};
