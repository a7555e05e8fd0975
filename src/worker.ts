/**
 * Worker entry point
 *
 * Schedules the deadline alert jobs and processes them. Requires Redis and
 * email to be configured.
 */

import { Redis } from 'ioredis';

import { createAppContextHolder, makeAlertRunContext } from './app/app-context.js';
import { wrapAlertRecordsRepo } from './app/cache-wrappers.js';
import { createCacheConfig, initCache, makeCacheInvalidator } from './infra/cache/index.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { makeEmailClient } from './infra/email/index.js';
import { createLogger } from './infra/logger/index.js';
import { makeQueueClient } from './infra/queue/index.js';
import {
  DEADLINE_ALERTS_QUEUE,
  makeAlertRecordsRepo,
  makeDeadlineAlertsProcessor,
  makeObligationsRepo,
  scheduleDeadlineAlertJobs,
  type AlertRunContext,
  type DeadlineAlertsJobData,
  type DeadlineAlertsJobResult,
} from './modules/deadline-alerts/index.js';

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'farm-ledger-worker',
    pretty: config.logger.pretty,
  });

  if (config.redis.url === undefined) {
    throw new Error('REDIS_URL is required to run the worker');
  }
  if (config.email.resendApiKey === undefined) {
    throw new Error('RESEND_API_KEY is required to run the worker');
  }

  const { timeZone, cron, purgeCron, retentionDays, queuePrefix } = config.alerts;

  const db = initDatabase(config);
  const { cache, keyBuilder } = initCache({ config: createCacheConfig(config), logger });
  const cacheInvalidator = makeCacheInvalidator(cache, logger);

  // BullMQ needs blocking commands to wait indefinitely
  const redis = new Redis(config.redis.url, { maxRetriesPerRequest: null });
  const queueClient = makeQueueClient({ redis, prefix: queuePrefix, logger });

  const contextHolder = createAppContextHolder<AlertRunContext>();
  contextHolder.set(
    makeAlertRunContext({
      obligationsRepo: makeObligationsRepo({ db, logger }),
      alertRecordsRepo: wrapAlertRecordsRepo(
        makeAlertRecordsRepo({ db, logger }),
        cache,
        keyBuilder
      ),
      emailSender: makeEmailClient({
        apiKey: config.email.resendApiKey,
        fromAddress: config.email.fromAddress,
        logger,
      }),
      cacheInvalidator,
      logger,
      timeZone,
    })
  );

  const queue = queueClient.getQueue<DeadlineAlertsJobData>(DEADLINE_ALERTS_QUEUE);
  await scheduleDeadlineAlertJobs(
    queue,
    { runCron: cron, purgeCron, timeZone, retentionDays },
    logger
  );

  queueClient.createWorker<DeadlineAlertsJobData, DeadlineAlertsJobResult>({
    name: DEADLINE_ALERTS_QUEUE,
    processor: makeDeadlineAlertsProcessor({
      getContext: contextHolder.get,
      retentionDays,
      logger,
    }),
    options: { concurrency: 1 },
  });

  logger.info({ queue: DEADLINE_ALERTS_QUEUE }, 'Worker started');

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    // Jobs still picked up from here on find no context and do nothing
    contextHolder.clear();

    try {
      await queueClient.close();
      await redis.quit();
      await db.destroy();
      logger.info('Worker stopped gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
