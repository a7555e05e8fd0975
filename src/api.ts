/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig, type AppConfig } from './infra/config/index.js';
import { initDatabase } from './infra/database/client.js';
import { makeEmailClient, type EmailSender } from './infra/email/index.js';
import { buildLoggerOptions, createLogger } from './infra/logger/index.js';

import type { Logger } from 'pino';

const APP_NAME = 'farm-ledger-server';

/**
 * Email is optional for the API: without it only the manual alert run is unavailable.
 */
const createEmailSender = (config: AppConfig, logger: Logger): EmailSender | undefined => {
  if (config.email.resendApiKey === undefined) {
    return undefined;
  }
  return makeEmailClient({
    apiKey: config.email.resendApiKey,
    fromAddress: config.email.fromAddress,
    logger,
  });
};

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const loggerConfig = {
    level: config.logger.level,
    name: APP_NAME,
    pretty: config.logger.pretty,
  };
  const logger = createLogger(loggerConfig);

  logger.info({ config: { server: config.server } }, 'Starting API server');

  const db = initDatabase(config);
  const emailSender = createEmailSender(config, logger);

  const app = await buildApp({
    fastifyOptions: {
      logger: buildLoggerOptions(loggerConfig),
      disableRequestLogging: false,
    },
    deps: {
      config,
      db,
      logger,
      ...(emailSender !== undefined && { emailSender }),
    },
    version: process.env['APP_VERSION'] ?? '0.1.0',
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await db.destroy();
      logger.info('Server closed gracefully');
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

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
