/**
 * Logger factory using Pino
 * Provides structured JSON logging with configurable levels
 */

import pinoLib, { type Logger, type LoggerOptions } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  name: string;
  pretty?: boolean;
}

const defaultConfig: LoggerConfig = {
  level: 'info',
  name: 'farm-ledger-server',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Transport used in development so log lines stay readable in a terminal.
 */
export const PRETTY_TRANSPORT = {
  target: 'pino-pretty',
  options: {
    colorize: true,
    translateTime: 'SYS:standard',
    ignore: 'pid,hostname',
  },
} as const;

/**
 * Options shared by the standalone logger and Fastify's request logger.
 */
export const buildLoggerOptions = (config: Partial<LoggerConfig> = {}): LoggerOptions => {
  const finalConfig = { ...defaultConfig, ...config };

  const options: LoggerOptions = {
    name: finalConfig.name,
    level: finalConfig.level,
  };

  if (finalConfig.pretty === true) {
    options.transport = PRETTY_TRANSPORT;
  }

  return options;
};

/**
 * Creates a configured Pino logger instance
 */
export const createLogger = (config: Partial<LoggerConfig> = {}): Logger => {
  return pinoLib(buildLoggerOptions(config));
};

export { type Logger } from 'pino';
