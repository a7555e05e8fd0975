/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  DATABASE_URL: Type.String({ minLength: 1 }),
  REDIS_URL: Type.Optional(Type.String()),

  // Cache
  CACHE_BACKEND: Type.Optional(
    Type.Union([Type.Literal('disabled'), Type.Literal('memory'), Type.Literal('redis')])
  ),
  CACHE_DEFAULT_TTL_MS: Type.Number({ minimum: 1 }),
  CACHE_MEMORY_MAX_ENTRIES: Type.Number({ minimum: 1 }),
  CACHE_KEY_PREFIX: Type.String({ minLength: 1 }),

  // Email (Resend)
  RESEND_API_KEY: Type.Optional(Type.String()),
  EMAIL_FROM: Type.String({ minLength: 3 }),

  // Deadline alerts
  ALERTS_TIMEZONE: Type.String({ minLength: 1 }),
  ALERTS_CRON: Type.String({ minLength: 1 }),
  ALERTS_PURGE_CRON: Type.String({ minLength: 1 }),
  ALERTS_RETENTION_DAYS: Type.Number({ minimum: 1 }),
  ALERTS_API_KEY: Type.Optional(Type.String({ minLength: 8 })),
  QUEUE_PREFIX: Type.String({ minLength: 1 }),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
  CLIENT_BASE_URL: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseOptionalInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value === '') return fallback;
  return Number.parseInt(value, 10);
};

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value === '' ? undefined : value;

export type CacheBackend = 'disabled' | 'memory' | 'redis';

/**
 * Explicit CACHE_BACKEND wins; otherwise Redis when REDIS_URL is present.
 */
export const resolveCacheBackend = (env: Env): CacheBackend => {
  if (env.CACHE_BACKEND !== undefined) return env.CACHE_BACKEND;
  return env.REDIS_URL !== undefined ? 'redis' : 'memory';
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseOptionalInt(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATABASE_URL: env['DATABASE_URL'],
    REDIS_URL: emptyToUndefined(env['REDIS_URL']),
    CACHE_BACKEND: emptyToUndefined(env['CACHE_BACKEND']?.toLowerCase()),
    CACHE_DEFAULT_TTL_MS: parseOptionalInt(env['CACHE_DEFAULT_TTL_MS'], 5 * 60 * 1000),
    CACHE_MEMORY_MAX_ENTRIES: parseOptionalInt(env['CACHE_MEMORY_MAX_ENTRIES'], 1000),
    CACHE_KEY_PREFIX: env['CACHE_KEY_PREFIX'] ?? 'agro',
    RESEND_API_KEY: emptyToUndefined(env['RESEND_API_KEY']),
    EMAIL_FROM: env['EMAIL_FROM'] ?? 'Farm Ledger <alerts@localhost>',
    ALERTS_TIMEZONE: env['ALERTS_TIMEZONE'] ?? 'America/Sao_Paulo',
    ALERTS_CRON: env['ALERTS_CRON'] ?? '0 8,14,20 * * *',
    ALERTS_PURGE_CRON: env['ALERTS_PURGE_CRON'] ?? '0 2 * * *',
    ALERTS_RETENTION_DAYS: parseOptionalInt(env['ALERTS_RETENTION_DAYS'], 90),
    ALERTS_API_KEY: emptyToUndefined(env['ALERTS_API_KEY']),
    QUEUE_PREFIX: env['QUEUE_PREFIX'] ?? 'agro-queue',
    ALLOWED_ORIGINS: emptyToUndefined(env['ALLOWED_ORIGINS']),
    CLIENT_BASE_URL: emptyToUndefined(env['CLIENT_BASE_URL']),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  database: {
    url: env.DATABASE_URL,
  },
  redis: {
    url: env.REDIS_URL,
  },
  cache: {
    backend: resolveCacheBackend(env),
    defaultTtlMs: env.CACHE_DEFAULT_TTL_MS,
    memoryMaxEntries: env.CACHE_MEMORY_MAX_ENTRIES,
    keyPrefix: env.CACHE_KEY_PREFIX,
  },
  email: {
    resendApiKey: env.RESEND_API_KEY,
    fromAddress: env.EMAIL_FROM,
  },
  alerts: {
    timeZone: env.ALERTS_TIMEZONE,
    cron: env.ALERTS_CRON,
    purgeCron: env.ALERTS_PURGE_CRON,
    retentionDays: env.ALERTS_RETENTION_DAYS,
    apiKey: env.ALERTS_API_KEY,
    queuePrefix: env.QUEUE_PREFIX,
  },
  cors: {
    allowedOrigins: env.ALLOWED_ORIGINS,
    clientBaseUrl: env.CLIENT_BASE_URL,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
