export {
  EnvSchema,
  parseEnv,
  createConfig,
  resolveCacheBackend,
  type Env,
  type AppConfig,
  type CacheBackend,
} from './env.js';
