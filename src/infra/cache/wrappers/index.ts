export { createSilentCache, type SilentCacheOptions } from './silent-cache.js';
