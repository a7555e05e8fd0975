/**
 * Health Module - Public API
 */

export { makeHealthRoutes, type MakeHealthRoutesDeps } from './shell/rest/routes.js';
export { databaseDependency, cacheDependency } from './shell/dependencies/index.js';

export {
  checkReadiness,
  inspectDependency,
  summarizeReadiness,
  type CheckReadinessDeps,
  type CheckReadinessInput,
} from './core/usecases/check-readiness.js';

export type { DependencyCheck } from './core/ports.js';
export { DEFAULT_CHECK_TIMEOUT_MS } from './core/types.js';
export type {
  ComponentReport,
  LivenessReport,
  ReadinessReport,
  ReadinessState,
} from './core/types.js';
