/**
 * Health Module - Core Types
 *
 * Readiness is reported per component. The database is critical. The cache
 * only degrades the service, since cached reads fall back to the database.
 */

import { Type, type Static } from '@sinclair/typebox';

export const DEFAULT_CHECK_TIMEOUT_MS = 3000;

export const ComponentReportSchema = Type.Object({
  component: Type.String(),
  up: Type.Boolean(),
  critical: Type.Boolean(),
  latencyMs: Type.Integer({ minimum: 0 }),
  error: Type.Optional(Type.String()),
});
export type ComponentReport = Static<typeof ComponentReportSchema>;

export const ReadinessStateSchema = Type.Union([
  Type.Literal('ready'),
  Type.Literal('degraded'),
  Type.Literal('unavailable'),
]);
export type ReadinessState = Static<typeof ReadinessStateSchema>;

export const ReadinessReportSchema = Type.Object({
  state: ReadinessStateSchema,
  checkedAt: Type.String({ format: 'date-time' }),
  uptimeSeconds: Type.Integer({ minimum: 0 }),
  version: Type.Optional(Type.String()),
  components: Type.Array(ComponentReportSchema),
});
export type ReadinessReport = Static<typeof ReadinessReportSchema>;

export const LivenessReportSchema = Type.Object({
  state: Type.Literal('alive'),
  uptimeSeconds: Type.Integer({ minimum: 0 }),
});
export type LivenessReport = Static<typeof LivenessReportSchema>;
