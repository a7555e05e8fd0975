/**
 * Deadline Alerts REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { IsoDateSchema, UuidSchema } from '../../../../common/schemas/http.js';
import { MAX_HISTORY_LIMIT } from '../../core/types.js';

export const ObligationKindSchema = Type.Union([
  Type.Literal('document'),
  Type.Literal('debt'),
  Type.Literal('installment'),
]);

export const HistoryQuerySchema = Type.Object({
  kind: Type.Optional(ObligationKindSchema),
  obligationId: Type.Optional(UuidSchema),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_HISTORY_LIMIT })),
  offset: Type.Optional(Type.Integer({ minimum: 0 })),
});
export type HistoryQuery = Static<typeof HistoryQuerySchema>;

export const UpcomingQuerySchema = Type.Object({
  kind: ObligationKindSchema,
  obligationId: UuidSchema,
});
export type UpcomingQuery = Static<typeof UpcomingQuerySchema>;

export const RunBodySchema = Type.Object(
  {
    date: Type.Optional(IsoDateSchema),
    dryRun: Type.Optional(Type.Boolean({ default: false })),
  },
  { additionalProperties: false }
);
export type RunBody = Static<typeof RunBodySchema>;

export const PurgeBodySchema = Type.Object(
  {
    olderThanDays: Type.Optional(Type.Integer({ minimum: 1, maximum: 3650 })),
  },
  { additionalProperties: false }
);
export type PurgeBody = Static<typeof PurgeBodySchema>;
