/**
 * TypeBox building blocks shared by the REST schemas of every module.
 */

import { Type, type Static } from '@sinclair/typebox';

export const UuidSchema = Type.String({
  pattern: '^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$',
});

/** Calendar date, validated further by `isIsoDate` in the core */
export const IsoDateSchema = Type.String({ pattern: '^\\d{4}-\\d{2}-\\d{2}$' });

/** Decimal amount sent as a string to keep precision ("1234.50") */
export const DecimalStringSchema = Type.String({ pattern: '^\\d+(\\.\\d+)?$' });

export const IdParamsSchema = Type.Object({ id: UuidSchema });
export type IdParams = Static<typeof IdParamsSchema>;

export const OffsetQuerySchema = Type.Object({
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 100 })),
  offset: Type.Optional(Type.Integer({ minimum: 0 })),
});
export type OffsetQuery = Static<typeof OffsetQuerySchema>;
