/**
 * Farms REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { DecimalStringSchema, UuidSchema } from '../../../../common/schemas/http.js';

export const FarmTenureSchema = Type.Union([
  Type.Literal('owned'),
  Type.Literal('leased'),
  Type.Literal('loan'),
  Type.Literal('possession'),
]);

export const CreateFarmBodySchema = Type.Object(
  {
    name: Type.String({ minLength: 1, maxLength: 200 }),
    registrationNumber: Type.String({ minLength: 1, maxLength: 100 }),
    totalArea: DecimalStringSchema,
    consolidatedArea: DecimalStringSchema,
    municipality: Type.String({ minLength: 1, maxLength: 200 }),
    state: Type.String({ minLength: 2, maxLength: 2 }),
    carReceipt: Type.Optional(Type.Union([Type.String({ maxLength: 200 }), Type.Null()])),
  },
  { additionalProperties: false }
);
export type CreateFarmBody = Static<typeof CreateFarmBodySchema>;

export const UpdateFarmBodySchema = Type.Partial(CreateFarmBodySchema, {
  additionalProperties: false,
});
export type UpdateFarmBody = Static<typeof UpdateFarmBodySchema>;

export const FarmPersonParamsSchema = Type.Object({
  id: UuidSchema,
  personId: UuidSchema,
});
export type FarmPersonParams = Static<typeof FarmPersonParamsSchema>;

export const LinkPersonBodySchema = Type.Object(
  { tenure: FarmTenureSchema },
  { additionalProperties: false }
);
export type LinkPersonBody = Static<typeof LinkPersonBodySchema>;
