/**
 * People REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { NAME_MAX_LENGTH, SEARCH_MAX_LIMIT } from '../../core/types.js';

const NullableText = Type.Union([Type.String({ maxLength: 500 }), Type.Null()]);

export const CreatePersonBodySchema = Type.Object(
  {
    name: Type.String({ minLength: 1, maxLength: NAME_MAX_LENGTH }),
    taxId: Type.String({ minLength: 1, maxLength: 32 }),
    email: Type.Optional(NullableText),
    phone: Type.Optional(NullableText),
    address: Type.Optional(NullableText),
  },
  { additionalProperties: false }
);
export type CreatePersonBody = Static<typeof CreatePersonBodySchema>;

export const UpdatePersonBodySchema = Type.Partial(CreatePersonBodySchema, {
  additionalProperties: false,
});
export type UpdatePersonBody = Static<typeof UpdatePersonBodySchema>;

export const SearchPeopleQuerySchema = Type.Object({
  q: Type.String({ default: '' }),
  page: Type.Optional(Type.Integer({ minimum: 1 })),
  // Out-of-range limits are clamped by the use case rather than rejected
  limit: Type.Optional(Type.Integer({ minimum: 0, maximum: SEARCH_MAX_LIMIT * 10 })),
});
export type SearchPeopleQuery = Static<typeof SearchPeopleQuerySchema>;
