/**
 * Documents REST API - TypeBox Schemas
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';

import { IsoDateSchema, UuidSchema } from '../../../../common/schemas/http.js';
import { MAX_ALERT_THRESHOLD_DAYS } from '../../core/types.js';

const nullable = <T extends TSchema>(schema: T) => Type.Union([schema, Type.Null()]);

export const DocumentKindSchema = Type.Union([
  Type.Literal('certificate'),
  Type.Literal('contract'),
  Type.Literal('land'),
  Type.Literal('other'),
]);

export const CreateDocumentBodySchema = Type.Object(
  {
    name: Type.String({ minLength: 1, maxLength: 200 }),
    kind: DocumentKindSchema,
    customKind: Type.Optional(nullable(Type.String({ maxLength: 100 }))),
    issuedOn: IsoDateSchema,
    expiresOn: Type.Optional(nullable(IsoDateSchema)),
    farmId: Type.Optional(nullable(UuidSchema)),
    personId: Type.Optional(nullable(UuidSchema)),
    alertEmails: Type.Optional(Type.Array(Type.String({ maxLength: 254 }), { maxItems: 20 })),
    alertThresholds: Type.Optional(
      Type.Union([
        Type.Array(Type.Integer({ minimum: 1, maximum: MAX_ALERT_THRESHOLD_DAYS }), {
          maxItems: 20,
        }),
        Type.Null(),
      ])
    ),
    alertsEnabled: Type.Optional(Type.Boolean()),
  },
  { additionalProperties: false }
);
export type CreateDocumentBody = Static<typeof CreateDocumentBodySchema>;

export const UpdateDocumentBodySchema = Type.Partial(CreateDocumentBodySchema, {
  additionalProperties: false,
});
export type UpdateDocumentBody = Static<typeof UpdateDocumentBodySchema>;

export const ListDocumentsQuerySchema = Type.Object({
  farmId: Type.Optional(UuidSchema),
  personId: Type.Optional(UuidSchema),
  expiringWithinDays: Type.Optional(
    Type.Integer({ minimum: 0, maximum: MAX_ALERT_THRESHOLD_DAYS })
  ),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 100 })),
  offset: Type.Optional(Type.Integer({ minimum: 0 })),
});
export type ListDocumentsQuery = Static<typeof ListDocumentsQuerySchema>;
