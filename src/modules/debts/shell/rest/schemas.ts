/**
 * Debts REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

import { DecimalStringSchema, IsoDateSchema, UuidSchema } from '../../../../common/schemas/http.js';

export const RateBasisSchema = Type.Union([Type.Literal('yearly'), Type.Literal('monthly')]);

export const DebtFarmLinkSchema = Type.Object(
  {
    farmId: UuidSchema,
    purpose: Type.Union([Type.Literal('credit_object'), Type.Literal('collateral')]),
    hectares: Type.Optional(Type.Union([DecimalStringSchema, Type.Null()])),
  },
  { additionalProperties: false }
);

export const InstallmentBodySchema = Type.Object(
  {
    dueOn: IsoDateSchema,
    amount: DecimalStringSchema,
    notes: Type.Optional(Type.Union([Type.String({ maxLength: 1000 }), Type.Null()])),
  },
  { additionalProperties: false }
);
export type InstallmentBody = Static<typeof InstallmentBodySchema>;

const debtFields = {
  bank: Type.String({ minLength: 1, maxLength: 200 }),
  proposalNumber: Type.String({ minLength: 1, maxLength: 100 }),
  issuedOn: IsoDateSchema,
  finalDueOn: IsoDateSchema,
  interestRate: DecimalStringSchema,
  rateBasis: RateBasisSchema,
  gracePeriodMonths: Type.Optional(Type.Union([Type.Integer({ minimum: 0 }), Type.Null()])),
  amount: DecimalStringSchema,
  personIds: Type.Optional(Type.Array(UuidSchema, { maxItems: 50 })),
  farmLinks: Type.Optional(Type.Array(DebtFarmLinkSchema, { maxItems: 50 })),
};

export const CreateDebtBodySchema = Type.Object(
  {
    ...debtFields,
    installments: Type.Optional(Type.Array(InstallmentBodySchema, { maxItems: 600 })),
  },
  { additionalProperties: false }
);
export type CreateDebtBody = Static<typeof CreateDebtBodySchema>;

export const UpdateDebtBodySchema = Type.Partial(Type.Object(debtFields), {
  additionalProperties: false,
});
export type UpdateDebtBody = Static<typeof UpdateDebtBodySchema>;

export const ListDebtsQuerySchema = Type.Object({
  bank: Type.Optional(Type.String({ maxLength: 200 })),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: 100 })),
  offset: Type.Optional(Type.Integer({ minimum: 0 })),
});
export type ListDebtsQuery = Static<typeof ListDebtsQuerySchema>;

export const InstallmentParamsSchema = Type.Object({
  id: UuidSchema,
  installmentId: UuidSchema,
});
export type InstallmentParams = Static<typeof InstallmentParamsSchema>;

export const DueInstallmentsQuerySchema = Type.Object({
  withinDays: Type.Optional(Type.Integer({ minimum: 0, maximum: 365 })),
});
export type DueInstallmentsQuery = Static<typeof DueInstallmentsQuerySchema>;

export const PayInstallmentBodySchema = Type.Object(
  {
    paidOn: IsoDateSchema,
    amountPaid: Type.Optional(DecimalStringSchema),
  },
  { additionalProperties: false }
);
export type PayInstallmentBody = Static<typeof PayInstallmentBodySchema>;

export const DebtAlertsBodySchema = Type.Object(
  {
    emails: Type.Array(Type.String({ maxLength: 254 }), { maxItems: 20 }),
    active: Type.Optional(Type.Boolean({ default: true })),
  },
  { additionalProperties: false }
);
export type DebtAlertsBody = Static<typeof DebtAlertsBodySchema>;
