/**
 * Debts REST Routes
 */

import {
  CreateDebtBodySchema,
  DebtAlertsBodySchema,
  DueInstallmentsQuerySchema,
  InstallmentBodySchema,
  InstallmentParamsSchema,
  ListDebtsQuerySchema,
  PayInstallmentBodySchema,
  UpdateDebtBodySchema,
  type CreateDebtBody,
  type DebtAlertsBody,
  type DueInstallmentsQuery,
  type InstallmentBody,
  type InstallmentParams,
  type ListDebtsQuery,
  type PayInstallmentBody,
  type UpdateDebtBody,
} from './schemas.js';
import { todayIn } from '../../../../common/dates.js';
import { sendData, sendError } from '../../../../common/http.js';
import { IdParamsSchema, type IdParams } from '../../../../common/schemas/http.js';
import { getHttpStatusForError } from '../../core/errors.js';
import { configureDebtAlerts, getDebtAlertSettings } from '../../core/usecases/alert-settings.js';
import { createDebt } from '../../core/usecases/create-debt.js';
import { deleteDebt } from '../../core/usecases/delete-debt.js';
import { getDebt } from '../../core/usecases/get-debt.js';
import {
  addInstallment,
  payInstallment,
  removeInstallment,
} from '../../core/usecases/installments.js';
import { listDebts } from '../../core/usecases/list-debts.js';
import { listDueInstallments } from '../../core/usecases/list-due-installments.js';
import { updateDebt } from '../../core/usecases/update-debt.js';

import type { CacheInvalidator } from '../../../../infra/cache/index.js';
import type { DebtsRepository } from '../../core/ports.js';
import type {
  Debt,
  DebtAlertSettings,
  DueInstallment,
  Installment,
} from '../../core/types.js';
import type { FastifyPluginAsync } from 'fastify';

export interface MakeDebtRoutesDeps {
  debtsRepo: DebtsRepository;
  cacheInvalidator: CacheInvalidator;
  /** Resolves "today" for the due installments listing */
  timeZone: string;
  now?: () => Date;
}

// ─────────────────────────────────────────────────────────────────────────────
// Formatters (Decimal values go out as strings)
// ─────────────────────────────────────────────────────────────────────────────

const formatInstallment = (installment: Installment) => ({
  id: installment.id,
  debtId: installment.debtId,
  dueOn: installment.dueOn,
  amount: installment.amount.toFixed(2),
  paid: installment.paid,
  paidOn: installment.paidOn,
  amountPaid: installment.amountPaid === null ? null : installment.amountPaid.toFixed(2),
  notes: installment.notes,
});

const formatDueInstallment = (installment: DueInstallment) => ({
  ...formatInstallment(installment),
  bank: installment.bank,
  proposalNumber: installment.proposalNumber,
});

const formatDebt = (debt: Debt) => ({
  id: debt.id,
  bank: debt.bank,
  proposalNumber: debt.proposalNumber,
  issuedOn: debt.issuedOn,
  finalDueOn: debt.finalDueOn,
  interestRate: debt.interestRate.toString(),
  rateBasis: debt.rateBasis,
  gracePeriodMonths: debt.gracePeriodMonths,
  amount: debt.amount.toFixed(2),
  outstandingAmount: debt.outstandingAmount.toFixed(2),
  personIds: debt.personIds,
  farmLinks: debt.farmLinks.map((link) => ({
    farmId: link.farmId,
    purpose: link.purpose,
    hectares: link.hectares === null ? null : link.hectares.toString(),
  })),
  installments: debt.installments.map(formatInstallment),
  createdAt: debt.createdAt.toISOString(),
  updatedAt: debt.updatedAt.toISOString(),
});

const formatAlertSettings = (settings: DebtAlertSettings) => ({
  debtId: settings.debtId,
  emails: settings.emails,
  active: settings.active,
  updatedAt: settings.updatedAt.toISOString(),
});

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeDebtRoutes = (deps: MakeDebtRoutesDeps): FastifyPluginAsync => {
  const { debtsRepo, cacheInvalidator, timeZone, now = () => new Date() } = deps;
  const writeDeps = { debtsRepo, cacheInvalidator };

  return async (fastify) => {
    fastify.post<{ Body: CreateDebtBody }>(
      '/api/v1/debts',
      { schema: { body: CreateDebtBodySchema } },
      async (request, reply) => {
        const result = await createDebt(writeDeps, request.body);
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatDebt(result.value), 201);
      }
    );

    fastify.get<{ Querystring: ListDebtsQuery }>(
      '/api/v1/debts',
      { schema: { querystring: ListDebtsQuerySchema } },
      async (request, reply) => {
        const result = await listDebts({ debtsRepo }, request.query);
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        const { items, total, limit, offset } = result.value;
        return sendData(reply, { items: items.map(formatDebt), total, limit, offset });
      }
    );

    fastify.get<{ Params: IdParams }>(
      '/api/v1/debts/:id',
      { schema: { params: IdParamsSchema } },
      async (request, reply) => {
        const result = await getDebt({ debtsRepo }, { id: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatDebt(result.value));
      }
    );

    fastify.patch<{ Params: IdParams; Body: UpdateDebtBody }>(
      '/api/v1/debts/:id',
      { schema: { params: IdParamsSchema, body: UpdateDebtBodySchema } },
      async (request, reply) => {
        const result = await updateDebt(writeDeps, {
          id: request.params.id,
          updates: request.body,
        });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatDebt(result.value));
      }
    );

    fastify.delete<{ Params: IdParams }>(
      '/api/v1/debts/:id',
      { schema: { params: IdParamsSchema } },
      async (request, reply) => {
        const result = await deleteDebt(writeDeps, { id: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return reply.status(204).send();
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Installments
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get<{ Querystring: DueInstallmentsQuery }>(
      '/api/v1/debts/installments/due',
      { schema: { querystring: DueInstallmentsQuerySchema } },
      async (request, reply) => {
        const { withinDays } = request.query;
        const result = await listDueInstallments(
          { debtsRepo },
          {
            today: todayIn(timeZone, now()),
            ...(withinDays !== undefined && { withinDays }),
          }
        );
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        const { today, overdue, dueSoon } = result.value;
        return sendData(reply, {
          today,
          overdue: overdue.map(formatDueInstallment),
          dueSoon: dueSoon.map(formatDueInstallment),
        });
      }
    );

    fastify.post<{ Params: IdParams; Body: InstallmentBody }>(
      '/api/v1/debts/:id/installments',
      { schema: { params: IdParamsSchema, body: InstallmentBodySchema } },
      async (request, reply) => {
        const result = await addInstallment(writeDeps, {
          debtId: request.params.id,
          installment: request.body,
        });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatInstallment(result.value), 201);
      }
    );

    fastify.post<{ Params: InstallmentParams; Body: PayInstallmentBody }>(
      '/api/v1/debts/:id/installments/:installmentId/pay',
      { schema: { params: InstallmentParamsSchema, body: PayInstallmentBodySchema } },
      async (request, reply) => {
        const { paidOn, amountPaid } = request.body;
        const result = await payInstallment(writeDeps, {
          debtId: request.params.id,
          installmentId: request.params.installmentId,
          paidOn,
          ...(amountPaid !== undefined && { amountPaid }),
        });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatInstallment(result.value));
      }
    );

    fastify.delete<{ Params: InstallmentParams }>(
      '/api/v1/debts/:id/installments/:installmentId',
      { schema: { params: InstallmentParamsSchema } },
      async (request, reply) => {
        const result = await removeInstallment(writeDeps, {
          debtId: request.params.id,
          installmentId: request.params.installmentId,
        });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return reply.status(204).send();
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // Alert settings
    // ─────────────────────────────────────────────────────────────────────────

    fastify.get<{ Params: IdParams }>(
      '/api/v1/debts/:id/alerts',
      { schema: { params: IdParamsSchema } },
      async (request, reply) => {
        const result = await getDebtAlertSettings({ debtsRepo }, { debtId: request.params.id });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, result.value === null ? null : formatAlertSettings(result.value));
      }
    );

    fastify.put<{ Params: IdParams; Body: DebtAlertsBody }>(
      '/api/v1/debts/:id/alerts',
      { schema: { params: IdParamsSchema, body: DebtAlertsBodySchema } },
      async (request, reply) => {
        const result = await configureDebtAlerts(writeDeps, {
          debtId: request.params.id,
          emails: request.body.emails,
          active: request.body.active ?? true,
        });
        if (result.isErr()) {
          return sendError(reply, result.error, getHttpStatusForError);
        }
        return sendData(reply, formatAlertSettings(result.value));
      }
    );
  };
};
