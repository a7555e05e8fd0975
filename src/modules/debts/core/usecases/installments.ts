/**
 * Installment Use Cases
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createDebtNotFoundError,
  createInstallmentAlreadyPaidError,
  createInstallmentNotFoundError,
  type DebtsError,
} from '../errors.js';
import { isoDate, positiveAmount, validateInstallment } from '../validation.js';

import type { DebtsRepository } from '../ports.js';
import type { Installment, InstallmentInput } from '../types.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface InstallmentsDeps {
  debtsRepo: DebtsRepository;
  cacheInvalidator: CacheInvalidator;
}

export async function addInstallment(
  deps: InstallmentsDeps,
  input: { debtId: string; installment: InstallmentInput }
): Promise<Result<Installment, DebtsError>> {
  const { debtsRepo, cacheInvalidator } = deps;

  const installment = validateInstallment(input.installment);
  if (installment.isErr()) return err(installment.error);

  const debt = await debtsRepo.findById(input.debtId);
  if (debt.isErr()) return err(debt.error);
  if (debt.value === null) {
    return err(createDebtNotFoundError(input.debtId));
  }

  const result = await debtsRepo.addInstallment(input.debtId, installment.value);
  if (result.isOk()) {
    await cacheInvalidator.invalidate('debt');
  }
  return result;
}

export interface PayInstallmentInput {
  debtId: string;
  installmentId: string;
  paidOn: string;
  /** Defaults to the installment amount */
  amountPaid?: string;
}

/**
 * Marks an installment as paid. Paying twice fails with InstallmentAlreadyPaidError.
 */
export async function payInstallment(
  deps: InstallmentsDeps,
  input: PayInstallmentInput
): Promise<Result<Installment, DebtsError>> {
  const { debtsRepo, cacheInvalidator } = deps;
  const { debtId, installmentId } = input;

  const paidOn = isoDate(input.paidOn, 'paidOn');
  if (paidOn.isErr()) return err(paidOn.error);

  const found = await debtsRepo.findInstallment(debtId, installmentId);
  if (found.isErr()) return err(found.error);

  const installment = found.value;
  if (installment === null) {
    return err(createInstallmentNotFoundError(debtId, installmentId));
  }
  if (installment.paid) {
    return err(createInstallmentAlreadyPaidError(installmentId));
  }

  let amountPaid = installment.amount;
  if (input.amountPaid !== undefined) {
    const parsed = positiveAmount(input.amountPaid, 'amountPaid');
    if (parsed.isErr()) return err(parsed.error);
    amountPaid = parsed.value;
  }

  const result = await debtsRepo.markInstallmentPaid(installmentId, paidOn.value, amountPaid);
  if (result.isErr()) return err(result.error);

  // Lost a race against a concurrent payment
  if (result.value === null) {
    return err(createInstallmentAlreadyPaidError(installmentId));
  }

  await cacheInvalidator.invalidate('debt');
  return ok(result.value);
}

export async function removeInstallment(
  deps: InstallmentsDeps,
  input: { debtId: string; installmentId: string }
): Promise<Result<void, DebtsError>> {
  const result = await deps.debtsRepo.removeInstallment(input.debtId, input.installmentId);
  if (result.isErr()) return err(result.error);
  if (!result.value) {
    return err(createInstallmentNotFoundError(input.debtId, input.installmentId));
  }

  await deps.cacheInvalidator.invalidate('debt');
  return ok(undefined);
}
