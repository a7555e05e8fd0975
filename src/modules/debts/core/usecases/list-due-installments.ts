/**
 * List Due Installments Use Case
 *
 * Unpaid installments already overdue, and those falling due within the
 * look-ahead window.
 */

import { err, ok, type Result } from 'neverthrow';

import { addDays, isIsoDate, type IsoDate } from '../../../../common/dates.js';
import { createValidationError, type DebtsError } from '../errors.js';
import { INSTALLMENT_DUE_SOON_DAYS, type DueInstallments } from '../types.js';

import type { DebtsRepository } from '../ports.js';

export interface ListDueInstallmentsDeps {
  debtsRepo: DebtsRepository;
}

export interface ListDueInstallmentsInput {
  today: IsoDate;
  withinDays?: number;
}

export async function listDueInstallments(
  deps: ListDueInstallmentsDeps,
  input: ListDueInstallmentsInput
): Promise<Result<DueInstallments, DebtsError>> {
  const { today, withinDays = INSTALLMENT_DUE_SOON_DAYS } = input;
  if (!isIsoDate(today)) {
    return err(createValidationError(`Invalid date '${today}'`, 'today'));
  }
  if (!Number.isInteger(withinDays) || withinDays < 0) {
    return err(createValidationError('withinDays must be a non-negative integer', 'withinDays'));
  }

  const listed = await deps.debtsRepo.listUnpaidInstallments(addDays(today, withinDays));
  if (listed.isErr()) {
    return err(listed.error);
  }

  return ok({
    today,
    overdue: listed.value.filter((installment) => installment.dueOn < today),
    dueSoon: listed.value.filter((installment) => installment.dueOn >= today),
  });
}
