/**
 * Update Debt Use Case
 *
 * Scalar fields are merged over the stored debt and re-validated as a whole.
 * People and farm links are replaced only when the update carries them.
 */

import { err, ok, type Result } from 'neverthrow';

import { createDebtNotFoundError, type DebtsError } from '../errors.js';
import { uniqueIds, validateDebtFields, validateFarmLinks } from '../validation.js';

import type { DebtsRepository } from '../ports.js';
import type { Debt, DebtFieldsInput, DebtLinks, UpdateDebtInput } from '../types.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface UpdateDebtDeps {
  debtsRepo: DebtsRepository;
  cacheInvalidator: CacheInvalidator;
}

const toFieldsInput = (debt: Debt): DebtFieldsInput => ({
  bank: debt.bank,
  proposalNumber: debt.proposalNumber,
  issuedOn: debt.issuedOn,
  finalDueOn: debt.finalDueOn,
  interestRate: debt.interestRate.toString(),
  rateBasis: debt.rateBasis,
  gracePeriodMonths: debt.gracePeriodMonths,
  amount: debt.amount.toString(),
});

export async function updateDebt(
  deps: UpdateDebtDeps,
  input: { id: string; updates: UpdateDebtInput }
): Promise<Result<Debt, DebtsError>> {
  const { debtsRepo, cacheInvalidator } = deps;
  const { personIds, farmLinks, ...scalarUpdates } = input.updates;

  const existing = await debtsRepo.findById(input.id);
  if (existing.isErr()) return err(existing.error);
  if (existing.value === null) {
    return err(createDebtNotFoundError(input.id));
  }

  const fields = validateDebtFields({ ...toFieldsInput(existing.value), ...scalarUpdates });
  if (fields.isErr()) return err(fields.error);

  const links: Partial<DebtLinks> = {};
  if (personIds !== undefined) {
    links.personIds = uniqueIds(personIds);
  }
  if (farmLinks !== undefined) {
    const validated = validateFarmLinks(farmLinks);
    if (validated.isErr()) return err(validated.error);
    links.farmLinks = validated.value;
  }

  const result = await debtsRepo.update(input.id, fields.value, links);
  if (result.isErr()) return err(result.error);
  if (result.value === null) {
    return err(createDebtNotFoundError(input.id));
  }

  await cacheInvalidator.invalidate('debt');
  return ok(result.value);
}
