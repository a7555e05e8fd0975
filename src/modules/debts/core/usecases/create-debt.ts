/**
 * Create Debt Use Case
 */

import { err, type Result } from 'neverthrow';

import {
  uniqueIds,
  validateDebtFields,
  validateFarmLinks,
  validateInstallments,
} from '../validation.js';

import type { DebtsError } from '../errors.js';
import type { DebtsRepository } from '../ports.js';
import type { CreateDebtInput, Debt } from '../types.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface CreateDebtDeps {
  debtsRepo: DebtsRepository;
  cacheInvalidator: CacheInvalidator;
}

/**
 * Creates a debt with its people, farm links and initial installments.
 */
export async function createDebt(
  deps: CreateDebtDeps,
  input: CreateDebtInput
): Promise<Result<Debt, DebtsError>> {
  const fields = validateDebtFields(input);
  if (fields.isErr()) return err(fields.error);

  const farmLinks = validateFarmLinks(input.farmLinks ?? []);
  if (farmLinks.isErr()) return err(farmLinks.error);

  const installments = validateInstallments(input.installments ?? []);
  if (installments.isErr()) return err(installments.error);

  const result = await deps.debtsRepo.create(
    fields.value,
    { personIds: uniqueIds(input.personIds ?? []), farmLinks: farmLinks.value },
    installments.value
  );

  if (result.isOk()) {
    await deps.cacheInvalidator.invalidate('debt');
  }
  return result;
}
