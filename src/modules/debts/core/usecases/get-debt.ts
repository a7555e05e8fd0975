import { err, ok, type Result } from 'neverthrow';

import { createDebtNotFoundError, type DebtsError } from '../errors.js';

import type { DebtsRepository } from '../ports.js';
import type { Debt } from '../types.js';

export interface GetDebtDeps {
  debtsRepo: DebtsRepository;
}

export async function getDebt(
  deps: GetDebtDeps,
  input: { id: string }
): Promise<Result<Debt, DebtsError>> {
  const result = await deps.debtsRepo.findById(input.id);
  if (result.isErr()) {
    return err(result.error);
  }

  return result.value === null ? err(createDebtNotFoundError(input.id)) : ok(result.value);
}
