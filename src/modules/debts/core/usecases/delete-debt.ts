import { err, ok, type Result } from 'neverthrow';

import { createDebtNotFoundError, type DebtsError } from '../errors.js';

import type { DebtsRepository } from '../ports.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface DeleteDebtDeps {
  debtsRepo: DebtsRepository;
  cacheInvalidator: CacheInvalidator;
}

/**
 * Deletes a debt with its installments, links and alert settings.
 * Alert history rows are kept.
 */
export async function deleteDebt(
  deps: DeleteDebtDeps,
  input: { id: string }
): Promise<Result<void, DebtsError>> {
  const result = await deps.debtsRepo.delete(input.id);
  if (result.isErr()) return err(result.error);
  if (!result.value) {
    return err(createDebtNotFoundError(input.id));
  }

  await deps.cacheInvalidator.invalidate('debt');
  return ok(undefined);
}
