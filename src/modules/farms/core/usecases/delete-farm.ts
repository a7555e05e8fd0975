import { err, ok, type Result } from 'neverthrow';

import { createFarmNotFoundError, type FarmsError } from '../errors.js';

import type { FarmsRepository } from '../ports.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface DeleteFarmDeps {
  farmsRepo: FarmsRepository;
  cacheInvalidator: CacheInvalidator;
}

/**
 * Deletes a farm together with its person links and documents.
 */
export async function deleteFarm(
  deps: DeleteFarmDeps,
  input: { id: string }
): Promise<Result<void, FarmsError>> {
  const result = await deps.farmsRepo.delete(input.id);
  if (result.isErr()) {
    return err(result.error);
  }
  if (!result.value) {
    return err(createFarmNotFoundError(input.id));
  }

  await deps.cacheInvalidator.invalidate('farm');
  return ok(undefined);
}
