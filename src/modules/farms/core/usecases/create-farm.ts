import { err, type Result } from 'neverthrow';

import { validateFarmInput } from '../validation.js';

import type { FarmsError } from '../errors.js';
import type { FarmsRepository } from '../ports.js';
import type { CreateFarmInput, Farm } from '../types.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface CreateFarmDeps {
  farmsRepo: FarmsRepository;
  cacheInvalidator: CacheInvalidator;
}

/**
 * Creates a farm. A registration number already in use fails with FarmConflictError.
 */
export async function createFarm(
  deps: CreateFarmDeps,
  input: CreateFarmInput
): Promise<Result<Farm, FarmsError>> {
  const fields = validateFarmInput(input);
  if (fields.isErr()) {
    return err(fields.error);
  }

  const result = await deps.farmsRepo.create(fields.value);
  if (result.isOk()) {
    await deps.cacheInvalidator.invalidate('farm');
  }
  return result;
}
