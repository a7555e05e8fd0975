/**
 * Update Farm Use Case
 *
 * The patch is merged over the stored farm and the merged farm is validated,
 * so `consolidatedArea <= totalArea` holds whichever side changes.
 */

import { err, ok, type Result } from 'neverthrow';

import { createFarmNotFoundError, type FarmsError } from '../errors.js';
import { validateFarmInput } from '../validation.js';

import type { FarmsRepository } from '../ports.js';
import type { CreateFarmInput, Farm, UpdateFarmInput } from '../types.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface UpdateFarmDeps {
  farmsRepo: FarmsRepository;
  cacheInvalidator: CacheInvalidator;
}

export interface UpdateFarmUseCaseInput {
  id: string;
  updates: UpdateFarmInput;
}

const toInput = (farm: Farm): CreateFarmInput => ({
  name: farm.name,
  registrationNumber: farm.registrationNumber,
  totalArea: farm.totalArea.toString(),
  consolidatedArea: farm.consolidatedArea.toString(),
  municipality: farm.municipality,
  state: farm.state,
  carReceipt: farm.carReceipt,
});

export async function updateFarm(
  deps: UpdateFarmDeps,
  input: UpdateFarmUseCaseInput
): Promise<Result<Farm, FarmsError>> {
  const { farmsRepo, cacheInvalidator } = deps;

  const existing = await farmsRepo.findById(input.id);
  if (existing.isErr()) {
    return err(existing.error);
  }
  if (existing.value === null) {
    return err(createFarmNotFoundError(input.id));
  }

  const fields = validateFarmInput({ ...toInput(existing.value), ...input.updates });
  if (fields.isErr()) {
    return err(fields.error);
  }

  const result = await farmsRepo.update(input.id, fields.value);
  if (result.isErr()) {
    return err(result.error);
  }
  if (result.value === null) {
    return err(createFarmNotFoundError(input.id));
  }

  await cacheInvalidator.invalidate('farm');
  return ok(result.value);
}
