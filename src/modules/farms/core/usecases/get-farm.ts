import { err, ok, type Result } from 'neverthrow';

import { createFarmNotFoundError, type FarmsError } from '../errors.js';

import type { FarmsRepository } from '../ports.js';
import type { Farm } from '../types.js';

export interface GetFarmDeps {
  farmsRepo: FarmsRepository;
}

export async function getFarm(
  deps: GetFarmDeps,
  input: { id: string }
): Promise<Result<Farm, FarmsError>> {
  const result = await deps.farmsRepo.findById(input.id);
  if (result.isErr()) {
    return err(result.error);
  }

  return result.value === null ? err(createFarmNotFoundError(input.id)) : ok(result.value);
}
