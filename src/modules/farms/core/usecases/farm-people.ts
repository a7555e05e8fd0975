/**
 * Farm People Use Cases
 *
 * Links between farms and the people who hold them, one link per pair.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createFarmLinkNotFoundError,
  createFarmNotFoundError,
  createLinkedPersonNotFoundError,
  type FarmsError,
} from '../errors.js';

import type { FarmsRepository } from '../ports.js';
import type { FarmPerson, FarmTenure } from '../types.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Dependencies
// ─────────────────────────────────────────────────────────────────────────────

export interface FarmPeopleDeps {
  farmsRepo: FarmsRepository;
  cacheInvalidator: CacheInvalidator;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const ensureFarmExists = async (
  farmsRepo: FarmsRepository,
  farmId: string
): Promise<Result<void, FarmsError>> => {
  const farm = await farmsRepo.findById(farmId);
  if (farm.isErr()) return err(farm.error);
  return farm.value === null ? err(createFarmNotFoundError(farmId)) : ok(undefined);
};

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export async function listFarmPeople(
  deps: Pick<FarmPeopleDeps, 'farmsRepo'>,
  input: { farmId: string }
): Promise<Result<FarmPerson[], FarmsError>> {
  const exists = await ensureFarmExists(deps.farmsRepo, input.farmId);
  if (exists.isErr()) return err(exists.error);

  return deps.farmsRepo.listPeople(input.farmId);
}

/**
 * Links a person to a farm, or changes the tenure of an existing link.
 */
export async function linkPerson(
  deps: FarmPeopleDeps,
  input: { farmId: string; personId: string; tenure: FarmTenure }
): Promise<Result<FarmPerson, FarmsError>> {
  const { farmsRepo, cacheInvalidator } = deps;

  const exists = await ensureFarmExists(farmsRepo, input.farmId);
  if (exists.isErr()) return err(exists.error);

  const personExists = await farmsRepo.personExists(input.personId);
  if (personExists.isErr()) return err(personExists.error);
  if (!personExists.value) {
    return err(createLinkedPersonNotFoundError(input.personId));
  }

  const result = await farmsRepo.upsertPersonLink(input.farmId, input.personId, input.tenure);
  if (result.isOk()) {
    await cacheInvalidator.invalidate('farm');
  }
  return result;
}

export async function unlinkPerson(
  deps: FarmPeopleDeps,
  input: { farmId: string; personId: string }
): Promise<Result<void, FarmsError>> {
  const result = await deps.farmsRepo.deletePersonLink(input.farmId, input.personId);
  if (result.isErr()) return err(result.error);
  if (!result.value) {
    return err(createFarmLinkNotFoundError(input.farmId, input.personId));
  }

  await deps.cacheInvalidator.invalidate('farm');
  return ok(undefined);
}
