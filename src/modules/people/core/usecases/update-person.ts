/**
 * Update Person Use Case
 *
 * Partial update with the same rules as creation.
 */

import { err, ok, type Result } from 'neverthrow';

import { createPersonNotFoundError, type PeopleError } from '../errors.js';
import { validatePersonPatch } from '../validation.js';

import type { PeopleRepository } from '../ports.js';
import type { Person, UpdatePersonInput } from '../types.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface UpdatePersonDeps {
  peopleRepo: PeopleRepository;
  cacheInvalidator: CacheInvalidator;
}

export interface UpdatePersonUseCaseInput {
  id: string;
  updates: UpdatePersonInput;
}

export async function updatePerson(
  deps: UpdatePersonDeps,
  input: UpdatePersonUseCaseInput
): Promise<Result<Person, PeopleError>> {
  const { peopleRepo, cacheInvalidator } = deps;

  const patch = validatePersonPatch(input.updates);
  if (patch.isErr()) {
    return err(patch.error);
  }

  const result = await peopleRepo.update(input.id, patch.value);
  if (result.isErr()) {
    return err(result.error);
  }

  const updated = result.value;
  if (updated === null) {
    return err(createPersonNotFoundError(input.id));
  }

  await cacheInvalidator.invalidate('person');
  return ok(updated);
}
