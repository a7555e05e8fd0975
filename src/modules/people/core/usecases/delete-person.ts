/**
 * Delete Person Use Case
 *
 * Farm and debt links go with the person. Documents attached to a farm keep
 * their row and lose the responsible person. A person who is the only owner
 * of a document cannot be deleted.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  createPersonInUseError,
  createPersonNotFoundError,
  type PeopleError,
} from '../errors.js';

import type { PeopleRepository } from '../ports.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface DeletePersonDeps {
  peopleRepo: PeopleRepository;
  cacheInvalidator: CacheInvalidator;
}

export async function deletePerson(
  deps: DeletePersonDeps,
  input: { id: string }
): Promise<Result<void, PeopleError>> {
  const countResult = await deps.peopleRepo.countFarmlessDocuments(input.id);
  if (countResult.isErr()) {
    return err(countResult.error);
  }
  if (countResult.value > 0) {
    return err(createPersonInUseError(input.id, countResult.value));
  }

  const result = await deps.peopleRepo.delete(input.id);
  if (result.isErr()) {
    return err(result.error);
  }

  if (!result.value) {
    return err(createPersonNotFoundError(input.id));
  }

  await deps.cacheInvalidator.invalidate('person');
  return ok(undefined);
}
