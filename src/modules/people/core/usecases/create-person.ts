/**
 * Create Person Use Case
 */

import { err, type Result } from 'neverthrow';

import { validateNewPerson } from '../validation.js';

import type { PeopleError } from '../errors.js';
import type { PeopleRepository } from '../ports.js';
import type { CreatePersonInput, Person } from '../types.js';
import type { CacheInvalidator } from '../../../../infra/cache/index.js';

export interface CreatePersonDeps {
  peopleRepo: PeopleRepository;
  cacheInvalidator: CacheInvalidator;
}

/**
 * Validates and stores a person, then drops cached people reads.
 * A taken tax id fails with PersonConflictError.
 */
export async function createPerson(
  deps: CreatePersonDeps,
  input: CreatePersonInput
): Promise<Result<Person, PeopleError>> {
  const validated = validateNewPerson(input);
  if (validated.isErr()) {
    return err(validated.error);
  }

  const result = await deps.peopleRepo.create(validated.value);
  if (result.isOk()) {
    await deps.cacheInvalidator.invalidate('person');
  }

  return result;
}
