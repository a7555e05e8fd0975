import { err, ok, type Result } from 'neverthrow';

import { createPersonNotFoundError, type PeopleError } from '../errors.js';

import type { PeopleRepository } from '../ports.js';
import type { Person } from '../types.js';

export interface GetPersonDeps {
  peopleRepo: PeopleRepository;
}

export async function getPerson(
  deps: GetPersonDeps,
  input: { id: string }
): Promise<Result<Person, PeopleError>> {
  const result = await deps.peopleRepo.findById(input.id);
  if (result.isErr()) {
    return err(result.error);
  }

  if (result.value === null) {
    return err(createPersonNotFoundError(input.id));
  }

  return ok(result.value);
}
