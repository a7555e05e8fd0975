import { normalizePagination, type OffsetPage } from '../../../../common/constants/pagination.js';

import type { PeopleError } from '../errors.js';
import type { PeopleRepository } from '../ports.js';
import type { Person } from '../types.js';
import type { Result } from 'neverthrow';

export interface ListPeopleDeps {
  peopleRepo: PeopleRepository;
}

/**
 * Lists people ordered by name.
 */
export async function listPeople(
  deps: ListPeopleDeps,
  input: { limit?: number; offset?: number }
): Promise<Result<OffsetPage<Person>, PeopleError>> {
  return deps.peopleRepo.list(normalizePagination(input));
}
