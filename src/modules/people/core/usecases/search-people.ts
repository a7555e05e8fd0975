/**
 * Search People Use Case
 *
 * Backs the person autocomplete. Reads go through the cached repository,
 * so the use case itself stays cache-agnostic.
 */

import { err, ok, type Result } from 'neverthrow';

import { buildPageInfo, clampLimit } from '../../../../common/constants/pagination.js';
import { formatTaxId } from '../tax-id.js';
import {
  SEARCH_DEFAULT_LIMIT,
  SEARCH_MAX_LIMIT,
  SEARCH_MIN_TERM_LENGTH,
  type PersonSearchPage,
} from '../types.js';

import type { PeopleError } from '../errors.js';
import type { PeopleRepository } from '../ports.js';

export interface SearchPeopleDeps {
  peopleRepo: PeopleRepository;
}

export interface SearchPeopleInput {
  term: string;
  page?: number;
  limit?: number;
}

export async function searchPeople(
  deps: SearchPeopleDeps,
  input: SearchPeopleInput
): Promise<Result<PersonSearchPage, PeopleError>> {
  const term = input.term.trim().toLowerCase();
  const page = Math.max(1, Math.trunc(input.page ?? 1));
  const limit = clampLimit(input.limit, SEARCH_DEFAULT_LIMIT, SEARCH_MAX_LIMIT);

  if (term.length < SEARCH_MIN_TERM_LENGTH) {
    return ok({ data: [], pagination: buildPageInfo({ page, limit, total: 0 }) });
  }

  const result = await deps.peopleRepo.search({ term, page, limit });
  if (result.isErr()) {
    return err(result.error);
  }

  const { items, total } = result.value;

  return ok({
    data: items.map((hit) => ({ ...hit, formattedTaxId: formatTaxId(hit.taxId) })),
    pagination: buildPageInfo({ page, limit, total }),
  });
}
