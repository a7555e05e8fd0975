/**
 * People Module - Port Interfaces
 */

import type { PeopleError } from './errors.js';
import type {
  NewPerson,
  Person,
  PersonPatch,
  PersonSearchHits,
  SearchPeopleQuery,
} from './types.js';
import type { OffsetPage } from '../../../common/constants/pagination.js';
import type { Result } from 'neverthrow';

export interface PeopleRepository {
  /** Fails with PersonConflictError when the tax id is taken */
  create(input: NewPerson): Promise<Result<Person, PeopleError>>;

  findById(id: string): Promise<Result<Person | null, PeopleError>>;

  /** Ordered by name */
  list(params: { limit: number; offset: number }): Promise<Result<OffsetPage<Person>, PeopleError>>;

  /** Returns null when the person does not exist */
  update(id: string, patch: PersonPatch): Promise<Result<Person | null, PeopleError>>;

  /** Returns false when the person does not exist */
  delete(id: string): Promise<Result<boolean, PeopleError>>;

  /** Documents whose only owner is the person (no farm) */
  countFarmlessDocuments(personId: string): Promise<Result<number, PeopleError>>;

  /**
   * Case-insensitive name match, or tax id match on the digits of the term.
   * Ordered by name.
   */
  search(query: SearchPeopleQuery): Promise<Result<PersonSearchHits, PeopleError>>;
}
