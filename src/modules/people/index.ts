/**
 * People Module - Public API
 *
 * People (individuals and companies) referenced by farms, documents and debts,
 * plus the cached search behind the person autocomplete.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  Person,
  NewPerson,
  PersonPatch,
  CreatePersonInput,
  UpdatePersonInput,
  SearchPeopleQuery,
  PersonSearchHits,
  PersonSearchHit,
  PersonSummary,
  PersonSearchPage,
} from './core/types.js';

export {
  SEARCH_MIN_TERM_LENGTH,
  SEARCH_DEFAULT_LIMIT,
  SEARCH_MAX_LIMIT,
  SEARCH_CACHE_TTL_MS,
  PersonSearchHitsSchema,
} from './core/types.js';

export { normalizeTaxId, isValidTaxId, formatTaxId } from './core/tax-id.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type {
  PeopleError,
  PersonNotFoundError,
  PersonConflictError,
  PersonInUseError,
} from './core/errors.js';

export {
  createPersonNotFoundError,
  createPersonConflictError,
  createPersonInUseError,
  PEOPLE_ERROR_HTTP_STATUS,
  getHttpStatusForError,
} from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Ports & Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export type { PeopleRepository } from './core/ports.js';

export { createPerson, type CreatePersonDeps } from './core/usecases/create-person.js';
export { getPerson, type GetPersonDeps } from './core/usecases/get-person.js';
export { listPeople, type ListPeopleDeps } from './core/usecases/list-people.js';
export {
  updatePerson,
  type UpdatePersonDeps,
  type UpdatePersonUseCaseInput,
} from './core/usecases/update-person.js';
export { deletePerson, type DeletePersonDeps } from './core/usecases/delete-person.js';
export {
  searchPeople,
  type SearchPeopleDeps,
  type SearchPeopleInput,
} from './core/usecases/search-people.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { makePeopleRepo, type PeopleRepoOptions } from './shell/repo/people-repo.js';
export { makePeopleRoutes, type MakePeopleRoutesDeps } from './shell/rest/routes.js';
