/**
 * People Module - Core Types
 */

import { Type, type Static } from '@sinclair/typebox';

import type { PageInfo } from '../../../common/constants/pagination.js';

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Shorter search terms return an empty page */
export const SEARCH_MIN_TERM_LENGTH = 2;
export const SEARCH_DEFAULT_LIMIT = 10;
export const SEARCH_MAX_LIMIT = 50;
/** Search pages stay cached for five minutes */
export const SEARCH_CACHE_TTL_MS = 5 * 60 * 1000;

export const NAME_MAX_LENGTH = 200;

// ─────────────────────────────────────────────────────────────────────────────
// Domain Types
// ─────────────────────────────────────────────────────────────────────────────

export interface Person {
  id: string;
  name: string;
  /** CPF (11 digits) or CNPJ (14 digits), digits only */
  taxId: string;
  email: string | null;
  phone: string | null;
  address: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewPerson {
  name: string;
  taxId: string;
  email: string | null;
  phone: string | null;
  address: string | null;
}

export type PersonPatch = Partial<NewPerson>;

export interface CreatePersonInput {
  name: string;
  taxId: string;
  email?: string | null;
  phone?: string | null;
  address?: string | null;
}

export type UpdatePersonInput = Partial<CreatePersonInput>;

export interface SearchPeopleQuery {
  /** Normalized (trimmed, lower-cased) term */
  term: string;
  page: number;
  limit: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Search Results
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Raw search hits as returned by the repository.
 * JSON-safe, so the cached copy decodes back through the same schema.
 */
export const PersonSearchHitsSchema = Type.Object({
  items: Type.Array(
    Type.Object({
      id: Type.String(),
      name: Type.String(),
      taxId: Type.String(),
      email: Type.Union([Type.String(), Type.Null()]),
      phone: Type.Union([Type.String(), Type.Null()]),
    })
  ),
  total: Type.Integer({ minimum: 0 }),
});

export type PersonSearchHits = Static<typeof PersonSearchHitsSchema>;
export type PersonSearchHit = PersonSearchHits['items'][number];

export interface PersonSummary extends PersonSearchHit {
  formattedTaxId: string;
}

export interface PersonSearchPage {
  data: PersonSummary[];
  pagination: PageInfo;
}
