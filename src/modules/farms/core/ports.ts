/**
 * Farms Module - Port Interfaces
 */

import type { FarmsError } from './errors.js';
import type { Farm, FarmFields, FarmPerson, FarmTenure } from './types.js';
import type { OffsetPage } from '../../../common/constants/pagination.js';
import type { Result } from 'neverthrow';

export interface FarmsRepository {
  /** Fails with FarmConflictError on a duplicate registration number */
  create(fields: FarmFields): Promise<Result<Farm, FarmsError>>;

  findById(id: string): Promise<Result<Farm | null, FarmsError>>;

  /** Ordered by name */
  list(params: { limit: number; offset: number }): Promise<Result<OffsetPage<Farm>, FarmsError>>;

  /** Replaces every field; null when the farm does not exist */
  update(id: string, fields: FarmFields): Promise<Result<Farm | null, FarmsError>>;

  delete(id: string): Promise<Result<boolean, FarmsError>>;

  listPeople(farmId: string): Promise<Result<FarmPerson[], FarmsError>>;

  personExists(personId: string): Promise<Result<boolean, FarmsError>>;

  /** Inserts the link or replaces its tenure */
  upsertPersonLink(
    farmId: string,
    personId: string,
    tenure: FarmTenure
  ): Promise<Result<FarmPerson, FarmsError>>;

  /** Returns false when there was no link */
  deletePersonLink(farmId: string, personId: string): Promise<Result<boolean, FarmsError>>;
}
