import { normalizePagination, type OffsetPage } from '../../../../common/constants/pagination.js';

import type { FarmsError } from '../errors.js';
import type { FarmsRepository } from '../ports.js';
import type { Farm } from '../types.js';
import type { Result } from 'neverthrow';

export interface ListFarmsDeps {
  farmsRepo: FarmsRepository;
}

export async function listFarms(
  deps: ListFarmsDeps,
  input: { limit?: number; offset?: number }
): Promise<Result<OffsetPage<Farm>, FarmsError>> {
  return deps.farmsRepo.list(normalizePagination(input));
}
