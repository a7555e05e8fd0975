import { normalizePagination, type OffsetPage } from '../../../../common/constants/pagination.js';

import type { DebtsError } from '../errors.js';
import type { DebtsRepository } from '../ports.js';
import type { Debt } from '../types.js';
import type { Result } from 'neverthrow';

export interface ListDebtsDeps {
  debtsRepo: DebtsRepository;
}

export interface ListDebtsInput {
  /** Case-insensitive substring of the bank name */
  bank?: string;
  limit?: number;
  offset?: number;
}

export async function listDebts(
  deps: ListDebtsDeps,
  input: ListDebtsInput
): Promise<Result<OffsetPage<Debt>, DebtsError>> {
  const bank = input.bank?.trim() ?? '';

  return deps.debtsRepo.list({
    ...normalizePagination(input),
    ...(bank !== '' && { bank }),
  });
}
