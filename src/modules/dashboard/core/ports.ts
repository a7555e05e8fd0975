import type { DatabaseError } from '../../../common/errors.js';
import type { DashboardSummary, DashboardWindow } from './types.js';
import type { Result } from 'neverthrow';

export interface DashboardRepository {
  getSummary(window: DashboardWindow): Promise<Result<DashboardSummary, DatabaseError>>;
}
