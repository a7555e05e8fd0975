import { describe, expect, it } from 'vitest';

import { getDashboardSummary } from '@/modules/dashboard/index.js';

import { makeFakeDashboardRepo } from '../../fixtures/fakes.js';

describe('getDashboardSummary', () => {
  it('counts deadlines over the next 30 days', async () => {
    const dashboardRepo = makeFakeDashboardRepo({ farms: 3, outstandingAmount: '1500.00' });

    const result = await getDashboardSummary({ dashboardRepo }, { today: '2024-12-15' });

    expect(result._unsafeUnwrap()).toMatchObject({ farms: 3, outstandingAmount: '1500.00' });
    expect(dashboardRepo.windows).toEqual([{ today: '2024-12-15', until: '2025-01-14' }]);
  });

  it('rejects invalid dates', async () => {
    const dashboardRepo = makeFakeDashboardRepo();

    const result = await getDashboardSummary({ dashboardRepo }, { today: '15/12/2024' });

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'ValidationError', field: 'today' });
    expect(dashboardRepo.windows).toEqual([]);
  });
});
