/**
 * Dashboard Repository Implementation
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { createDatabaseError, type DatabaseError } from '../../../../common/errors.js';

import type { FarmDbClient } from '../../../../infra/database/client.js';
import type { DashboardRepository } from '../../core/ports.js';
import type { DashboardSummary, DashboardWindow } from '../../core/types.js';
import type { Logger } from 'pino';

export interface DashboardRepoOptions {
  db: FarmDbClient;
  logger: Logger;
}

class KyselyDashboardRepo implements DashboardRepository {
  private readonly db: FarmDbClient;
  private readonly log: Logger;

  constructor(options: DashboardRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'DashboardRepo' });
  }

  async getSummary(window: DashboardWindow): Promise<Result<DashboardSummary, DatabaseError>> {
    const { today, until } = window;

    try {
      const [people, farms, documents, debts, expiring, dueSoon, outstanding] = await Promise.all([
        this.db
          .selectFrom('people')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .executeTakeFirstOrThrow(),
        this.db
          .selectFrom('farms')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .executeTakeFirstOrThrow(),
        this.db
          .selectFrom('documents')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .executeTakeFirstOrThrow(),
        this.db
          .selectFrom('debts')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .executeTakeFirstOrThrow(),
        this.db
          .selectFrom('documents')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .where('expires_on', '>=', today)
          .where('expires_on', '<=', until)
          .executeTakeFirstOrThrow(),
        this.db
          .selectFrom('debts')
          .select((eb) => eb.fn.countAll<string>().as('count'))
          .where('final_due_on', '>=', today)
          .where('final_due_on', '<=', until)
          .executeTakeFirstOrThrow(),
        this.db
          .selectFrom('debt_installments')
          .select((eb) => eb.fn.sum<string | null>('amount').as('total'))
          .where('paid', '=', false)
          .executeTakeFirstOrThrow(),
      ]);

      return ok({
        people: Number(people.count),
        farms: Number(farms.count),
        documents: Number(documents.count),
        debts: Number(debts.count),
        documentsExpiringSoon: Number(expiring.count),
        debtsDueSoon: Number(dueSoon.count),
        outstandingAmount: new Decimal(outstanding.total ?? '0').toFixed(2),
      });
    } catch (error) {
      this.log.error({ err: error }, 'Failed to load dashboard summary');
      return err(createDatabaseError('Failed to load dashboard summary', error));
    }
  }
}

export const makeDashboardRepo = (options: DashboardRepoOptions): DashboardRepository => {
  return new KyselyDashboardRepo(options);
};
