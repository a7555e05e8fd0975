/**
 * Debts Repository Implementation
 *
 * Kysely-based implementation over debts, debt_people, debt_farms,
 * debt_installments and debt_alert_settings.
 */

import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { isForeignKeyViolation } from '../../../../common/errors.js';
import {
  createDatabaseError,
  createMissingReferenceError,
  type DebtsError,
} from '../../core/errors.js';
import {
  computeOutstandingAmount,
  isDebtFarmPurpose,
  isRateBasis,
  type Debt,
  type DebtAlertSettings,
  type DebtFarmLink,
  type DebtFields,
  type DebtLinks,
  type DebtListFilter,
  type DueInstallment,
  type Installment,
  type NewInstallment,
} from '../../core/types.js';

import type { OffsetPage } from '../../../../common/constants/pagination.js';
import type { IsoDate } from '../../../../common/dates.js';
import type {
  DebtInstallmentsTable,
  DebtsTable,
  FarmDbClient,
} from '../../../../infra/database/client.js';
import type { DebtsRepository } from '../../core/ports.js';
import type { Selectable } from 'kysely';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface DebtsRepoOptions {
  db: FarmDbClient;
  logger: Logger;
}

type DebtRow = Selectable<DebtsTable>;
type InstallmentRow = Selectable<DebtInstallmentsTable>;

const toDebtColumns = (fields: DebtFields) => ({
  bank: fields.bank,
  proposal_number: fields.proposalNumber,
  issued_on: fields.issuedOn,
  final_due_on: fields.finalDueOn,
  interest_rate: fields.interestRate.toString(),
  rate_basis: fields.rateBasis,
  grace_period_months: fields.gracePeriodMonths,
  amount: fields.amount.toString(),
});

const toInstallmentColumns = (debtId: string, installment: NewInstallment) => ({
  debt_id: debtId,
  due_on: installment.dueOn,
  amount: installment.amount.toString(),
  notes: installment.notes,
});

const mapRowToInstallment = (row: InstallmentRow): Installment => ({
  id: row.id,
  debtId: row.debt_id,
  dueOn: row.due_on,
  amount: new Decimal(row.amount),
  paid: row.paid,
  paidOn: row.paid_on,
  amountPaid: row.amount_paid === null ? null : new Decimal(row.amount_paid),
  notes: row.notes,
});

// ─────────────────────────────────────────────────────────────────────────────
// Repository Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyDebtsRepo implements DebtsRepository {
  private readonly db: FarmDbClient;
  private readonly log: Logger;

  constructor(options: DebtsRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'DebtsRepo' });
  }

  async create(
    fields: DebtFields,
    links: DebtLinks,
    installments: NewInstallment[]
  ): Promise<Result<Debt, DebtsError>> {
    try {
      const debt = await this.db.transaction().execute(async (trx) => {
        const row = await trx
          .insertInto('debts')
          .values(toDebtColumns(fields))
          .returningAll()
          .executeTakeFirstOrThrow();

        await this.writeLinks(trx, row.id, links);

        if (installments.length > 0) {
          await trx
            .insertInto('debt_installments')
            .values(installments.map((installment) => toInstallmentColumns(row.id, installment)))
            .execute();
        }

        const [loaded] = await this.hydrate(trx, [row]);
        return loaded;
      });

      if (debt === undefined) {
        return err(createDatabaseError('Created debt could not be loaded'));
      }

      this.log.debug({ debtId: debt.id }, 'Debt created');
      return ok(debt);
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        return err(createMissingReferenceError());
      }
      this.log.error({ err: error }, 'Failed to create debt');
      return err(createDatabaseError('Failed to create debt', error));
    }
  }

  async findById(id: string): Promise<Result<Debt | null, DebtsError>> {
    try {
      const row = await this.db
        .selectFrom('debts')
        .selectAll()
        .where('id', '=', id)
        .executeTakeFirst();

      if (row === undefined) {
        return ok(null);
      }

      const [debt] = await this.hydrate(this.db, [row]);
      return ok(debt ?? null);
    } catch (error) {
      this.log.error({ err: error, debtId: id }, 'Failed to find debt by ID');
      return err(createDatabaseError('Failed to find debt by ID', error));
    }
  }

  async list(filter: DebtListFilter): Promise<Result<OffsetPage<Debt>, DebtsError>> {
    const { bank, limit, offset } = filter;

    let base = this.db.selectFrom('debts');
    if (bank !== undefined) {
      base = base.where('bank', 'ilike', `%${bank.replace(/[\\%_]/g, (char) => `\\${char}`)}%`);
    }

    try {
      const [rows, countRow] = await Promise.all([
        base
          .selectAll()
          .orderBy('final_due_on', 'asc')
          .orderBy('id', 'asc')
          .limit(limit)
          .offset(offset)
          .execute(),
        base.select((eb) => eb.fn.countAll<string>().as('count')).executeTakeFirstOrThrow(),
      ]);

      return ok({
        items: await this.hydrate(this.db, rows),
        total: Number(countRow.count),
        limit,
        offset,
      });
    } catch (error) {
      this.log.error({ err: error, filter }, 'Failed to list debts');
      return err(createDatabaseError('Failed to list debts', error));
    }
  }

  async update(
    id: string,
    fields: DebtFields,
    links: Partial<DebtLinks>
  ): Promise<Result<Debt | null, DebtsError>> {
    try {
      const debt = await this.db.transaction().execute(async (trx) => {
        const row = await trx
          .updateTable('debts')
          .set({ ...toDebtColumns(fields), updated_at: new Date() })
          .where('id', '=', id)
          .returningAll()
          .executeTakeFirst();

        if (row === undefined) {
          return null;
        }

        await this.writeLinks(trx, id, links, true);

        const [loaded] = await this.hydrate(trx, [row]);
        return loaded ?? null;
      });

      return ok(debt);
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        return err(createMissingReferenceError());
      }
      this.log.error({ err: error, debtId: id }, 'Failed to update debt');
      return err(createDatabaseError('Failed to update debt', error));
    }
  }

  async delete(id: string): Promise<Result<boolean, DebtsError>> {
    try {
      const result = await this.db.deleteFrom('debts').where('id', '=', id).executeTakeFirst();
      return ok(Number(result.numDeletedRows) > 0);
    } catch (error) {
      this.log.error({ err: error, debtId: id }, 'Failed to delete debt');
      return err(createDatabaseError('Failed to delete debt', error));
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Installments
  // ─────────────────────────────────────────────────────────────────────────

  async addInstallment(
    debtId: string,
    installment: NewInstallment
  ): Promise<Result<Installment, DebtsError>> {
    try {
      const row = await this.db
        .insertInto('debt_installments')
        .values(toInstallmentColumns(debtId, installment))
        .returningAll()
        .executeTakeFirstOrThrow();
      return ok(mapRowToInstallment(row));
    } catch (error) {
      this.log.error({ err: error, debtId }, 'Failed to add installment');
      return err(createDatabaseError('Failed to add installment', error));
    }
  }

  async findInstallment(
    debtId: string,
    installmentId: string
  ): Promise<Result<Installment | null, DebtsError>> {
    try {
      const row = await this.db
        .selectFrom('debt_installments')
        .selectAll()
        .where('id', '=', installmentId)
        .where('debt_id', '=', debtId)
        .executeTakeFirst();
      return ok(row === undefined ? null : mapRowToInstallment(row));
    } catch (error) {
      this.log.error({ err: error, debtId, installmentId }, 'Failed to find installment');
      return err(createDatabaseError('Failed to find installment', error));
    }
  }

  async markInstallmentPaid(
    installmentId: string,
    paidOn: IsoDate,
    amountPaid: Decimal
  ): Promise<Result<Installment | null, DebtsError>> {
    try {
      const row = await this.db
        .updateTable('debt_installments')
        .set({ paid: true, paid_on: paidOn, amount_paid: amountPaid.toString() })
        .where('id', '=', installmentId)
        .where('paid', '=', false)
        .returningAll()
        .executeTakeFirst();
      return ok(row === undefined ? null : mapRowToInstallment(row));
    } catch (error) {
      this.log.error({ err: error, installmentId }, 'Failed to mark installment as paid');
      return err(createDatabaseError('Failed to mark installment as paid', error));
    }
  }

  async removeInstallment(
    debtId: string,
    installmentId: string
  ): Promise<Result<boolean, DebtsError>> {
    try {
      const result = await this.db
        .deleteFrom('debt_installments')
        .where('id', '=', installmentId)
        .where('debt_id', '=', debtId)
        .executeTakeFirst();
      return ok(Number(result.numDeletedRows) > 0);
    } catch (error) {
      this.log.error({ err: error, debtId, installmentId }, 'Failed to remove installment');
      return err(createDatabaseError('Failed to remove installment', error));
    }
  }

  async listUnpaidInstallments(until: IsoDate): Promise<Result<DueInstallment[], DebtsError>> {
    try {
      const rows = await this.db
        .selectFrom('debt_installments as i')
        .innerJoin('debts as d', 'd.id', 'i.debt_id')
        .selectAll('i')
        .select(['d.bank', 'd.proposal_number'])
        .where('i.paid', '=', false)
        .where('i.due_on', '<=', until)
        .orderBy('i.due_on', 'asc')
        .orderBy('i.id', 'asc')
        .execute();
      return ok(
        rows.map((row) => ({
          ...mapRowToInstallment(row),
          bank: row.bank,
          proposalNumber: row.proposal_number,
        }))
      );
    } catch (error) {
      this.log.error({ err: error, until }, 'Failed to list unpaid installments');
      return err(createDatabaseError('Failed to list unpaid installments', error));
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Alert settings
  // ─────────────────────────────────────────────────────────────────────────

  async getAlertSettings(debtId: string): Promise<Result<DebtAlertSettings | null, DebtsError>> {
    try {
      const row = await this.db
        .selectFrom('debt_alert_settings')
        .selectAll()
        .where('debt_id', '=', debtId)
        .executeTakeFirst();

      if (row === undefined) {
        return ok(null);
      }

      return ok({
        debtId: row.debt_id,
        emails: row.emails,
        active: row.active,
        updatedAt: row.updated_at,
      });
    } catch (error) {
      this.log.error({ err: error, debtId }, 'Failed to load debt alert settings');
      return err(createDatabaseError('Failed to load debt alert settings', error));
    }
  }

  async upsertAlertSettings(
    debtId: string,
    emails: string[],
    active: boolean
  ): Promise<Result<DebtAlertSettings, DebtsError>> {
    const updatedAt = new Date();

    try {
      const row = await this.db
        .insertInto('debt_alert_settings')
        .values({ debt_id: debtId, emails, active, updated_at: updatedAt })
        .onConflict((oc) =>
          oc.column('debt_id').doUpdateSet({ emails, active, updated_at: updatedAt })
        )
        .returningAll()
        .executeTakeFirstOrThrow();

      return ok({
        debtId: row.debt_id,
        emails: row.emails,
        active: row.active,
        updatedAt: row.updated_at,
      });
    } catch (error) {
      this.log.error({ err: error, debtId }, 'Failed to save debt alert settings');
      return err(createDatabaseError('Failed to save debt alert settings', error));
    }
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Writes the links present in `links`; with `replace` the stored ones are
   * deleted first.
   */
  private async writeLinks(
    db: FarmDbClient,
    debtId: string,
    links: Partial<DebtLinks>,
    replace = false
  ): Promise<void> {
    const { personIds, farmLinks } = links;

    if (personIds !== undefined) {
      if (replace) {
        await db.deleteFrom('debt_people').where('debt_id', '=', debtId).execute();
      }
      if (personIds.length > 0) {
        await db
          .insertInto('debt_people')
          .values(personIds.map((personId) => ({ debt_id: debtId, person_id: personId })))
          .execute();
      }
    }

    if (farmLinks !== undefined) {
      if (replace) {
        await db.deleteFrom('debt_farms').where('debt_id', '=', debtId).execute();
      }
      if (farmLinks.length > 0) {
        await db
          .insertInto('debt_farms')
          .values(
            farmLinks.map((link) => ({
              debt_id: debtId,
              farm_id: link.farmId,
              purpose: link.purpose,
              hectares: link.hectares === null ? null : link.hectares.toString(),
            }))
          )
          .execute();
      }
    }
  }

  /**
   * Loads people, farm links and installments for a batch of debt rows,
   * three queries whatever the batch size.
   */
  private async hydrate(db: FarmDbClient, rows: DebtRow[]): Promise<Debt[]> {
    if (rows.length === 0) {
      return [];
    }
    const ids = rows.map((row) => row.id);

    const [peopleRows, farmRows, installmentRows] = await Promise.all([
      db.selectFrom('debt_people').selectAll().where('debt_id', 'in', ids).execute(),
      db.selectFrom('debt_farms').selectAll().where('debt_id', 'in', ids).execute(),
      db
        .selectFrom('debt_installments')
        .selectAll()
        .where('debt_id', 'in', ids)
        .orderBy('due_on', 'asc')
        .orderBy('created_at', 'asc')
        .execute(),
    ]);

    return rows.map((row) => {
      const installments = installmentRows
        .filter((installment) => installment.debt_id === row.id)
        .map(mapRowToInstallment);

      const farmLinks: DebtFarmLink[] = farmRows
        .filter((link) => link.debt_id === row.id)
        .flatMap((link) =>
          isDebtFarmPurpose(link.purpose)
            ? [
                {
                  farmId: link.farm_id,
                  purpose: link.purpose,
                  hectares: link.hectares === null ? null : new Decimal(link.hectares),
                },
              ]
            : []
        );

      return {
        id: row.id,
        bank: row.bank,
        proposalNumber: row.proposal_number,
        issuedOn: row.issued_on,
        finalDueOn: row.final_due_on,
        interestRate: new Decimal(row.interest_rate),
        rateBasis: isRateBasis(row.rate_basis) ? row.rate_basis : 'yearly',
        gracePeriodMonths: row.grace_period_months,
        amount: new Decimal(row.amount),
        personIds: peopleRows
          .filter((person) => person.debt_id === row.id)
          .map((person) => person.person_id),
        farmLinks,
        installments,
        outstandingAmount: computeOutstandingAmount(installments),
        createdAt: row.created_at,
        updatedAt: row.updated_at,
      };
    });
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export const makeDebtsRepo = (options: DebtsRepoOptions): DebtsRepository => {
  return new KyselyDebtsRepo(options);
};
