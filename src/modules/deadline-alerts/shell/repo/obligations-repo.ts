/**
 * Obligations Repository Implementation
 *
 * Reads documents, debts and installments in the shape the alert engine
 * works with.
 */

import { err, ok, type Result } from 'neverthrow';

import {
  buildDebtObligation,
  buildDocumentObligation,
  buildInstallmentObligation,
} from '../../core/obligations.js';
import { createDatabaseError, type DatabaseError } from '../../core/errors.js';

import type { IsoDate } from '../../../../common/dates.js';
import type { FarmDbClient } from '../../../../infra/database/client.js';
import type { ObligationsRepository } from '../../core/ports.js';
import type { Obligation, ObligationKind } from '../../core/types.js';
import type { Logger } from 'pino';

export interface ObligationsRepoOptions {
  db: FarmDbClient;
  logger: Logger;
}

/**
 * `after` selects active obligations due after the date; `id` selects one
 * obligation regardless of its settings.
 */
type LoadBy = { after: IsoDate } | { id: string };

class KyselyObligationsRepo implements ObligationsRepository {
  private readonly db: FarmDbClient;
  private readonly log: Logger;

  constructor(options: ObligationsRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ repo: 'ObligationsRepo' });
  }

  async listActive(
    kind: ObligationKind,
    after: IsoDate
  ): Promise<Result<Obligation[], DatabaseError>> {
    try {
      return ok(await this.load(kind, { after }));
    } catch (error) {
      this.log.error({ err: error, kind }, 'Failed to list active obligations');
      return err(createDatabaseError('Failed to list active obligations', error));
    }
  }

  async find(kind: ObligationKind, id: string): Promise<Result<Obligation | null, DatabaseError>> {
    try {
      const obligations = await this.load(kind, { id });
      return ok(obligations[0] ?? null);
    } catch (error) {
      this.log.error({ err: error, kind, obligationId: id }, 'Failed to find obligation');
      return err(createDatabaseError('Failed to find obligation', error));
    }
  }

  private load(kind: ObligationKind, by: LoadBy): Promise<Obligation[]> {
    switch (kind) {
      case 'document':
        return this.loadDocuments(by);
      case 'debt':
        return this.loadDebts(by);
      case 'installment':
        return this.loadInstallments(by);
    }
  }

  private async loadDocuments(by: LoadBy): Promise<Obligation[]> {
    let query = this.db
      .selectFrom('documents as d')
      .leftJoin('farms as f', 'f.id', 'd.farm_id')
      .leftJoin('people as p', 'p.id', 'd.person_id')
      .select([
        'd.id',
        'd.name',
        'd.kind',
        'd.custom_kind',
        'd.issued_on',
        'd.expires_on',
        'd.alert_emails',
        'd.alert_thresholds',
        'd.alerts_enabled',
        'f.name as farm_name',
        'p.name as person_name',
        'p.email as person_email',
      ]);

    query =
      'id' in by
        ? query.where('d.id', '=', by.id)
        : query.where('d.alerts_enabled', '=', true).where('d.expires_on', '>', by.after);

    const rows = await query.orderBy('d.expires_on', 'asc').orderBy('d.id', 'asc').execute();

    const obligations: Obligation[] = [];
    for (const row of rows) {
      const obligation = buildDocumentObligation({
        id: row.id,
        name: row.name,
        kind: row.kind,
        customKind: row.custom_kind,
        issuedOn: row.issued_on,
        expiresOn: row.expires_on,
        alertEmails: row.alert_emails,
        alertThresholds: row.alert_thresholds,
        alertsEnabled: row.alerts_enabled,
        farmName: row.farm_name,
        personName: row.person_name,
        personEmail: row.person_email,
      });
      if (obligation !== null) {
        obligations.push(obligation);
      }
    }

    return obligations;
  }

  private async loadDebts(by: LoadBy): Promise<Obligation[]> {
    let query = this.db
      .selectFrom('debts as d')
      .leftJoin('debt_alert_settings as s', 's.debt_id', 'd.id')
      .select([
        'd.id',
        'd.bank',
        'd.proposal_number',
        'd.final_due_on',
        'd.interest_rate',
        'd.rate_basis',
        'd.amount',
        's.emails',
        's.active',
      ]);

    query =
      'id' in by
        ? query.where('d.id', '=', by.id)
        : query.where('s.active', '=', true).where('d.final_due_on', '>', by.after);

    const rows = await query.orderBy('d.final_due_on', 'asc').orderBy('d.id', 'asc').execute();
    if (rows.length === 0) return [];

    const ids = rows.map((row) => row.id);

    const [peopleByDebt, outstandingRows] = await Promise.all([
      this.loadPeopleNames(ids),
      this.db
        .selectFrom('debt_installments')
        .select((eb) => ['debt_id', eb.fn.sum<string>('amount').as('outstanding')])
        .where('debt_id', 'in', ids)
        .where('paid', '=', false)
        .groupBy('debt_id')
        .execute(),
    ]);

    const outstandingByDebt = new Map(outstandingRows.map((row) => [row.debt_id, row.outstanding]));

    return rows.map((row) =>
      buildDebtObligation({
        id: row.id,
        bank: row.bank,
        proposalNumber: row.proposal_number,
        finalDueOn: row.final_due_on,
        interestRate: row.interest_rate,
        rateBasis: row.rate_basis,
        amount: row.amount,
        outstandingAmount: outstandingByDebt.get(row.id) ?? '0',
        people: peopleByDebt.get(row.id) ?? [],
        alertEmails: row.emails,
        alertsActive: row.active,
      })
    );
  }

  /**
   * Only unpaid installments are listed; a lookup by id also returns a paid
   * one, as inactive.
   */
  private async loadInstallments(by: LoadBy): Promise<Obligation[]> {
    let query = this.db
      .selectFrom('debt_installments as i')
      .innerJoin('debts as d', 'd.id', 'i.debt_id')
      .leftJoin('debt_alert_settings as s', 's.debt_id', 'd.id')
      .select([
        'i.id',
        'i.debt_id',
        'i.due_on',
        'i.amount',
        'i.paid',
        'd.bank',
        'd.proposal_number',
        's.emails',
        's.active',
      ]);

    query =
      'id' in by
        ? query.where('i.id', '=', by.id)
        : query
            .where('s.active', '=', true)
            .where('i.paid', '=', false)
            .where('i.due_on', '>', by.after);

    const rows = await query.orderBy('i.due_on', 'asc').orderBy('i.id', 'asc').execute();
    if (rows.length === 0) return [];

    const peopleByDebt = await this.loadPeopleNames([...new Set(rows.map((row) => row.debt_id))]);

    return rows.map((row) =>
      buildInstallmentObligation({
        id: row.id,
        debtId: row.debt_id,
        bank: row.bank,
        proposalNumber: row.proposal_number,
        dueOn: row.due_on,
        amount: row.amount,
        paid: row.paid,
        people: peopleByDebt.get(row.debt_id) ?? [],
        alertEmails: row.emails,
        alertsActive: row.active,
      })
    );
  }

  /** Names of each debt's people, ordered by name */
  private async loadPeopleNames(debtIds: readonly string[]): Promise<Map<string, string[]>> {
    const rows = await this.db
      .selectFrom('debt_people as dp')
      .innerJoin('people as p', 'p.id', 'dp.person_id')
      .select(['dp.debt_id', 'p.name'])
      .where('dp.debt_id', 'in', debtIds)
      .orderBy('p.name', 'asc')
      .execute();

    const peopleByDebt = new Map<string, string[]>();
    for (const row of rows) {
      const names = peopleByDebt.get(row.debt_id) ?? [];
      names.push(row.name);
      peopleByDebt.set(row.debt_id, names);
    }
    return peopleByDebt;
  }
}

export const makeObligationsRepo = (options: ObligationsRepoOptions): ObligationsRepository => {
  return new KyselyObligationsRepo(options);
};
