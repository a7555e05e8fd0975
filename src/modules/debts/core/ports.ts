/**
 * Debts Module - Port Interfaces
 */

import type { DebtsError } from './errors.js';
import type {
  Debt,
  DebtAlertSettings,
  DebtFields,
  DebtLinks,
  DebtListFilter,
  DueInstallment,
  Installment,
  NewInstallment,
} from './types.js';
import type { IsoDate } from '../../../common/dates.js';
import type { OffsetPage } from '../../../common/constants/pagination.js';
import type { Decimal } from 'decimal.js';
import type { Result } from 'neverthrow';

export interface DebtsRepository {
  /**
   * Inserts the debt, its links and installments in one transaction.
   * Unknown people or farms fail with a ValidationError.
   */
  create(
    fields: DebtFields,
    links: DebtLinks,
    installments: NewInstallment[]
  ): Promise<Result<Debt, DebtsError>>;

  findById(id: string): Promise<Result<Debt | null, DebtsError>>;

  /** Ordered by final due date */
  list(filter: DebtListFilter): Promise<Result<OffsetPage<Debt>, DebtsError>>;

  /** Links present in `links` replace the stored ones */
  update(
    id: string,
    fields: DebtFields,
    links: Partial<DebtLinks>
  ): Promise<Result<Debt | null, DebtsError>>;

  delete(id: string): Promise<Result<boolean, DebtsError>>;

  // ─────────────────────────────────────────────────────────────────────────
  // Installments
  // ─────────────────────────────────────────────────────────────────────────

  addInstallment(
    debtId: string,
    installment: NewInstallment
  ): Promise<Result<Installment, DebtsError>>;

  findInstallment(
    debtId: string,
    installmentId: string
  ): Promise<Result<Installment | null, DebtsError>>;

  /**
   * Marks an unpaid installment as paid.
   * Returns null when it does not exist or was already paid.
   */
  markInstallmentPaid(
    installmentId: string,
    paidOn: IsoDate,
    amountPaid: Decimal
  ): Promise<Result<Installment | null, DebtsError>>;

  removeInstallment(debtId: string, installmentId: string): Promise<Result<boolean, DebtsError>>;

  /** Unpaid installments of every debt due on or before `until`, by due date */
  listUnpaidInstallments(until: IsoDate): Promise<Result<DueInstallment[], DebtsError>>;

  // ─────────────────────────────────────────────────────────────────────────
  // Alert settings
  // ─────────────────────────────────────────────────────────────────────────

  getAlertSettings(debtId: string): Promise<Result<DebtAlertSettings | null, DebtsError>>;

  /** Replaces the settings of the debt */
  upsertAlertSettings(
    debtId: string,
    emails: string[],
    active: boolean
  ): Promise<Result<DebtAlertSettings, DebtsError>>;
}
