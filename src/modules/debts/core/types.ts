/**
 * Debts Module - Core Types
 *
 * Bank financing with installments, the people and farms it involves,
 * and who gets warned before it falls due.
 */

import { Decimal } from 'decimal.js';

import type { IsoDate } from '../../../common/dates.js';

// ─────────────────────────────────────────────────────────────────────────────
// Enumerations
// ─────────────────────────────────────────────────────────────────────────────

export const RATE_BASES = ['yearly', 'monthly'] as const;
export type RateBasis = (typeof RATE_BASES)[number];

export const isRateBasis = (value: string): value is RateBasis =>
  RATE_BASES.some((basis) => basis === value);

/**
 * credit_object: the farm the money is spent on; collateral: the farm pledged.
 */
export const DEBT_FARM_PURPOSES = ['credit_object', 'collateral'] as const;
export type DebtFarmPurpose = (typeof DEBT_FARM_PURPOSES)[number];

export const isDebtFarmPurpose = (value: string): value is DebtFarmPurpose =>
  DEBT_FARM_PURPOSES.some((purpose) => purpose === value);

// ─────────────────────────────────────────────────────────────────────────────
// Domain Types
// ─────────────────────────────────────────────────────────────────────────────

export interface DebtFarmLink {
  farmId: string;
  purpose: DebtFarmPurpose;
  hectares: Decimal | null;
}

export interface Installment {
  id: string;
  debtId: string;
  dueOn: IsoDate;
  amount: Decimal;
  paid: boolean;
  paidOn: IsoDate | null;
  amountPaid: Decimal | null;
  notes: string | null;
}

/**
 * Scalar debt columns.
 */
export interface DebtFields {
  bank: string;
  proposalNumber: string;
  issuedOn: IsoDate;
  finalDueOn: IsoDate;
  interestRate: Decimal;
  rateBasis: RateBasis;
  gracePeriodMonths: number | null;
  amount: Decimal;
}

export interface Debt extends DebtFields {
  id: string;
  personIds: string[];
  farmLinks: DebtFarmLink[];
  /** Ordered by due date */
  installments: Installment[];
  /** Sum of unpaid installment amounts */
  outstandingAmount: Decimal;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Unpaid installment with the debt it belongs to.
 */
export interface DueInstallment extends Installment {
  bank: string;
  proposalNumber: string;
}

/** Default look-ahead of the due installments listing */
export const INSTALLMENT_DUE_SOON_DAYS = 30;

export interface DueInstallments {
  today: IsoDate;
  /** Due before today */
  overdue: DueInstallment[];
  /** Due from today through the look-ahead */
  dueSoon: DueInstallment[];
}

export interface NewInstallment {
  dueOn: IsoDate;
  amount: Decimal;
  notes: string | null;
}

export interface DebtLinks {
  personIds: string[];
  farmLinks: DebtFarmLink[];
}

export interface DebtAlertSettings {
  debtId: string;
  emails: string[];
  active: boolean;
  updatedAt: Date;
}

export interface DebtListFilter {
  bank?: string;
  limit: number;
  offset: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Inputs (raw, before validation)
// ─────────────────────────────────────────────────────────────────────────────

export interface DebtFarmLinkInput {
  farmId: string;
  purpose: string;
  hectares?: string | null;
}

export interface InstallmentInput {
  dueOn: string;
  amount: string;
  notes?: string | null;
}

export interface DebtFieldsInput {
  bank: string;
  proposalNumber: string;
  issuedOn: string;
  finalDueOn: string;
  interestRate: string;
  rateBasis: string;
  gracePeriodMonths?: number | null;
  amount: string;
}

export interface CreateDebtInput extends DebtFieldsInput {
  personIds?: string[];
  farmLinks?: DebtFarmLinkInput[];
  installments?: InstallmentInput[];
}

export interface UpdateDebtInput extends Partial<DebtFieldsInput> {
  /** Replaces every person link when given */
  personIds?: string[];
  /** Replaces every farm link when given */
  farmLinks?: DebtFarmLinkInput[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Pure Functions
// ─────────────────────────────────────────────────────────────────────────────

export const computeOutstandingAmount = (installments: readonly Installment[]): Decimal =>
  installments
    .filter((installment) => !installment.paid)
    .reduce((sum, installment) => sum.plus(installment.amount), new Decimal(0));
