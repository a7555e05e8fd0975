/**
 * Derivation of obligations from documents, debts and debt installments.
 */

import { normalizeRecipients } from '../../../common/recipients.js';

import { DEBT_THRESHOLDS, DOCUMENT_THRESHOLDS, type Obligation } from './types.js';

import type { IsoDate } from '../../../common/dates.js';

/**
 * Document row joined with its farm and responsible person.
 */
export interface DocumentObligationSource {
  id: string;
  name: string;
  kind: string;
  customKind: string | null;
  issuedOn: IsoDate;
  expiresOn: IsoDate | null;
  alertEmails: string[];
  alertThresholds: number[] | null;
  alertsEnabled: boolean;
  farmName: string | null;
  personName: string | null;
  personEmail: string | null;
}

/**
 * Debt row with its people and alert settings. `alertEmails` and
 * `alertsActive` are null when no settings exist.
 */
export interface DebtObligationSource {
  id: string;
  bank: string;
  proposalNumber: string;
  finalDueOn: IsoDate;
  interestRate: string;
  rateBasis: string;
  amount: string;
  outstandingAmount: string;
  people: string[];
  alertEmails: string[] | null;
  alertsActive: boolean | null;
}

/**
 * Installment row with its debt, the debt's people and the debt's alert
 * settings.
 */
export interface InstallmentObligationSource {
  id: string;
  debtId: string;
  bank: string;
  proposalNumber: string;
  dueOn: IsoDate;
  amount: string;
  paid: boolean;
  people: string[];
  alertEmails: string[] | null;
  alertsActive: boolean | null;
}

/**
 * Documents without an expiry date never fall due and yield null.
 */
export const buildDocumentObligation = (source: DocumentObligationSource): Obligation | null => {
  if (source.expiresOn === null) return null;

  const thresholds =
    source.alertThresholds !== null && source.alertThresholds.length > 0
      ? source.alertThresholds
      : DOCUMENT_THRESHOLDS;

  return {
    kind: 'document',
    id: source.id,
    title: source.name,
    dueOn: source.expiresOn,
    recipients: normalizeRecipients([source.personEmail, ...source.alertEmails]),
    active: source.alertsEnabled,
    thresholds: [...thresholds],
    details: {
      kind: 'document',
      documentKind: source.customKind ?? source.kind,
      issuedOn: source.issuedOn,
      farmName: source.farmName,
      personName: source.personName,
    },
  };
};

export const buildDebtObligation = (source: DebtObligationSource): Obligation => ({
  kind: 'debt',
  id: source.id,
  title: `${source.bank} - ${source.proposalNumber}`,
  dueOn: source.finalDueOn,
  recipients: normalizeRecipients(source.alertEmails ?? []),
  active: source.alertsActive ?? false,
  thresholds: [...DEBT_THRESHOLDS],
  details: {
    kind: 'debt',
    bank: source.bank,
    proposalNumber: source.proposalNumber,
    interestRate: source.interestRate,
    rateBasis: source.rateBasis,
    amount: source.amount,
    outstandingAmount: source.outstandingAmount,
    people: source.people,
  },
});

/**
 * A paid installment stays readable but is never warned.
 */
export const buildInstallmentObligation = (source: InstallmentObligationSource): Obligation => ({
  kind: 'installment',
  id: source.id,
  title: `${source.bank} - ${source.proposalNumber} - parcela ${source.dueOn}`,
  dueOn: source.dueOn,
  recipients: normalizeRecipients(source.alertEmails ?? []),
  active: (source.alertsActive ?? false) && !source.paid,
  thresholds: [...DEBT_THRESHOLDS],
  details: {
    kind: 'installment',
    debtId: source.debtId,
    bank: source.bank,
    proposalNumber: source.proposalNumber,
    amount: source.amount,
    people: source.people,
  },
});
