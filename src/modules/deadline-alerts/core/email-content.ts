/**
 * Wording and formatting of deadline alert emails (pt-BR).
 */

import { parseDecimal } from '../../../common/decimal.js';

import type { DueAlert } from './types.js';

const brl = new Intl.NumberFormat('pt-BR', { style: 'currency', currency: 'BRL' });

const DOCUMENT_KIND_LABELS: Readonly<Record<string, string>> = {
  certificate: 'Certidão',
  contract: 'Contrato',
  land: 'Documento de terra',
  other: 'Outro',
};

const RATE_BASIS_LABELS: Readonly<Record<string, string>> = {
  yearly: 'a.a.',
  monthly: 'a.m.',
};

/**
 * Human label for a threshold: "6 meses", "15 dias", "1 dia".
 */
export const getPeriodLabel = (days: number): string => {
  if (days === 180) return '6 meses';
  if (days === 90) return '3 meses';
  if (days === 60) return '2 meses';
  if (days === 1) return '1 dia';
  return `${String(days)} dias`;
};

export const getUrgencyColor = (daysRemaining: number): string => {
  if (daysRemaining <= 3) return '#d9480f';
  if (daysRemaining <= 7) return '#f08c00';
  if (daysRemaining <= 30) return '#1c7ed6';
  return '#2b8a3e';
};

export const buildSubject = (alert: DueAlert): string =>
  `[Vencimento] ${alert.obligation.title} - ${getPeriodLabel(alert.thresholdDays)}`;

/**
 * `R$ 1.234,56`. Intl separates the symbol with a no-break space.
 * Unparseable input is returned unchanged.
 */
export const formatMoney = (amount: string): string => {
  const value = parseDecimal(amount);
  return value === null ? amount : brl.format(value.toNumber());
};

/**
 * `12,5% a.a.`
 */
export const formatRate = (rate: string, basis: string): string => {
  const value = parseDecimal(rate);
  const number = value === null ? rate : value.toString().replace('.', ',');
  const suffix = RATE_BASIS_LABELS[basis];
  return suffix === undefined ? `${number}%` : `${number}% ${suffix}`;
};

export const getDocumentKindLabel = (kind: string): string => DOCUMENT_KIND_LABELS[kind] ?? kind;
