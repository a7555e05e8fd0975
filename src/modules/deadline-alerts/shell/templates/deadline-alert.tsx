/**
 * Deadline Alert Email Template
 *
 * Warns that a document expires or a debt or installment falls due in a few
 * days.
 */

import { Section, Text, Row, Column } from '@react-email/components';
// eslint-disable-next-line @typescript-eslint/naming-convention -- library name
import * as React from 'react';

import { EmailLayout } from './email-layout.js';
import { formatDayMonthYear } from '../../../../common/dates.js';
import {
  formatMoney,
  formatRate,
  getDocumentKindLabel,
  getPeriodLabel,
  getUrgencyColor,
} from '../../core/email-content.js';

import type {
  DebtObligationDetails,
  DocumentObligationDetails,
  DueAlert,
  InstallmentObligationDetails,
  ObligationDetails,
} from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Styles
// ─────────────────────────────────────────────────────────────────────────────

const styles = {
  title: {
    fontSize: '20px',
    fontWeight: '600',
    color: '#1a1a2e',
    margin: '0 0 8px',
  },
  intro: {
    fontSize: '16px',
    lineHeight: '24px',
    color: '#525f7f',
    margin: '0 0 24px',
  },
  badge: {
    borderRadius: '4px',
    color: '#ffffff',
    display: 'inline-block',
    fontSize: '14px',
    fontWeight: '600',
    padding: '6px 12px',
    margin: '0 0 24px',
  },
  detailsBox: {
    backgroundColor: '#f8f9fa',
    borderRadius: '8px',
    padding: '16px 24px',
    margin: '0 0 24px',
  },
  detailRow: {
    marginBottom: '8px',
  },
  detailLabel: {
    fontSize: '14px',
    color: '#8898aa',
    margin: '0',
  },
  detailValue: {
    fontSize: '14px',
    fontWeight: '600',
    color: '#1a1a2e',
    margin: '0',
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Props
// ─────────────────────────────────────────────────────────────────────────────

export interface DeadlineAlertEmailProps {
  alert: DueAlert;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const DetailRow: React.FC<{ label: string; value: string }> = ({ label, value }) => (
  <Row style={styles.detailRow}>
    <Column>
      <Text style={styles.detailLabel}>{label}</Text>
    </Column>
    <Column>
      <Text style={styles.detailValue}>{value}</Text>
    </Column>
  </Row>
);

const documentRows = (details: DocumentObligationDetails): [string, string][] => {
  const rows: [string, string][] = [
    ['Tipo', getDocumentKindLabel(details.documentKind)],
    ['Emissão', formatDayMonthYear(details.issuedOn)],
  ];
  if (details.farmName !== null) rows.push(['Fazenda', details.farmName]);
  if (details.personName !== null) rows.push(['Responsável', details.personName]);
  return rows;
};

const debtRows = (details: DebtObligationDetails): [string, string][] => {
  const rows: [string, string][] = [
    ['Banco', details.bank],
    ['Proposta', details.proposalNumber],
    ['Taxa de juros', formatRate(details.interestRate, details.rateBasis)],
    ['Valor contratado', formatMoney(details.amount)],
    ['Saldo em aberto', formatMoney(details.outstandingAmount)],
  ];
  if (details.people.length > 0) rows.push(['Titulares', details.people.join(', ')]);
  return rows;
};

const installmentRows = (details: InstallmentObligationDetails): [string, string][] => {
  const rows: [string, string][] = [
    ['Banco', details.bank],
    ['Proposta', details.proposalNumber],
    ['Valor da parcela', formatMoney(details.amount)],
  ];
  if (details.people.length > 0) rows.push(['Titulares', details.people.join(', ')]);
  return rows;
};

interface DetailsView {
  heading: string;
  dueLabel: string;
  rows: [string, string][];
}

const describeDetails = (details: ObligationDetails): DetailsView => {
  switch (details.kind) {
    case 'document':
      return {
        heading: 'Documento a vencer',
        dueLabel: 'Vence em',
        rows: documentRows(details),
      };
    case 'debt':
      return {
        heading: 'Dívida a vencer',
        dueLabel: 'Vencimento final',
        rows: debtRows(details),
      };
    case 'installment':
      return {
        heading: 'Parcela a vencer',
        dueLabel: 'Vencimento da parcela',
        rows: installmentRows(details),
      };
  }
};

// ─────────────────────────────────────────────────────────────────────────────
// Component
// ─────────────────────────────────────────────────────────────────────────────

export const DeadlineAlertEmail: React.FC<DeadlineAlertEmailProps> = ({ alert }) => {
  const { obligation, thresholdDays, daysRemaining } = alert;
  const period = getPeriodLabel(thresholdDays);
  const dueOn = formatDayMonthYear(obligation.dueOn);
  const { heading, dueLabel, rows } = describeDetails(obligation.details);
  const urgency = getUrgencyColor(daysRemaining);

  return (
    <EmailLayout previewText={`${obligation.title} vence em ${period}`} accentColor={urgency}>
      <Text style={styles.title}>{heading}</Text>
      <Text style={styles.intro}>
        {obligation.title} vence em {dueOn}, daqui a {period}.
      </Text>

      <Text style={{ ...styles.badge, backgroundColor: urgency }}>
        Faltam {getPeriodLabel(daysRemaining)}
      </Text>

      <Section style={styles.detailsBox}>
        <DetailRow label={dueLabel} value={dueOn} />
        {rows.map(([label, value]) => (
          <DetailRow key={label} label={label} value={value} />
        ))}
      </Section>
    </EmailLayout>
  );
};

export default DeadlineAlertEmail;
