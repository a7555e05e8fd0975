import { describe, expect, it } from 'vitest';

import { makeDeadlineAlertRenderer } from '@/modules/deadline-alerts/index.js';

import {
  makeDebtObligation,
  makeDocumentObligation,
  makeInstallmentObligation,
  makeTestLogger,
} from '../../fixtures/fakes.js';

const renderer = makeDeadlineAlertRenderer({ logger: makeTestLogger() });

describe('makeDeadlineAlertRenderer', () => {
  it('renders a document alert', async () => {
    const result = await renderer.render({
      obligation: makeDocumentObligation(),
      thresholdDays: 30,
      daysRemaining: 30,
    });

    const email = result._unsafeUnwrap();
    expect(email.subject).toBe('[Vencimento] CCIR 2024 - 30 dias');
    expect(email.html).toContain('Documento a vencer');
    expect(email.html).toContain('31/07/2024');
    expect(email.html).toContain('#1c7ed6');
    expect(email.text).toContain('Fazenda Boa Vista');
    expect(email.text).not.toContain('<p');
  });

  it('renders the debt details', async () => {
    const result = await renderer.render({
      obligation: makeDebtObligation(),
      thresholdDays: 180,
      daysRemaining: 180,
    });

    const email = result._unsafeUnwrap();
    expect(email.subject).toBe('[Vencimento] Banco do Brasil - PR-100 - 6 meses');
    expect(email.html).toContain('Dívida a vencer');
    expect(email.html).toContain('Proposta');
    expect(email.html).toContain('#2b8a3e');
    expect(email.text).toContain('Ana Souza');
  });

  it('renders the installment details', async () => {
    const result = await renderer.render({
      obligation: makeInstallmentObligation(),
      thresholdDays: 7,
      daysRemaining: 7,
    });

    const email = result._unsafeUnwrap();
    expect(email.subject).toBe(
      '[Vencimento] Banco do Brasil - PR-100 - parcela 2024-08-15 - 7 dias'
    );
    expect(email.html).toContain('Parcela a vencer');
    expect(email.html).toContain('Vencimento da parcela');
    expect(email.html).toContain('15/08/2024');
    expect(email.html).toContain('#f08c00');
    expect(email.text).toContain('Valor da parcela');
  });

  it('frames every alert with the product note', async () => {
    const result = await renderer.render({
      obligation: makeDocumentObligation(),
      thresholdDays: 7,
      daysRemaining: 7,
    });

    const email = result._unsafeUnwrap();
    expect(email.html).toContain('6px solid #f08c00');
    expect(email.text).toContain('Alerta automático do Farm Ledger.');
  });
});
