import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  addInstallment,
  configureDebtAlerts,
  createDebt,
  deleteDebt,
  getDebt,
  getDebtAlertSettings,
  listDueInstallments,
  payInstallment,
  removeInstallment,
  updateDebt,
  type Installment,
} from '@/modules/debts/index.js';

import {
  makeDebt,
  makeFakeDebtsRepo,
  makeRecordingInvalidator,
  testId,
} from '../../fixtures/fakes.js';

const debtId = testId(30);

const installment = (overrides: Partial<Installment> = {}): Installment => ({
  id: testId(31),
  debtId,
  dueOn: '2024-07-01',
  amount: new Decimal('5000'),
  paid: false,
  paidOn: null,
  amountPaid: null,
  notes: null,
  ...overrides,
});

const setup = (installments: Installment[] = []) => {
  const debtsRepo = makeFakeDebtsRepo([makeDebt({ id: debtId, installments })]);
  const cacheInvalidator = makeRecordingInvalidator();
  return { deps: { debtsRepo, cacheInvalidator }, cacheInvalidator };
};

describe('createDebt', () => {
  it('stores the debt with unique people and its installments', async () => {
    const { deps, cacheInvalidator } = setup();

    const debt = (
      await createDebt(deps, {
        bank: 'Sicredi',
        proposalNumber: 'PR-200',
        issuedOn: '2024-02-01',
        finalDueOn: '2025-02-01',
        interestRate: '1.2',
        rateBasis: 'monthly',
        amount: '20000',
        personIds: [testId(1), testId(1), testId(2)],
        installments: [
          { dueOn: '2024-08-01', amount: '10000' },
          { dueOn: '2025-02-01', amount: '10000' },
        ],
      })
    )._unsafeUnwrap();

    expect(debt.personIds).toEqual([testId(1), testId(2)]);
    expect(debt.installments).toHaveLength(2);
    expect(debt.outstandingAmount.toString()).toBe('20000');
    expect(cacheInvalidator.invalidated).toEqual(['debt']);
  });
});

describe('getDebt and deleteDebt', () => {
  it('report missing debts as not found', async () => {
    const { deps, cacheInvalidator } = setup();

    expect((await getDebt(deps, { id: testId(99) }))._unsafeUnwrapErr().message).toBe(
      `Debt with ID '${testId(99)}' not found`
    );
    expect((await deleteDebt(deps, { id: testId(99) }))._unsafeUnwrapErr().type).toBe(
      'DebtNotFoundError'
    );
    expect(cacheInvalidator.invalidated).toEqual([]);
  });
});

describe('updateDebt', () => {
  it('merges scalar changes and keeps links that were not sent', async () => {
    const debtsRepo = makeFakeDebtsRepo([makeDebt({ id: debtId, personIds: [testId(1)] })]);
    const cacheInvalidator = makeRecordingInvalidator();

    const updated = (
      await updateDebt({ debtsRepo, cacheInvalidator }, { id: debtId, updates: { bank: 'Itaú' } })
    )._unsafeUnwrap();

    expect(updated.bank).toBe('Itaú');
    expect(updated.proposalNumber).toBe('PR-100');
    expect(updated.personIds).toEqual([testId(1)]);
    expect(cacheInvalidator.invalidated).toEqual(['debt']);
  });

  it('validates the merged result', async () => {
    const { deps } = setup();

    const result = await updateDebt(deps, { id: debtId, updates: { finalDueOn: '2023-01-01' } });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'ValidationError',
      field: 'finalDueOn',
    });
  });
});

describe('installments', () => {
  it('adds an installment to an existing debt', async () => {
    const { deps } = setup();

    const added = (
      await addInstallment(deps, {
        debtId,
        installment: { dueOn: '2024-09-01', amount: '750.50' },
      })
    )._unsafeUnwrap();

    expect(added).toMatchObject({ debtId, dueOn: '2024-09-01', paid: false });
    const debt = (await getDebt(deps, { id: debtId }))._unsafeUnwrap();
    expect(debt.outstandingAmount.toString()).toBe('750.5');
  });

  it('rejects installments for unknown debts', async () => {
    const { deps } = setup();

    const result = await addInstallment(deps, {
      debtId: testId(99),
      installment: { dueOn: '2024-09-01', amount: '10' },
    });

    expect(result._unsafeUnwrapErr().type).toBe('DebtNotFoundError');
  });

  it('pays the full installment amount by default', async () => {
    const { deps, cacheInvalidator } = setup([installment()]);

    const paid = (
      await payInstallment(deps, { debtId, installmentId: testId(31), paidOn: '2024-06-28' })
    )._unsafeUnwrap();

    expect(paid.paid).toBe(true);
    expect(paid.paidOn).toBe('2024-06-28');
    expect(paid.amountPaid?.toString()).toBe('5000');
    expect(cacheInvalidator.invalidated).toEqual(['debt']);

    const debt = (await getDebt(deps, { id: debtId }))._unsafeUnwrap();
    expect(debt.outstandingAmount.toString()).toBe('0');
  });

  it('records a partial payment amount', async () => {
    const { deps } = setup([installment()]);

    const paid = await payInstallment(deps, {
      debtId,
      installmentId: testId(31),
      paidOn: '2024-06-28',
      amountPaid: '4800',
    });

    expect(paid._unsafeUnwrap().amountPaid?.toString()).toBe('4800');
  });

  it('refuses to pay twice', async () => {
    const { deps } = setup([installment({ paid: true, paidOn: '2024-06-01' })]);

    const result = await payInstallment(deps, {
      debtId,
      installmentId: testId(31),
      paidOn: '2024-06-28',
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'InstallmentAlreadyPaidError',
      message: `Installment '${testId(31)}' is already paid`,
      installmentId: testId(31),
    });
  });

  it('reports unknown installments', async () => {
    const { deps } = setup();

    const paid = await payInstallment(deps, {
      debtId,
      installmentId: testId(98),
      paidOn: '2024-06-28',
    });
    const removed = await removeInstallment(deps, { debtId, installmentId: testId(98) });

    expect(paid._unsafeUnwrapErr().type).toBe('InstallmentNotFoundError');
    expect(removed._unsafeUnwrapErr().type).toBe('InstallmentNotFoundError');
  });

  it('validates the payment date before looking anything up', async () => {
    const { deps } = setup([installment()]);

    const result = await payInstallment(deps, {
      debtId,
      installmentId: testId(31),
      paidOn: 'yesterday',
    });

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'ValidationError', field: 'paidOn' });
  });
});

describe('alert settings', () => {
  it('returns null before anything is configured', async () => {
    const { deps } = setup();

    expect((await getDebtAlertSettings(deps, { debtId }))._unsafeUnwrap()).toBeNull();
  });

  it('stores normalized recipients', async () => {
    const { deps, cacheInvalidator } = setup();

    const saved = (
      await configureDebtAlerts(deps, {
        debtId,
        emails: [' finance@example.com ', 'FINANCE@example.com', 'nope'],
        active: true,
      })
    )._unsafeUnwrap();

    expect(saved.emails).toEqual(['finance@example.com']);
    expect(saved.active).toBe(true);
    expect(cacheInvalidator.invalidated).toEqual(['debt']);
  });

  it('requires a valid email while alerts are active', async () => {
    const { deps } = setup();

    const result = await configureDebtAlerts(deps, { debtId, emails: ['nope'], active: true });

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'ValidationError', field: 'emails' });
  });

  it('allows switching alerts off without recipients', async () => {
    const { deps } = setup();

    const result = await configureDebtAlerts(deps, { debtId, emails: [], active: false });

    expect(result._unsafeUnwrap()).toMatchObject({ emails: [], active: false });
  });

  it('rejects settings for unknown debts', async () => {
    const { deps } = setup();

    const result = await configureDebtAlerts(deps, {
      debtId: testId(99),
      emails: ['finance@example.com'],
      active: true,
    });

    expect(result._unsafeUnwrapErr().type).toBe('DebtNotFoundError');
  });
});

describe('listDueInstallments', () => {
  const schedule = [
    installment({ id: testId(35), dueOn: '2024-08-01' }),
    installment({ id: testId(31), dueOn: '2024-06-20' }),
    installment({ id: testId(32), dueOn: '2024-06-10', paid: true, paidOn: '2024-06-10' }),
    installment({ id: testId(34), dueOn: '2024-07-31' }),
    installment({ id: testId(33), dueOn: '2024-07-01' }),
  ];

  it('splits unpaid installments into overdue and due within 30 days', async () => {
    const { deps } = setup(schedule);

    const listed = (await listDueInstallments(deps, { today: '2024-07-01' }))._unsafeUnwrap();

    expect(listed.today).toBe('2024-07-01');
    expect(listed.overdue.map((item) => item.id)).toEqual([testId(31)]);
    expect(listed.dueSoon.map((item) => item.id)).toEqual([testId(33), testId(34)]);
    expect(listed.overdue[0]).toMatchObject({ bank: 'Banco do Brasil', proposalNumber: 'PR-100' });
  });

  it('honours a custom look-ahead', async () => {
    const { deps } = setup(schedule);

    const listed = (
      await listDueInstallments(deps, { today: '2024-07-01', withinDays: 0 })
    )._unsafeUnwrap();

    expect(listed.dueSoon.map((item) => item.id)).toEqual([testId(33)]);
  });

  it('rejects a negative look-ahead', async () => {
    const { deps } = setup(schedule);

    const result = await listDueInstallments(deps, { today: '2024-07-01', withinDays: -1 });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'ValidationError',
      field: 'withinDays',
    });
  });
});
