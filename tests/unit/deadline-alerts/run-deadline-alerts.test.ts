import { describe, expect, it } from 'vitest';

import { createDatabaseError } from '@/common/errors.js';
import { runDeadlineAlerts, type AlertRunContext } from '@/modules/deadline-alerts/index.js';

import {
  makeCapturingLogger,
  makeDebtObligation,
  makeDocumentObligation,
  makeFakeAlertRecordsRepo,
  makeFakeEmailSender,
  makeFakeObligationsRepo,
  makeFakeRenderer,
  makeInstallmentObligation,
  makeAlertRecord,
  makeRecordingInvalidator,
  makeTestLogger,
  testId,
  type FakeAlertRecordsRepo,
  type FakeEmailSender,
} from '../../fixtures/fakes.js';

import type { Obligation } from '@/modules/deadline-alerts/index.js';
import type { EmailError } from '@/infra/email/index.js';
import type { CachedEntity } from '@/infra/cache/index.js';

// Both fixtures hit their 30-day threshold on this day
const TODAY = '2024-07-01';

interface Harness {
  context: AlertRunContext;
  alertRecordsRepo: FakeAlertRecordsRepo;
  emailSender: FakeEmailSender;
  invalidated: CachedEntity[];
}

interface HarnessOptions {
  obligations?: Obligation[];
  alertRecordsRepo?: FakeAlertRecordsRepo;
  emailSender?: FakeEmailSender;
  failRenderFor?: string;
  failObligations?: boolean;
  timeZone?: string;
  now?: Date;
}

const serverError: EmailError = {
  type: 'SERVER',
  message: 'Resend unavailable',
  retryable: true,
};

const setup = (options: HarnessOptions = {}): Harness => {
  const alertRecordsRepo = options.alertRecordsRepo ?? makeFakeAlertRecordsRepo();
  const emailSender = options.emailSender ?? makeFakeEmailSender();
  const cacheInvalidator = makeRecordingInvalidator();

  const context: AlertRunContext = {
    obligationsRepo: makeFakeObligationsRepo({
      obligations: options.obligations ?? [makeDocumentObligation()],
      ...(options.failObligations === true && {
        failWith: createDatabaseError('connection terminated'),
      }),
    }),
    alertRecordsRepo,
    emailSender,
    renderer: makeFakeRenderer(
      options.failRenderFor !== undefined ? { failFor: options.failRenderFor } : {}
    ),
    cacheInvalidator,
    logger: makeTestLogger(),
    timeZone: options.timeZone ?? 'America/Sao_Paulo',
    now: () => options.now ?? new Date('2024-07-01T12:00:00Z'),
  };

  return { context, alertRecordsRepo, emailSender, invalidated: cacheInvalidator.invalidated };
};

describe('runDeadlineAlerts', () => {
  describe('without a run context', () => {
    it('aborts without processing anything', async () => {
      const { logger, entries } = makeCapturingLogger('warn');

      const result = await runDeadlineAlerts(undefined, { logger });

      expect(result._unsafeUnwrap()).toEqual({
        today: null,
        aborted: true,
        processed: 0,
        failed: 0,
        skipped: 0,
        due: 0,
      });
      expect(entries()).toHaveLength(1);
    });
  });

  describe('sending', () => {
    it('sends one email per due alert and records it', async () => {
      const { context, alertRecordsRepo, emailSender, invalidated } = setup();

      const result = await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });

      expect(result._unsafeUnwrap()).toEqual({
        today: TODAY,
        aborted: false,
        processed: 1,
        failed: 0,
        skipped: 0,
        due: 1,
      });
      expect(emailSender.sent).toEqual([
        {
          to: ['owner@example.com'],
          subject: 'Alert: CCIR 2024',
          html: '<p>CCIR 2024</p>',
          text: 'CCIR 2024',
          idempotencyKey: `document-${testId(20)}-30-${TODAY}`,
          tags: [
            { name: 'obligation_kind', value: 'document' },
            { name: 'threshold_days', value: '30' },
          ],
        },
      ]);
      expect(alertRecordsRepo.records).toEqual([
        expect.objectContaining({
          kind: 'document',
          obligationId: testId(20),
          thresholdDays: 30,
          daysRemaining: 30,
          success: true,
          recipients: ['owner@example.com'],
          errorMessage: null,
          emailId: 'email-1',
        }),
      ]);
      expect(invalidated).toEqual(['alert']);
    });

    it('handles documents and debts in the same run', async () => {
      const { context, emailSender } = setup({
        obligations: [
          makeDocumentObligation(),
          makeDebtObligation({ dueOn: '2024-07-31' }),
        ],
      });

      const result = await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });

      expect(result._unsafeUnwrap().processed).toBe(2);
      expect(emailSender.sent.map((email) => email.idempotencyKey)).toEqual([
        `document-${testId(20)}-30-${TODAY}`,
        `debt-${testId(30)}-30-${TODAY}`,
      ]);
    });

    it('warns unpaid installments under their own id', async () => {
      const { context, emailSender, alertRecordsRepo } = setup({
        obligations: [
          makeDebtObligation({ dueOn: '2024-07-31' }),
          makeInstallmentObligation({ dueOn: '2024-07-31' }),
        ],
      });

      const result = await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });

      expect(result._unsafeUnwrap().processed).toBe(2);
      expect(emailSender.sent.map((email) => email.idempotencyKey)).toEqual([
        `debt-${testId(30)}-30-${TODAY}`,
        `installment-${testId(40)}-30-${TODAY}`,
      ]);
      expect(alertRecordsRepo.records[1]).toMatchObject({
        kind: 'installment',
        obligationId: testId(40),
        thresholdDays: 30,
      });
    });

    it('deduplicates each installment separately', async () => {
      const { context, emailSender } = setup({
        obligations: [
          makeInstallmentObligation({ dueOn: '2024-07-31' }),
          makeInstallmentObligation({ id: testId(41), dueOn: '2024-07-31' }),
        ],
        alertRecordsRepo: makeFakeAlertRecordsRepo({
          records: [makeAlertRecord({ kind: 'installment', obligationId: testId(40) })],
        }),
      });

      const result = await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });

      expect(result._unsafeUnwrap()).toMatchObject({ processed: 1, due: 1 });
      expect(emailSender.sent.map((email) => email.idempotencyKey)).toEqual([
        `installment-${testId(41)}-30-${TODAY}`,
      ]);
    });

    it('resolves today in the alert timezone', async () => {
      // 02:00 UTC is still the previous evening in São Paulo
      const { context, emailSender } = setup({ now: new Date('2024-07-01T02:00:00Z') });

      const result = await runDeadlineAlerts(context, { logger: context.logger });

      expect(result._unsafeUnwrap().today).toBe('2024-06-30');
      expect(emailSender.sent).toEqual([]);
    });

    it('sends nothing on a second run the same day', async () => {
      const { context, emailSender, invalidated } = setup();

      await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });
      const second = await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });

      expect(second._unsafeUnwrap()).toMatchObject({ processed: 0, failed: 0, due: 0 });
      expect(emailSender.sent).toHaveLength(1);
      expect(invalidated).toEqual(['alert']);
    });

    it('counts obligations without recipients as skipped', async () => {
      const { context, emailSender, invalidated } = setup({
        obligations: [makeDocumentObligation({ recipients: [] })],
      });

      const result = await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });

      expect(result._unsafeUnwrap()).toMatchObject({ processed: 0, skipped: 1, due: 0 });
      expect(emailSender.sent).toEqual([]);
      expect(invalidated).toEqual([]);
    });
  });

  describe('failures', () => {
    it('records a failed send and leaves it for the next run', async () => {
      let failing = true;
      const emailSender = makeFakeEmailSender({
        failWhen: () => (failing ? serverError : undefined),
      });
      const { context, alertRecordsRepo } = setup({ emailSender });

      const first = await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });

      expect(first._unsafeUnwrap()).toMatchObject({ processed: 0, failed: 1, due: 1 });
      expect(alertRecordsRepo.records).toEqual([
        expect.objectContaining({
          success: false,
          errorMessage: 'Resend unavailable',
          emailId: null,
        }),
      ]);

      failing = false;
      const second = await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });

      expect(second._unsafeUnwrap()).toMatchObject({ processed: 1, failed: 0 });
      expect(emailSender.sent).toHaveLength(1);
    });

    it('keeps going after one alert fails', async () => {
      const emailSender = makeFakeEmailSender({
        failWhen: (params) => (params.to.includes('owner@example.com') ? serverError : undefined),
      });
      const { context } = setup({
        emailSender,
        obligations: [makeDocumentObligation(), makeDebtObligation({ dueOn: '2024-07-31' })],
      });

      const result = await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });

      expect(result._unsafeUnwrap()).toMatchObject({ processed: 1, failed: 1, due: 2 });
      expect(emailSender.sent.map((email) => email.to)).toEqual([['finance@example.com']]);
    });

    it('records render failures without sending', async () => {
      const { context, alertRecordsRepo, emailSender } = setup({ failRenderFor: testId(20) });

      const result = await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });

      expect(result._unsafeUnwrap().failed).toBe(1);
      expect(emailSender.sent).toEqual([]);
      expect(alertRecordsRepo.records[0]).toMatchObject({
        success: false,
        errorMessage: 'Template crashed',
      });
    });

    it('counts a send whose record could not be saved as failed', async () => {
      const { context, emailSender } = setup({
        alertRecordsRepo: makeFakeAlertRecordsRepo({ failInsert: true }),
      });

      const result = await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });

      expect(result._unsafeUnwrap()).toMatchObject({ processed: 0, failed: 1 });
      expect(emailSender.sent).toHaveLength(1);
    });

    it('returns the error when obligations cannot be loaded', async () => {
      const { context, emailSender } = setup({ failObligations: true });

      const result = await runDeadlineAlerts(context, { today: TODAY, logger: context.logger });

      expect(result._unsafeUnwrapErr()).toMatchObject({
        type: 'DatabaseError',
        message: 'connection terminated',
      });
      expect(emailSender.sent).toEqual([]);
    });
  });
});
