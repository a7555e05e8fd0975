import { beforeEach, describe, expect, it, vi } from 'vitest';

import { makeEmailClient, type SendEmailParams } from '@/infra/email/index.js';

import { makeTestLogger } from '../../../fixtures/fakes.js';

const { sendMock } = vi.hoisted(() => ({ sendMock: vi.fn() }));

vi.mock('resend', () => ({
  Resend: class {
    emails = { send: sendMock };
  },
}));

const params: SendEmailParams = {
  to: ['owner@example.com', 'finance@example.com'],
  subject: '[Vencimento] CCIR 2024 - 30 dias',
  html: '<p>CCIR 2024</p>',
  text: 'CCIR 2024',
  idempotencyKey: 'document-abc-30-2024-07-01',
  tags: [{ name: 'kind', value: 'document' }],
};

const makeClient = () =>
  makeEmailClient({
    apiKey: 'test-secret',
    fromAddress: 'Farm Ledger <alerts@example.com>',
    logger: makeTestLogger(),
  });

describe('makeEmailClient', () => {
  beforeEach(() => {
    sendMock.mockReset();
  });

  it('sends one message to every recipient with the idempotency key', async () => {
    sendMock.mockResolvedValueOnce({ data: { id: 'email-123' }, error: null });

    const result = await makeClient().send(params);

    expect(result._unsafeUnwrap()).toEqual({ emailId: 'email-123' });
    expect(sendMock).toHaveBeenCalledWith(
      {
        from: 'Farm Ledger <alerts@example.com>',
        to: ['owner@example.com', 'finance@example.com'],
        subject: '[Vencimento] CCIR 2024 - 30 dias',
        html: '<p>CCIR 2024</p>',
        text: 'CCIR 2024',
        tags: [{ name: 'kind', value: 'document' }],
      },
      { idempotencyKey: 'document-abc-30-2024-07-01' }
    );
  });

  it('maps a 429 to a retryable rate limit', async () => {
    sendMock.mockResolvedValueOnce({
      data: null,
      error: { name: 'rate_limit_exceeded', message: 'Too many requests', statusCode: 429 },
    });

    const result = await makeClient().send(params);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'RATE_LIMITED',
      message: 'Rate limit exceeded',
      retryable: true,
      statusCode: 429,
    });
  });

  it('maps other client errors to validation failures', async () => {
    sendMock.mockResolvedValueOnce({
      data: null,
      error: { name: 'validation_error', message: 'Invalid `to` field', statusCode: 422 },
    });

    const result = await makeClient().send(params);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'VALIDATION',
      message: 'Invalid `to` field',
      retryable: false,
      statusCode: 422,
    });
  });

  it('maps server errors as retryable', async () => {
    sendMock.mockResolvedValueOnce({
      data: null,
      error: { name: 'internal_server_error', message: 'Upstream failure', statusCode: 503 },
    });

    const result = await makeClient().send(params);

    expect(result._unsafeUnwrapErr()).toMatchObject({ type: 'SERVER', retryable: true });
  });

  it('reports an error without a status as unknown', async () => {
    sendMock.mockResolvedValueOnce({
      data: null,
      error: { name: 'application_error', message: 'Something odd' },
    });

    const result = await makeClient().send(params);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'UNKNOWN',
      message: 'Something odd',
      retryable: false,
    });
  });

  it('maps connection failures to network errors', async () => {
    sendMock.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:443'));

    const result = await makeClient().send(params);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: 'NETWORK',
      message: 'connect ECONNREFUSED 127.0.0.1:443',
      retryable: true,
    });
  });
});
