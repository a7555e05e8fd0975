/**
 * Resend Email Client
 *
 * Provides email sending functionality via Resend API.
 * The idempotency key travels in the SDK request options, not as a header.
 */

import { ok, err, type Result } from 'neverthrow';
import { Resend } from 'resend';

import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface EmailClientConfig {
  /** Resend API key */
  apiKey: string;
  /** From address for outbound emails */
  fromAddress: string;
  logger: Logger;
}

/**
 * Email tag for Resend (name/value pairs).
 * Names and values may only contain ASCII letters, numbers, underscores and dashes.
 */
export interface EmailTag {
  name: string;
  value: string;
}

export interface SendEmailParams {
  /** Recipients; one message is delivered to all of them */
  to: string[];
  subject: string;
  html: string;
  text: string;
  /** Deduplicates repeated sends on Resend's side for 24h */
  idempotencyKey: string;
  tags: EmailTag[];
}

export interface SendEmailResult {
  /** Resend email ID */
  emailId: string;
}

export interface EmailError {
  type: 'RATE_LIMITED' | 'VALIDATION' | 'SERVER' | 'NETWORK' | 'UNKNOWN';
  message: string;
  retryable: boolean;
  statusCode?: number;
}

/**
 * Email sender interface (port).
 */
export interface EmailSender {
  send(params: SendEmailParams): Promise<Result<SendEmailResult, EmailError>>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a Resend email client.
 */
export const makeEmailClient = (config: EmailClientConfig): EmailSender => {
  const { apiKey, fromAddress, logger } = config;
  const log = logger.child({ component: 'EmailClient' });
  const resend = new Resend(apiKey);

  log.info('Initializing Resend email client');

  return {
    async send(params: SendEmailParams): Promise<Result<SendEmailResult, EmailError>> {
      const { to, subject, html, text, idempotencyKey, tags } = params;

      log.debug({ to, subject, idempotencyKey, tagCount: tags.length }, 'Sending email');

      try {
        const result = await resend.emails.send(
          {
            from: fromAddress,
            to,
            subject,
            html,
            text,
            tags,
          },
          { idempotencyKey }
        );

        if (result.error !== null) {
          log.warn({ error: result.error, to, idempotencyKey }, 'Resend API returned error');
          return err(mapResendError(result.error));
        }

        log.info({ emailId: result.data.id, to, idempotencyKey }, 'Email sent successfully');

        return ok({ emailId: result.data.id });
      } catch (error) {
        log.error({ err: error, to, idempotencyKey }, 'Failed to send email');
        return err(mapCaughtError(error));
      }
    },
  };
};

/**
 * Maps Resend API error to our EmailError type.
 */
function mapResendError(error: { message: string; name: string }): EmailError {
  const statusCode = readStatusCode(error);
  const message = error.message;

  if (statusCode === 429) {
    return { type: 'RATE_LIMITED', message: 'Rate limit exceeded', retryable: true, statusCode };
  }

  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return { type: 'VALIDATION', message, retryable: false, statusCode };
  }

  if (statusCode !== undefined && statusCode >= 500) {
    return { type: 'SERVER', message, retryable: true, statusCode };
  }

  return {
    type: 'UNKNOWN',
    message,
    retryable: false,
    ...(statusCode !== undefined && { statusCode }),
  };
}

/**
 * Older SDK releases put the HTTP status on the error object; newer ones only name it.
 */
function readStatusCode(error: object): number | undefined {
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Maps caught errors to our EmailError type.
 */
function mapCaughtError(error: unknown): EmailError {
  if (error instanceof Error) {
    if (
      error.message.includes('ECONNREFUSED') ||
      error.message.includes('ETIMEDOUT') ||
      error.message.includes('ENOTFOUND')
    ) {
      return { type: 'NETWORK', message: error.message, retryable: true };
    }

    return { type: 'UNKNOWN', message: error.message, retryable: false };
  }

  return { type: 'UNKNOWN', message: 'Unknown error occurred', retryable: false };
}
