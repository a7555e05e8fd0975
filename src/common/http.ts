/**
 * Reply helpers shared by REST route modules.
 */

import type { FastifyReply } from 'fastify';

/**
 * Sends `{ ok: false, error, message }` with the status mapped from the error type.
 */
export const sendError = <E extends { type: string; message: string }>(
  reply: FastifyReply,
  error: E,
  statusFor: (error: E) => number
): FastifyReply =>
  reply.status(statusFor(error)).send({
    ok: false,
    error: error.type,
    message: error.message,
  });

/**
 * Sends `{ ok: true, data }`.
 */
export const sendData = (reply: FastifyReply, data: unknown, status = 200): FastifyReply =>
  reply.status(status).send({ ok: true, data });
