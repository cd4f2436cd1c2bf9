import type { FastifyReply, FastifyRequest } from 'fastify';

import type { AdmissionError } from '../admission/errors.js';
import { httpStatusForAdmissionError, isAuthError } from '../admission/errors.js';

function withEnvelopeFlag<T extends Record<string, unknown>, TFlag extends boolean>(
  ok: TFlag,
  payload: T,
): { ok: TFlag } & T {
  return { ok, ...payload };
}

export function ok<T extends Record<string, unknown>>(payload: T): { ok: true } & T {
  return withEnvelopeFlag(true, payload);
}

export function fail<T extends Record<string, unknown> = Record<string, never>>(
  error: string,
  payload?: T,
): { ok: false; error: string } & T {
  return withEnvelopeFlag(false, { error, ...(payload ?? ({} as T)) });
}

export const AUTH_FAILURE_MESSAGE = 'Invalid Telegram authentication';

// Auth failures share one message and carry only the code.
export function admissionFailure(error: AdmissionError) {
  if (isAuthError(error.code)) {
    return fail(AUTH_FAILURE_MESSAGE, { code: error.code });
  }
  return fail(error.message, { code: error.code, ...error.details });
}

export function sendAdmissionError(req: FastifyRequest, reply: FastifyReply, error: AdmissionError) {
  req.log.warn({ code: error.code, clientId: req.ip, route: req.routeOptions.url }, 'request rejected');

  const retryAfter = error.details.retryAfterSeconds;
  if (error.code === 'RateLimited' && retryAfter !== undefined) {
    reply.header('retry-after', String(retryAfter));
  }
  return reply.status(httpStatusForAdmissionError(error.code)).send(admissionFailure(error));
}

export function logAndSendError(
  req: FastifyRequest,
  reply: FastifyReply,
  statusCode: number,
  error: string,
  cause: unknown,
) {
  req.log.error({ err: cause }, error);
  return reply.status(statusCode).send(fail(error));
}
