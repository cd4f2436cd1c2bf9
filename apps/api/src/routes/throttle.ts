import type { FastifyReply, FastifyRequest } from 'fastify';

import type { AdmissionPipeline } from '../admission/pipeline.js';
import { sendAdmissionError } from './httpResponses.js';

/**
 * onRequest hook: counts every request against the client's rate window
 * before routing or body parsing.
 */
export function makeThrottleHook(pipeline: AdmissionPipeline) {
  return async function throttle(req: FastifyRequest, reply: FastifyReply) {
    const result = pipeline.throttle(req.ip);
    if (result.kind === 'rejected') return sendAdmissionError(req, reply, result.error);
  };
}
