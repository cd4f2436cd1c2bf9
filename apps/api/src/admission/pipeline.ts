import { AdmissionError, isAdmissionError } from './errors.js';
import type { AuthenticatedIdentity } from './initData.js';
import { verifyInitData } from './initData.js';
import { parseOrderSubmission, validateOrder } from './orderValidator.js';
import type { ValidatedOrder } from './orderValidator.js';
import { FixedWindowRateGate } from './rateGate.js';
import type { RateAdmission } from './rateGate.js';

/** Epoch milliseconds. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export type AdmissionRequest = {
  clientId: string;
  initData: string;
  body: unknown;
};

export type Rejected = { kind: 'rejected'; error: AdmissionError };

export type AdmissionResult =
  | { kind: 'admitted'; order: ValidatedOrder; identity: AuthenticatedIdentity }
  | Rejected;

export type AuthenticationResult = { kind: 'authenticated'; identity: AuthenticatedIdentity } | Rejected;

export type ThrottleResult = { kind: 'allowed'; admission: RateAdmission } | Rejected;

export type AdmissionPipeline = {
  admit(request: AdmissionRequest): AdmissionResult;
  /** Signature and order checks for a request the gate has already counted. */
  screen(request: Omit<AdmissionRequest, 'clientId'>): AdmissionResult;
  authenticate(initData: string): AuthenticationResult;
  throttle(clientId: string): ThrottleResult;
};

export type AdmissionPipelineOptions = {
  botToken: string;
  clock?: Clock;
  gate?: FixedWindowRateGate;
  maxAgeSeconds?: number;
};

function reject(e: unknown, fallback: AdmissionError): Rejected {
  return { kind: 'rejected', error: isAdmissionError(e) ? e : fallback };
}

/**
 * Rate gate, then signature, then order validation. A failing stage ends the
 * request; nothing here touches storage or the wall clock except via `clock`.
 */
export function createAdmissionPipeline(opts: AdmissionPipelineOptions): AdmissionPipeline {
  const clock = opts.clock ?? systemClock;
  const gate = opts.gate ?? new FixedWindowRateGate();

  function throttle(clientId: string): ThrottleResult {
    try {
      return { kind: 'allowed', admission: gate.admit(clientId, clock()) };
    } catch (e) {
      return reject(e, new AdmissionError('RateLimited', 'Rate limit exceeded. Try again in a minute.'));
    }
  }

  function authenticate(initData: string): AuthenticationResult {
    try {
      const identity = verifyInitData({
        initData,
        botToken: opts.botToken,
        now: clock(),
        maxAgeSeconds: opts.maxAgeSeconds,
      });
      return { kind: 'authenticated', identity };
    } catch (e) {
      return reject(e, new AdmissionError('MalformedPayload', 'Signed payload could not be parsed'));
    }
  }

  function screen(request: Omit<AdmissionRequest, 'clientId'>): AdmissionResult {
    const authenticated = authenticate(request.initData);
    if (authenticated.kind === 'rejected') return authenticated;

    try {
      const order = validateOrder(parseOrderSubmission(request.body));
      return { kind: 'admitted', order, identity: authenticated.identity };
    } catch (e) {
      return reject(e, new AdmissionError('MalformedOrder', 'Invalid order body'));
    }
  }

  function admit(request: AdmissionRequest): AdmissionResult {
    const throttled = throttle(request.clientId);
    if (throttled.kind === 'rejected') return throttled;
    return screen(request);
  }

  return { admit, screen, authenticate, throttle };
}
