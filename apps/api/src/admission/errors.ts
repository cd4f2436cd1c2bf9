export type AuthErrorCode = 'MalformedPayload' | 'InvalidSignature' | 'ExpiredSignature' | 'MalformedUser';

export type ValidationErrorCode =
  | 'MalformedOrder'
  | 'EmptyOrder'
  | 'TooManyItems'
  | 'InvalidQuantity'
  | 'InvalidPrice'
  | 'InvalidTotal'
  | 'NoteTooLong'
  | 'TotalMismatch';

export type AdmissionErrorCode = AuthErrorCode | 'RateLimited' | ValidationErrorCode;

export type AdmissionErrorDetails = Record<string, string | number>;

const AUTH_CODES: ReadonlySet<AdmissionErrorCode> = new Set<AdmissionErrorCode>([
  'MalformedPayload',
  'InvalidSignature',
  'ExpiredSignature',
  'MalformedUser',
]);

export class AdmissionError extends Error {
  readonly code: AdmissionErrorCode;
  readonly details: AdmissionErrorDetails;

  constructor(code: AdmissionErrorCode, message: string, details: AdmissionErrorDetails = {}) {
    super(message);
    this.name = 'AdmissionError';
    this.code = code;
    this.details = details;
  }
}

export function isAdmissionError(e: unknown): e is AdmissionError {
  return e instanceof AdmissionError;
}

export function isAuthError(code: AdmissionErrorCode): code is AuthErrorCode {
  return AUTH_CODES.has(code);
}

export function httpStatusForAdmissionError(code: AdmissionErrorCode): 400 | 401 | 429 {
  if (isAuthError(code)) return 401;
  if (code === 'RateLimited') return 429;
  return 400;
}

/**
 * Runs a stage and reclassifies anything that is not already an AdmissionError
 * (JSON.parse, decodeURIComponent, ...) as `fallback`.
 */
export function withFallbackCode<T>(fallback: AdmissionErrorCode, message: string, fn: () => T): T {
  try {
    return fn();
  } catch (e) {
    if (isAdmissionError(e)) throw e;
    throw new AdmissionError(fallback, message);
  }
}
