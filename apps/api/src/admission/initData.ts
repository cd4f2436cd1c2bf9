import crypto from 'node:crypto';
import { z } from 'zod';

import { canonicalizeSignedPayload } from './canonicalize.js';
import { AdmissionError, withFallbackCode } from './errors.js';

// Fixed by the Mini App protocol; not configurable.
const WEB_APP_DATA_SALT = 'WebAppData';

export const INIT_DATA_MAX_AGE_SECONDS = 86_400;

const AUTH_DATE_RE = /^[0-9]+$/;
const HEX_DIGEST_RE = /^[0-9a-f]{64}$/;

const webAppUserSchema = z.object({
  id: z.number().int(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
  username: z.string().optional(),
  language_code: z.string().optional(),
});

export type AuthenticatedIdentity = Readonly<{
  userId: number;
  firstName?: string;
  lastName?: string;
  username?: string;
  languageCode?: string;
  authDate: number;
}>;

export type VerifyInitDataArgs = {
  initData: string;
  botToken: string;
  /** Epoch milliseconds. */
  now: number;
  maxAgeSeconds?: number;
};

export function deriveSecretKey(botToken: string): Buffer {
  return crypto.createHmac('sha256', WEB_APP_DATA_SALT).update(botToken).digest();
}

export function signDataCheckString(botToken: string, dataCheckString: string): string {
  return crypto.createHmac('sha256', deriveSecretKey(botToken)).update(dataCheckString).digest('hex');
}

function safeHexEquals(a: string, b: string): boolean {
  const aHex = a.trim().toLowerCase();
  const bHex = b.trim().toLowerCase();
  if (aHex.length !== bHex.length) return false;

  return crypto.timingSafeEqual(Buffer.from(aHex, 'utf8'), Buffer.from(bHex, 'utf8'));
}

function parseAuthDate(raw: string | undefined): number {
  if (raw === undefined || !AUTH_DATE_RE.test(raw)) {
    throw new AdmissionError('MalformedPayload', 'auth_date must be a unix timestamp');
  }
  const authDate = Number(raw);
  if (!Number.isSafeInteger(authDate)) {
    throw new AdmissionError('MalformedPayload', 'auth_date must be a unix timestamp');
  }
  return authDate;
}

function parseUser(raw: string | undefined, authDate: number): AuthenticatedIdentity {
  if (raw === undefined) {
    throw new AdmissionError('MalformedUser', 'Signed payload has no user');
  }

  const json: unknown = withFallbackCode('MalformedUser', 'user is not valid JSON', () => JSON.parse(raw));
  const parsed = webAppUserSchema.safeParse(json);
  if (!parsed.success) {
    throw new AdmissionError('MalformedUser', 'user must carry an integer id');
  }

  const user = parsed.data;
  return Object.freeze({
    userId: user.id,
    ...(user.first_name !== undefined ? { firstName: user.first_name } : {}),
    ...(user.last_name !== undefined ? { lastName: user.last_name } : {}),
    ...(user.username !== undefined ? { username: user.username } : {}),
    ...(user.language_code !== undefined ? { languageCode: user.language_code } : {}),
    authDate,
  });
}

/**
 * Authenticates Mini App `initData`.
 *
 * The data-check-string is signed with `HMAC_SHA256(HMAC_SHA256("WebAppData", botToken), dcs)`.
 * `auth_date` is one of the signed fields, so it is checked only after the
 * signature matches. Throws {@link AdmissionError} with an auth code on failure.
 */
export function verifyInitData(args: VerifyInitDataArgs): AuthenticatedIdentity {
  return withFallbackCode('MalformedPayload', 'Signed payload could not be parsed', () => {
    const { signature, dataCheckString, fields } = canonicalizeSignedPayload(args.initData);

    const received = signature.trim().toLowerCase();
    if (!HEX_DIGEST_RE.test(received)) {
      throw new AdmissionError('InvalidSignature', 'Signature mismatch');
    }

    const calculated = signDataCheckString(args.botToken, dataCheckString);
    if (!safeHexEquals(calculated, received)) {
      throw new AdmissionError('InvalidSignature', 'Signature mismatch');
    }

    const authDate = parseAuthDate(fields.get('auth_date'));
    const ageSeconds = Math.floor(args.now / 1000) - authDate;
    const maxAge = args.maxAgeSeconds ?? INIT_DATA_MAX_AGE_SECONDS;
    if (ageSeconds > maxAge) {
      throw new AdmissionError('ExpiredSignature', 'Signed payload has expired', { ageSeconds, maxAgeSeconds: maxAge });
    }

    return parseUser(fields.get('user'), authDate);
  });
}
