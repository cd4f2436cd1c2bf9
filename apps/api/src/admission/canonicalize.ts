import { AdmissionError } from './errors.js';

export const SIGNATURE_FIELD = 'hash';

export type SignedFields = ReadonlyMap<string, string>;

export type CanonicalPayload = {
  signature: string;
  dataCheckString: string;
  fields: SignedFields;
};

function decodeComponent(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new AdmissionError('MalformedPayload', 'Signed payload contains an invalid percent-escape');
  }
}

// Byte-wise (UTF-8) ordering; localeCompare and UTF-16 code unit ordering both differ from it.
function compareKeys(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

/**
 * Splits `k1=v1&k2=v2` into a map. Only the first `=` of a pair separates key
 * from value. When a key repeats, the last occurrence wins.
 */
export function parseSignedPayload(raw: string): Map<string, string> {
  if (!raw) {
    throw new AdmissionError('MalformedPayload', 'Signed payload is empty');
  }

  const fields = new Map<string, string>();
  for (const pair of raw.split('&')) {
    const eq = pair.indexOf('=');
    if (eq === -1) {
      throw new AdmissionError('MalformedPayload', 'Signed payload pair is missing "="');
    }
    fields.set(decodeComponent(pair.slice(0, eq)), decodeComponent(pair.slice(eq + 1)));
  }
  return fields;
}

export function canonicalizeSignedPayload(raw: string): CanonicalPayload {
  const fields = parseSignedPayload(raw);

  const signature = fields.get(SIGNATURE_FIELD);
  if (!signature) {
    throw new AdmissionError('MalformedPayload', 'Signed payload has no signature');
  }
  fields.delete(SIGNATURE_FIELD);

  const dataCheckString = [...fields.keys()]
    .sort(compareKeys)
    .map((key) => `${key}=${fields.get(key) ?? ''}`)
    .join('\n');

  return { signature, dataCheckString, fields };
}
