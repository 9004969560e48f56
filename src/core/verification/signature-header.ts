import * as crypto from 'crypto';

/**
 * Scheme tag of the digests this verifier understands
 */
export const SIGNATURE_SCHEME = 'v1';

/**
 * Default header name carrying the signature
 */
export const DEFAULT_SIGNATURE_HEADER = 'webhook-signature';

/**
 * Parsed signature header: `t=<unix seconds>,v1=<hex>[,v1=<hex>...]`
 */
export interface SignatureHeader {
  timestamp: number;
  /**
   * `t` exactly as received; the digest is computed over this text
   */
  rawTimestamp: string;
  signatures: Array<{ scheme: string; digest: string }>;
}

/**
 * Parse a signature header. Returns null when the header is missing, has a
 * field without `=`, lacks a single integer `t`, or carries no `v1` digest.
 * Digests under other schemes are kept but never matched.
 */
export function parseSignatureHeader(
  value: string | undefined,
): SignatureHeader | null {
  if (!value || value.trim().length === 0) {
    return null;
  }

  let rawTimestamp: string | undefined;
  const signatures: SignatureHeader['signatures'] = [];

  for (const part of value.split(',')) {
    const field = part.trim();
    const separator = field.indexOf('=');
    if (separator <= 0 || separator === field.length - 1) {
      return null;
    }

    const key = field.slice(0, separator);
    const fieldValue = field.slice(separator + 1);

    if (key === 't') {
      if (rawTimestamp !== undefined || !/^\d+$/.test(fieldValue)) {
        return null;
      }
      rawTimestamp = fieldValue;
    } else {
      signatures.push({ scheme: key, digest: fieldValue.toLowerCase() });
    }
  }

  if (rawTimestamp === undefined) {
    return null;
  }

  const timestamp = Number(rawTimestamp);
  if (
    !Number.isSafeInteger(timestamp) ||
    !signatures.some((s) => s.scheme === SIGNATURE_SCHEME)
  ) {
    return null;
  }

  return { timestamp, rawTimestamp, signatures };
}

/**
 * HMAC-SHA256 over the exact bytes `"{timestamp}." + rawBody`, hex encoded
 */
export function computeSignature(
  rawBody: Buffer,
  secret: string | Buffer,
  timestamp: number | string,
): string {
  return crypto
    .createHmac('sha256', secret)
    .update(`${timestamp}.`, 'utf8')
    .update(rawBody)
    .digest('hex');
}

/**
 * Build the header a sender would attach, one `v1` digest per secret
 */
export function generateSignatureHeader(
  rawBody: Buffer,
  secrets: string | Buffer | Array<string | Buffer>,
  timestamp: number,
): string {
  const list = Array.isArray(secrets) ? secrets : [secrets];
  const digests = list.map(
    (secret) => `${SIGNATURE_SCHEME}=${computeSignature(rawBody, secret, timestamp)}`,
  );
  return [`t=${timestamp}`, ...digests].join(',');
}

/**
 * Constant-time string comparison. Unequal lengths still pay for a full
 * comparison before returning false.
 */
export function secureCompare(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');

  if (left.length !== right.length) {
    crypto.timingSafeEqual(left, left);
    return false;
  }

  return crypto.timingSafeEqual(left, right);
}
