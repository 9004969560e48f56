import { VerificationFailure } from '../domain/enums';
import { VerifiedEvent } from '../domain/models';
import { Clock, systemClock } from '../interfaces';
import {
  SIGNATURE_SCHEME,
  computeSignature,
  parseSignatureHeader,
  secureCompare,
} from './signature-header';

export const DEFAULT_TOLERANCE_SECONDS = 300;

/**
 * Signature verification error
 */
export class SignatureVerificationError extends Error {
  constructor(
    message: string,
    public readonly reason: VerificationFailure,
  ) {
    super(message);
    this.name = 'SignatureVerificationError';
  }
}

export type VerificationResult =
  | { verified: true; event: VerifiedEvent }
  | { verified: false; error: SignatureVerificationError };

/**
 * Verify a delivery: parse the header, enforce the replay window, then
 * compare every (secret, digest) pair in constant time.
 *
 * The timestamp is checked before any digest, so a stale delivery is
 * rejected as stale whether or not its digest is correct.
 */
export function verifySignature(
  rawBody: Buffer,
  headerValue: string | undefined,
  secrets: ReadonlyArray<string | Buffer>,
  toleranceSeconds: number,
  now: Date = new Date(),
): VerificationResult {
  const header = parseSignatureHeader(headerValue);
  if (!header) {
    return fail(
      VerificationFailure.MALFORMED_SIGNATURE,
      'Signature header is missing or malformed',
    );
  }

  const nowSeconds = Math.floor(now.getTime() / 1000);
  if (Math.abs(nowSeconds - header.timestamp) > toleranceSeconds) {
    return fail(
      VerificationFailure.STALE_TIMESTAMP,
      `Signed timestamp ${header.timestamp} is outside the ${toleranceSeconds}s tolerance`,
    );
  }

  const received = header.signatures
    .filter((s) => s.scheme === SIGNATURE_SCHEME)
    .map((s) => s.digest);

  let matched = false;
  for (const secret of secrets) {
    const expected = computeSignature(rawBody, secret, header.rawTimestamp);
    for (const digest of received) {
      // No early exit: every pair is compared
      matched = secureCompare(expected, digest) || matched;
    }
  }

  if (!matched) {
    return fail(
      VerificationFailure.SIGNATURE_MISMATCH,
      'No signature matches the configured secrets',
    );
  }

  const signedAt = new Date(header.timestamp * 1000);
  const envelope = decodeEnvelope(rawBody);
  if (!envelope) {
    return fail(
      VerificationFailure.MALFORMED_PAYLOAD,
      'Payload is not a JSON object with string "id" and "type"',
    );
  }

  return {
    verified: true,
    event: {
      id: envelope.id,
      type: envelope.type,
      createdAt: readCreatedAt(envelope.body) ?? signedAt,
      signedAt,
      body: envelope.body,
    },
  };
}

/**
 * Signature Verifier bound to a secret set, tolerance and clock
 */
export class SignatureVerifier {
  private readonly secrets: ReadonlyArray<string | Buffer>;
  private readonly toleranceSeconds: number;
  private readonly clock: Clock;

  constructor(options: {
    secrets: Array<string | Buffer>;
    toleranceSeconds?: number;
    clock?: Clock;
  }) {
    const secrets = options.secrets.filter((s) => s.length > 0);
    if (secrets.length === 0) {
      throw new Error('At least one webhook signing secret is required');
    }

    this.secrets = secrets;
    this.toleranceSeconds = options.toleranceSeconds ?? DEFAULT_TOLERANCE_SECONDS;
    this.clock = options.clock ?? systemClock;
  }

  verify(rawBody: Buffer, headerValue: string | undefined): VerificationResult {
    return verifySignature(
      rawBody,
      headerValue,
      this.secrets,
      this.toleranceSeconds,
      this.clock.now(),
    );
  }

  get secretCount(): number {
    return this.secrets.length;
  }

  get tolerance(): number {
    return this.toleranceSeconds;
  }
}

function fail(reason: VerificationFailure, message: string): VerificationResult {
  return {
    verified: false,
    error: new SignatureVerificationError(message, reason),
  };
}

function decodeEnvelope(
  rawBody: Buffer,
): { id: string; type: string; body: Record<string, unknown> } | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(rawBody.toString('utf8'));
  } catch {
    return null;
  }

  if (!isRecord(parsed)) {
    return null;
  }

  const { id, type } = parsed;
  if (typeof id !== 'string' || id.length === 0) {
    return null;
  }
  if (typeof type !== 'string' || type.length === 0) {
    return null;
  }

  return { id, type, body: parsed };
}

/**
 * Sender creation time: `created` (unix seconds) or `created_at` (ISO string)
 */
function readCreatedAt(body: Record<string, unknown>): Date | undefined {
  if (typeof body.created === 'number' && Number.isFinite(body.created)) {
    return new Date(body.created * 1000);
  }
  if (typeof body.created_at === 'string') {
    const parsed = new Date(body.created_at);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed;
    }
  }
  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
