/**
 * Reasons an inbound delivery fails verification.
 * All of them are rejected at the transport level.
 */
export enum VerificationFailure {
  /**
   * Signature header missing or not parseable
   */
  MALFORMED_SIGNATURE = 'malformed_signature',

  /**
   * No received digest matches any configured secret
   */
  SIGNATURE_MISMATCH = 'signature_mismatch',

  /**
   * Signed timestamp outside the replay tolerance window
   */
  STALE_TIMESTAMP = 'stale_timestamp',

  /**
   * Signature valid but the body is not an event envelope
   */
  MALFORMED_PAYLOAD = 'malformed_payload',
}
