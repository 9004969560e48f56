/**
 * An inbound event whose signature and timestamp both checked out.
 * Only the verifier constructs these.
 */
export interface VerifiedEvent<TBody = Record<string, unknown>> {
  /**
   * Sender-assigned unique identifier, the deduplication key
   */
  id: string;

  /**
   * Event type tag used for routing, e.g. `payment.succeeded`
   */
  type: string;

  /**
   * Creation time reported by the sender (falls back to the signed timestamp)
   */
  createdAt: Date;

  /**
   * Time the signature was produced
   */
  signedAt: Date;

  /**
   * Decoded event body, including `id` and `type`
   */
  body: TBody;
}
