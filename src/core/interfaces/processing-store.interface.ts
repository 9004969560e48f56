import { ProcessingRecord } from '../domain/models';
import { CompletedStatus, ProcessingStatus } from '../domain/enums';

/**
 * Input to an atomic check-and-insert
 */
export interface ClaimRequest {
  eventId: string;
  eventType: string;
  now: Date;

  /**
   * A pending record whose last attempt is older than this may be reclaimed
   */
  staleAfterMs: number;

  /**
   * Total attempts allowed per identifier (first attempt plus stale retries)
   */
  maxAttempts: number;
}

/**
 * Outcome of a claim. `claimed: true` means the caller owns this attempt and
 * must run the handler, then complete the record.
 */
export type ClaimResult =
  | { claimed: true; retried: boolean; record: ProcessingRecord }
  | { claimed: false; record: ProcessingRecord };

/**
 * Input to a completion. `attempt` must match the claimed attempt number so
 * a late finish of an abandoned attempt cannot overwrite its retry.
 */
export interface CompleteRequest {
  eventId: string;
  attempt: number;
  status: CompletedStatus;
  completedAt: Date;
  failureReason?: string;
}

/**
 * Processing store - persistent key/value store of ProcessingRecords.
 *
 * Implementations MUST make `claim` atomic per event identifier across
 * concurrent callers (unique key + conditional update), without locking
 * the whole table.
 */
export interface ProcessingStore {
  /**
   * Insert a pending record if none exists, or reclaim a stale pending one
   */
  claim(request: ClaimRequest): Promise<ClaimResult>;

  /**
   * Transition pending -> done|failed. Returns null when the record is not
   * pending at the given attempt.
   */
  complete(request: CompleteRequest): Promise<ProcessingRecord | null>;

  find(eventId: string): Promise<ProcessingRecord | null>;

  /**
   * Delete records first seen before the cutoff; returns the number removed
   */
  purgeOlderThan(cutoff: Date): Promise<number>;

  countByStatus(): Promise<Record<ProcessingStatus, number>>;

  isHealthy(): Promise<boolean>;
}
