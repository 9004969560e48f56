import { ProcessingStatus } from '../enums';

/**
 * ProcessingRecord domain model - the single source of truth for whether an
 * event identifier has been handled. Owned by the deduplicator.
 */
export class ProcessingRecord {
  constructor(
    public readonly eventId: string,
    public readonly eventType: string,
    public status: ProcessingStatus,
    public readonly firstSeenAt: Date,
    public lastAttemptAt: Date,
    public attempts: number = 1,
    public completedAt: Date | null = null,
    public failureReason: string | null = null,
  ) {}

  isPending(): boolean {
    return this.status === ProcessingStatus.PENDING;
  }

  isDone(): boolean {
    return this.status === ProcessingStatus.DONE;
  }

  isFailed(): boolean {
    return this.status === ProcessingStatus.FAILED;
  }

  /**
   * A pending record is stale once its last attempt is older than the
   * threshold. Stale records may be reclaimed by a later delivery.
   */
  isStale(now: Date, staleAfterMs: number): boolean {
    return (
      this.isPending() &&
      now.getTime() - this.lastAttemptAt.getTime() > staleAfterMs
    );
  }

  /**
   * Whether a stale reclaim is still allowed (only the first attempt may be retried)
   */
  canRetry(maxAttempts: number): boolean {
    return this.attempts < maxAttempts;
  }

  /**
   * Snapshot copy, so stores never hand out their internal instance
   */
  clone(): ProcessingRecord {
    return new ProcessingRecord(
      this.eventId,
      this.eventType,
      this.status,
      new Date(this.firstSeenAt.getTime()),
      new Date(this.lastAttemptAt.getTime()),
      this.attempts,
      this.completedAt ? new Date(this.completedAt.getTime()) : null,
      this.failureReason,
    );
  }

  toJSON(): Record<string, unknown> {
    return {
      eventId: this.eventId,
      eventType: this.eventType,
      status: this.status,
      firstSeenAt: this.firstSeenAt.toISOString(),
      lastAttemptAt: this.lastAttemptAt.toISOString(),
      attempts: this.attempts,
      completedAt: this.completedAt?.toISOString() ?? null,
      failureReason: this.failureReason,
    };
  }
}
