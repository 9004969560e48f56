import { Logger } from '@nestjs/common';
import { CompletedStatus, ProcessingStatus } from '../domain/enums';
import { ProcessingRecord } from '../domain/models';
import { Clock, ProcessingStore, systemClock } from '../interfaces';

export const DEFAULT_STALE_PROCESSING_SECONDS = 60;

/**
 * First attempt plus exactly one stale retry
 */
export const MAX_PROCESSING_ATTEMPTS = 2;

/**
 * Result of `shouldProcess`
 */
export type DeduplicationDecision =
  | {
      fresh: true;
      /**
       * Attempt number the caller owns; pass it back to `markResult`
       */
      attempt: number;
      /**
       * True when a stale pending record was reclaimed
       */
      retried: boolean;
    }
  | {
      fresh: false;
      priorStatus: ProcessingStatus;
      record: ProcessingRecord;
    };

/**
 * Event Deduplicator
 *
 * Guarantees at-most-once handler execution per event identifier. All state
 * lives in the injected ProcessingStore; the atomic claim is the store's job.
 */
export class EventDeduplicator {
  private readonly logger = new Logger(EventDeduplicator.name);
  private readonly staleAfterMs: number;
  private readonly clock: Clock;

  constructor(
    private readonly store: ProcessingStore,
    options: { staleProcessingSeconds?: number; clock?: Clock } = {},
  ) {
    this.clock = options.clock ?? systemClock;
    this.staleAfterMs =
      (options.staleProcessingSeconds ?? DEFAULT_STALE_PROCESSING_SECONDS) * 1000;
  }

  /**
   * Atomic check-and-insert. Fresh only for the first sighting, or for the
   * single allowed reclaim of a stale pending record.
   */
  async shouldProcess(
    eventId: string,
    eventType: string,
  ): Promise<DeduplicationDecision> {
    const result = await this.store.claim({
      eventId,
      eventType,
      now: this.clock.now(),
      staleAfterMs: this.staleAfterMs,
      maxAttempts: MAX_PROCESSING_ATTEMPTS,
    });

    if (result.claimed) {
      if (result.retried) {
        this.logger.warn(
          `Reclaimed stale pending record for ${eventId} (attempt ${result.record.attempts})`,
        );
      }
      return {
        fresh: true,
        attempt: result.record.attempts,
        retried: result.retried,
      };
    }

    this.logger.debug(
      `Event ${eventId} already seen (status: ${result.record.status}, attempts: ${result.record.attempts})`,
    );

    return {
      fresh: false,
      priorStatus: result.record.status,
      record: result.record,
    };
  }

  /**
   * Record the outcome of an attempt that ran a handler. Returns false when
   * the record was no longer pending at that attempt.
   */
  async markResult(
    eventId: string,
    attempt: number,
    status: CompletedStatus,
    failureReason?: string,
  ): Promise<boolean> {
    const record = await this.store.complete({
      eventId,
      attempt,
      status,
      completedAt: this.clock.now(),
      failureReason,
    });

    if (!record) {
      this.logger.warn(
        `Refused to mark ${eventId} as ${status}: attempt ${attempt} no longer owns the record`,
      );
      return false;
    }

    return true;
  }

  get staleThresholdMs(): number {
    return this.staleAfterMs;
  }
}
