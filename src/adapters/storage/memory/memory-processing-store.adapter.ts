import {
  ClaimRequest,
  ClaimResult,
  CompleteRequest,
  ProcessingRecord,
  ProcessingStatus,
  ProcessingStore,
} from '../../../core';

/**
 * In-memory processing store for development and testing.
 *
 * Each operation reads and writes the map without awaiting in between, so a
 * claim is atomic with respect to every other caller in this process. It
 * gives no guarantee across processes; use the TypeORM store for that.
 */
export class MemoryProcessingStore implements ProcessingStore {
  private records: Map<string, ProcessingRecord> = new Map();

  constructor(private readonly options: MemoryStoreOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      ...options,
    };
  }

  /**
   * Simulate network latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) => setTimeout(resolve, this.options.latencyMs));
    }
  }

  async claim(request: ClaimRequest): Promise<ClaimResult> {
    await this.simulateLatency();

    const existing = this.records.get(request.eventId);

    if (!existing) {
      const record = new ProcessingRecord(
        request.eventId,
        request.eventType,
        ProcessingStatus.PENDING,
        request.now,
        request.now,
        1,
      );
      this.records.set(request.eventId, record);
      return { claimed: true, retried: false, record: record.clone() };
    }

    if (
      existing.isStale(request.now, request.staleAfterMs) &&
      existing.canRetry(request.maxAttempts)
    ) {
      existing.attempts += 1;
      existing.lastAttemptAt = request.now;
      return { claimed: true, retried: true, record: existing.clone() };
    }

    return { claimed: false, record: existing.clone() };
  }

  async complete(request: CompleteRequest): Promise<ProcessingRecord | null> {
    await this.simulateLatency();

    const record = this.records.get(request.eventId);
    if (!record || !record.isPending() || record.attempts !== request.attempt) {
      return null;
    }

    record.status = request.status;
    record.completedAt = request.completedAt;
    record.lastAttemptAt = request.completedAt;
    record.failureReason =
      request.status === ProcessingStatus.FAILED ? request.failureReason ?? null : null;

    return record.clone();
  }

  async find(eventId: string): Promise<ProcessingRecord | null> {
    await this.simulateLatency();
    return this.records.get(eventId)?.clone() ?? null;
  }

  async purgeOlderThan(cutoff: Date): Promise<number> {
    await this.simulateLatency();

    let removed = 0;
    for (const [eventId, record] of this.records) {
      if (record.firstSeenAt.getTime() < cutoff.getTime()) {
        this.records.delete(eventId);
        removed++;
      }
    }
    return removed;
  }

  async countByStatus(): Promise<Record<ProcessingStatus, number>> {
    const counts: Record<ProcessingStatus, number> = {
      [ProcessingStatus.PENDING]: 0,
      [ProcessingStatus.DONE]: 0,
      [ProcessingStatus.FAILED]: 0,
    };
    for (const record of this.records.values()) {
      counts[record.status]++;
    }
    return counts;
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  /**
   * Clear all records (for testing)
   */
  clear(): void {
    this.records.clear();
  }

  /**
   * Number of stored records (for testing)
   */
  get size(): number {
    return this.records.size;
  }
}

export interface MemoryStoreOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
}
