import { DataSource, QueryFailedError, Repository } from 'typeorm';
import {
  ClaimRequest,
  ClaimResult,
  CompleteRequest,
  ProcessingRecord,
  ProcessingStatus,
  ProcessingStore,
  ProcessingStoreError,
} from '../../../core';
import { ProcessingRecordEntity } from './entities';

/**
 * Driver error codes for a primary key violation
 */
const UNIQUE_VIOLATION_CODES = new Set([
  '23505', // postgres
  'ER_DUP_ENTRY', // mysql
  'SQLITE_CONSTRAINT_PRIMARYKEY',
  'SQLITE_CONSTRAINT_UNIQUE',
]);

/**
 * TypeORM implementation of ProcessingStore.
 *
 * A claim is an INSERT on the event_id primary key; a stale reclaim is an
 * UPDATE guarded by the attempt counter that was read. Either way the
 * database decides the single winner.
 */
export class TypeORMProcessingStore implements ProcessingStore {
  private recordRepo: Repository<ProcessingRecordEntity>;

  constructor(private readonly dataSource: DataSource) {
    this.recordRepo = dataSource.getRepository(ProcessingRecordEntity);
  }

  async claim(request: ClaimRequest): Promise<ClaimResult> {
    const inserted = await this.tryInsert(request);
    if (inserted) {
      return { claimed: true, retried: false, record: inserted };
    }

    const existing = await this.find(request.eventId);
    if (!existing) {
      // Purged between the insert and the read
      throw new ProcessingStoreError(
        `Record for ${request.eventId} disappeared during claim`,
        'claim',
      );
    }

    if (
      !existing.isStale(request.now, request.staleAfterMs) ||
      !existing.canRetry(request.maxAttempts)
    ) {
      return { claimed: false, record: existing };
    }

    const result = await this.recordRepo.update(
      {
        eventId: request.eventId,
        status: ProcessingStatus.PENDING,
        attempts: existing.attempts,
      },
      {
        attempts: existing.attempts + 1,
        lastAttemptAt: request.now,
      },
    );

    const current = await this.find(request.eventId);
    if (!current) {
      throw new ProcessingStoreError(
        `Record for ${request.eventId} disappeared during reclaim`,
        'claim',
      );
    }

    if (result.affected === 1) {
      return { claimed: true, retried: true, record: current };
    }

    // Another caller reclaimed it first
    return { claimed: false, record: current };
  }

  async complete(request: CompleteRequest): Promise<ProcessingRecord | null> {
    const result = await this.recordRepo.update(
      {
        eventId: request.eventId,
        status: ProcessingStatus.PENDING,
        attempts: request.attempt,
      },
      {
        status: request.status,
        completedAt: request.completedAt,
        lastAttemptAt: request.completedAt,
        failureReason:
          request.status === ProcessingStatus.FAILED
            ? request.failureReason ?? null
            : null,
      },
    );

    if (result.affected !== 1) {
      return null;
    }

    return this.find(request.eventId);
  }

  async find(eventId: string): Promise<ProcessingRecord | null> {
    const entity = await this.recordRepo.findOne({ where: { eventId } });
    return entity ? this.mapEntityToDomain(entity) : null;
  }

  async purgeOlderThan(cutoff: Date): Promise<number> {
    const result = await this.recordRepo
      .createQueryBuilder()
      .delete()
      .from(ProcessingRecordEntity)
      .where('first_seen_at < :cutoff', { cutoff })
      .execute();

    return result.affected || 0;
  }

  async countByStatus(): Promise<Record<ProcessingStatus, number>> {
    const rows = await this.recordRepo
      .createQueryBuilder('record')
      .select('record.status', 'status')
      .addSelect('COUNT(*)', 'count')
      .groupBy('record.status')
      .getRawMany<{ status: ProcessingStatus; count: string | number }>();

    const counts: Record<ProcessingStatus, number> = {
      [ProcessingStatus.PENDING]: 0,
      [ProcessingStatus.DONE]: 0,
      [ProcessingStatus.FAILED]: 0,
    };
    for (const row of rows) {
      counts[row.status] = Number(row.count);
    }
    return counts;
  }

  async isHealthy(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Release the DataSource connections
   */
  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  /**
   * Insert a fresh pending record; null when the identifier already exists
   */
  private async tryInsert(request: ClaimRequest): Promise<ProcessingRecord | null> {
    const entity = this.recordRepo.create({
      eventId: request.eventId,
      eventType: request.eventType,
      status: ProcessingStatus.PENDING,
      firstSeenAt: request.now,
      lastAttemptAt: request.now,
      attempts: 1,
      completedAt: null,
      failureReason: null,
    });

    try {
      await this.recordRepo.insert(entity);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return null;
      }
      throw error;
    }

    return this.mapEntityToDomain(entity);
  }

  private mapEntityToDomain(entity: ProcessingRecordEntity): ProcessingRecord {
    return new ProcessingRecord(
      entity.eventId,
      entity.eventType,
      entity.status,
      new Date(entity.firstSeenAt),
      new Date(entity.lastAttemptAt),
      entity.attempts,
      entity.completedAt ? new Date(entity.completedAt) : null,
      entity.failureReason,
    );
  }
}

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string' &&
    UNIQUE_VIOLATION_CODES.has(driverError.code)
  );
}
