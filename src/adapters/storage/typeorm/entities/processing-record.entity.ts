import { Entity, PrimaryColumn, Column, Index } from 'typeorm';
import { ProcessingStatus } from '../../../../core';

/**
 * TypeORM entity for ProcessingRecord.
 * The primary key on event_id is what makes a claim atomic.
 */
@Entity('processing_records')
@Index(['status', 'lastAttemptAt'])
@Index(['firstSeenAt'])
export class ProcessingRecordEntity {
  @PrimaryColumn({ name: 'event_id', type: 'varchar', length: 255 })
  eventId!: string;

  @Column({ name: 'event_type', type: 'varchar', length: 255 })
  eventType!: string;

  @Column({
    type: 'simple-enum',
    enum: ProcessingStatus,
    default: ProcessingStatus.PENDING,
  })
  status!: ProcessingStatus;

  @Column({ name: 'first_seen_at', type: Date })
  firstSeenAt!: Date;

  @Column({ name: 'last_attempt_at', type: Date })
  lastAttemptAt!: Date;

  @Column({ type: 'integer', default: 1 })
  attempts!: number;

  @Column({ name: 'completed_at', type: Date, nullable: true })
  completedAt!: Date | null;

  @Column({ name: 'failure_reason', type: 'text', nullable: true })
  failureReason!: string | null;
}
