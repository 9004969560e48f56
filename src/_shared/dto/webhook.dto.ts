import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ProcessingRecord, ProcessingStatus, ReceiptKind } from '../../core';
import type { PipelineOutcome } from '../../core';

/**
 * Response DTO for a webhook delivery
 */
export class WebhookReceiptDto {
  @ApiProperty({
    description: 'Whether the delivery was accepted',
    example: true,
  })
  received!: boolean;

  @ApiProperty({
    description: 'Receipt decision',
    enum: ReceiptKind,
    example: ReceiptKind.ACCEPT,
  })
  decision!: ReceiptKind;

  @ApiPropertyOptional({
    description: 'What happened to an accepted delivery',
    enum: ['dispatched', 'duplicate', 'deferred'],
    example: 'dispatched',
  })
  outcome?: PipelineOutcome['kind'];

  @ApiPropertyOptional({
    description: 'Event identifier from the verified payload',
    example: 'evt_1001',
  })
  eventId?: string;

  @ApiPropertyOptional({
    description: 'Event type from the verified payload',
    example: 'invoice.paid',
  })
  eventType?: string;

  @ApiPropertyOptional({
    description: 'Why the delivery was rejected or should be retried',
    example: 'signature_mismatch',
  })
  reason?: string;
}

/**
 * Processing record as exposed over HTTP
 */
export class ProcessingRecordDto {
  @ApiProperty({ example: 'evt_1001' })
  eventId!: string;

  @ApiProperty({ example: 'invoice.paid' })
  eventType!: string;

  @ApiProperty({ enum: ProcessingStatus, example: ProcessingStatus.DONE })
  status!: ProcessingStatus;

  @ApiProperty({ format: 'date-time' })
  firstSeenAt!: string;

  @ApiProperty({ format: 'date-time' })
  lastAttemptAt!: string;

  @ApiProperty({
    description: 'Handler attempts so far (at most 2)',
    example: 1,
  })
  attempts!: number;

  @ApiPropertyOptional({ format: 'date-time', nullable: true })
  completedAt!: string | null;

  @ApiPropertyOptional({
    description: 'Handler error for failed records',
    nullable: true,
  })
  failureReason!: string | null;

  static fromRecord(record: ProcessingRecord): ProcessingRecordDto {
    const dto = new ProcessingRecordDto();
    dto.eventId = record.eventId;
    dto.eventType = record.eventType;
    dto.status = record.status;
    dto.firstSeenAt = record.firstSeenAt.toISOString();
    dto.lastAttemptAt = record.lastAttemptAt.toISOString();
    dto.attempts = record.attempts;
    dto.completedAt = record.completedAt?.toISOString() ?? null;
    dto.failureReason = record.failureReason;
    return dto;
  }
}
