import { ApiProperty } from '@nestjs/swagger';
import type { PipelineStatistics, ProcessingStatus } from '../../core';

export class HealthStatusDto {
  @ApiProperty({ enum: ['healthy', 'degraded'], example: 'healthy' })
  status!: 'healthy' | 'degraded';

  @ApiProperty({ enum: ['connected', 'disconnected'], example: 'connected' })
  store!: 'connected' | 'disconnected';

  @ApiProperty({ format: 'date-time' })
  timestamp!: string;

  @ApiProperty({ description: 'Uptime in seconds' })
  uptime!: number;
}

export class ServiceStatisticsDto {
  @ApiProperty({
    description: 'Processing records by status',
    example: { pending: 0, done: 12, failed: 1 },
  })
  records!: Record<ProcessingStatus, number>;

  @ApiProperty({ description: 'Pipeline stages and configuration' })
  pipeline!: PipelineStatistics;

  @ApiProperty()
  runtime!: {
    uptime: number;
    node: string;
  };
}
