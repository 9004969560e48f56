import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';
import { HealthStatusDto, ServiceStatisticsDto } from '../../dto';

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Health check',
      description: 'Returns service health, processing store connectivity and uptime',
    }),
    ApiResponse({
      status: 200,
      description: 'Service health',
      type: HealthStatusDto,
    }),
  );
};

/**
 * Swagger decorator for service statistics
 */
export const ApiServiceStatistics = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Get service statistics',
      description: 'Processing record counts by status and pipeline configuration',
    }),
    ApiResponse({
      status: 200,
      description: 'Service statistics',
      type: ServiceStatisticsDto,
    }),
  );
};
