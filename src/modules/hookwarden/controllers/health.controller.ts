import { Controller, Get, HttpCode, HttpStatus } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { HookwardenService } from '../services/hookwarden.service';
import {
  ApiHealthCheck,
  ApiServiceStatistics,
  HealthStatusDto,
  ServiceStatisticsDto,
} from '../../../_shared';

/**
 * Health Controller
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(private readonly hookwarden: HookwardenService) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  async health(): Promise<HealthStatusDto> {
    const storeHealthy = await this.hookwarden.isHealthy();

    return {
      status: storeHealthy ? 'healthy' : 'degraded',
      store: storeHealthy ? 'connected' : 'disconnected',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  @Get('stats')
  @ApiServiceStatistics()
  async statistics(): Promise<ServiceStatisticsDto> {
    return {
      records: await this.hookwarden.countByStatus(),
      pipeline: this.hookwarden.getPipelineStatistics(),
      runtime: {
        uptime: process.uptime(),
        node: process.version,
      },
    };
  }
}
