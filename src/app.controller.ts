import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ServerRegistryService } from './modules/factory/server-registry.service';
import { LivenessRegistryService, MatchmakerStats } from './modules/matchmaker/liveness-registry.service';

export interface HealthResponse {
  ok: true;
  matchmaker: MatchmakerStats;
  /** Game server instances known to the factory, any status. */
  instances: number;
}

/**
 * Root application controller.
 * Provides health check and other global endpoints.
 */
@ApiTags('health')
@Controller()
export class AppController {
  constructor(
    private readonly servers: ServerRegistryService,
    private readonly matchmaker: LivenessRegistryService,
  ) {}

  @Get('health')
  @ApiOperation({
    summary: 'Health check',
    description: 'Returns ok with matchmaker and factory counters. Used by load balancers and monitoring.',
  })
  @ApiResponse({ status: 200, description: 'Service is healthy' })
  getHealth(): HealthResponse {
    return {
      ok: true,
      matchmaker: this.matchmaker.stats(),
      instances: this.servers.list().length,
    };
  }
}
