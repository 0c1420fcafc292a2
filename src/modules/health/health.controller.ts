import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { SkipThrottle } from '@nestjs/throttler';
import { RateCacheHealthIndicator } from './indicators/rate-cache.health';
import { HealthReport, HealthReporterService } from './services/health-reporter.service';

@ApiTags('Health')
@Controller('health')
@SkipThrottle() // Health checks should not be rate limited
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private reporter: HealthReporterService,
    private rateCache: RateCacheHealthIndicator,
  ) {}

  @Get()
  @ApiOperation({ summary: 'Service health with the current cache size' })
  check(): HealthReport & { timestamp: string } {
    return { ...this.reporter.report(), timestamp: new Date().toISOString() };
  }

  @Get('live')
  @ApiOperation({ summary: 'Liveness probe - is the app running?' })
  liveness() {
    return { status: 'ok' };
  }

  @Get('ready')
  @HealthCheck()
  @ApiOperation({ summary: 'Readiness probe - is the app ready to receive traffic?' })
  readiness() {
    return this.health.check([() => this.rateCache.isHealthy('rate_cache')]);
  }
}
