import { Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { RateCacheService } from '../../exchange/services/rate-cache.service';
import { HealthReporterService } from '../services/health-reporter.service';

@Injectable()
export class RateCacheHealthIndicator extends HealthIndicator {
  constructor(
    private readonly reporter: HealthReporterService,
    private readonly rateCache: RateCacheService,
  ) {
    super();
  }

  isHealthy(key: string): HealthIndicatorResult {
    const report = this.reporter.report();

    if (report.status === 'healthy') {
      const { expired } = this.rateCache.stats();
      return this.getStatus(key, true, {
        cacheSize: report.cacheSize,
        expired,
        ttlSeconds: this.rateCache.ttlSeconds,
      });
    }

    throw new HealthCheckError('Rate cache is unavailable', this.getStatus(key, false, { error: report.error }));
  }
}
