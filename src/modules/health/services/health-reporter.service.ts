import { Injectable } from '@nestjs/common';
import { RateCacheService } from '../../exchange/services/rate-cache.service';

export type HealthStatus = 'healthy' | 'degraded';

export interface HealthReport {
  status: HealthStatus;
  /** Entries held by the rate cache; null when the cache could not be read */
  cacheSize: number | null;
  error?: string;
}

/**
 * Health of the conversion core. An empty cache is healthy; only a cache that
 * cannot be read is degraded.
 */
@Injectable()
export class HealthReporterService {
  constructor(private readonly rateCache: RateCacheService) {}

  report(): HealthReport {
    try {
      return { status: 'healthy', cacheSize: this.rateCache.size() };
    } catch (error) {
      return {
        status: 'degraded',
        cacheSize: null,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
