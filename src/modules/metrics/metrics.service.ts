import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { collectDefaultMetrics, Counter, Gauge, Histogram } from 'prom-client';
import { MetricsFactory } from '../../common/services/metrics.factory';
import metricsConfig from '../../config/metrics.config';

export type RequestOutcome = 'success' | 'error';

/**
 * Point-in-time view of the service counters.
 */
export interface MetricsSnapshot {
  requestsTotal: number;
  conversionsTotal: number;
  cacheSize: number;
}

@Injectable()
export class MetricsService implements OnModuleInit {
  readonly httpRequestsTotal: Counter;
  readonly conversionsTotal: Counter;
  readonly cacheHitsTotal: Counter;
  readonly cacheMissesTotal: Counter;
  readonly exchangeCacheSize: Gauge;
  readonly providerFetchDuration: Histogram;

  private cacheSizeSource: () => number = () => 0;

  constructor(
    private readonly metricsFactory: MetricsFactory,
    @Inject(metricsConfig.KEY)
    private readonly config: ConfigType<typeof metricsConfig>,
  ) {
    this.httpRequestsTotal = metricsFactory.getOrCreateCounter({
      name: 'http_requests_total',
      help: 'Total number of conversion requests, by outcome',
      labelNames: ['outcome'],
    });

    this.conversionsTotal = metricsFactory.getOrCreateCounter({
      name: 'currency_conversions_total',
      help: 'Total number of successful currency conversions',
    });

    this.cacheHitsTotal = metricsFactory.getOrCreateCounter({
      name: 'exchange_cache_hits_total',
      help: 'Rate lookups answered from the cache',
    });

    this.cacheMissesTotal = metricsFactory.getOrCreateCounter({
      name: 'exchange_cache_misses_total',
      help: 'Rate lookups that had to go to the provider',
    });

    this.exchangeCacheSize = metricsFactory.getOrCreateGauge({
      name: 'exchange_cache_size',
      help: 'Current number of entries in the exchange rate cache',
      collect: () => {
        this.exchangeCacheSize.set(this.cacheSizeSource());
      },
    });

    this.providerFetchDuration = metricsFactory.getOrCreateHistogram({
      name: 'rate_provider_fetch_duration_seconds',
      help: 'Rate provider call duration in seconds',
      labelNames: ['outcome'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
    });
  }

  onModuleInit(): void {
    if (this.config.collectDefaults) {
      // CPU, memory, event loop, etc.
      collectDefaultMetrics({ register: this.metricsFactory.registry, prefix: this.config.prefix });
    }
  }

  /**
   * Read the cache size from `source` on every scrape.
   */
  observeCacheSize(source: () => number): void {
    this.cacheSizeSource = source;
  }

  recordRequest(outcome: RequestOutcome): void {
    this.httpRequestsTotal.inc({ outcome });
  }

  recordConversion(): void {
    this.conversionsTotal.inc();
  }

  recordCacheHit(): void {
    this.cacheHitsTotal.inc();
  }

  recordCacheMiss(): void {
    this.cacheMissesTotal.inc();
  }

  /**
   * Start timing a provider call; call the returned function with its outcome.
   */
  startProviderTimer(): (outcome: RequestOutcome) => void {
    const end = this.providerFetchDuration.startTimer();
    return (outcome) => {
      end({ outcome });
    };
  }

  async snapshot(): Promise<MetricsSnapshot> {
    const [requests, conversions, cacheSize] = await Promise.all([
      this.httpRequestsTotal.get(),
      this.conversionsTotal.get(),
      this.exchangeCacheSize.get(),
    ]);

    const sum = (values: { value: number }[]) => values.reduce((total, v) => total + v.value, 0);

    return {
      requestsTotal: sum(requests.values),
      conversionsTotal: sum(conversions.values),
      cacheSize: sum(cacheSize.values),
    };
  }

  /**
   * Retrieve all Prometheus metrics as a string.
   */
  async getMetrics(): Promise<string> {
    return this.metricsFactory.registry.metrics();
  }

  /**
   * Get the content type for Prometheus metrics.
   */
  getContentType(): string {
    return this.metricsFactory.registry.contentType;
  }
}
