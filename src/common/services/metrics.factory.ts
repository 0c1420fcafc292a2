import { Inject, Injectable } from '@nestjs/common';
import { CollectFunction, Counter, Gauge, Histogram, Registry } from 'prom-client';

/**
 * Injection token for the prom-client registry metrics are registered on.
 */
export const METRICS_REGISTRY = Symbol('METRICS_REGISTRY');

export interface CounterConfig {
  name: string;
  help: string;
  labelNames?: string[];
}

export interface HistogramConfig {
  name: string;
  help: string;
  labelNames?: string[];
  buckets?: number[];
}

export interface GaugeConfig {
  name: string;
  help: string;
  labelNames?: string[];
  /** Called on every scrape, before the gauge is read */
  collect?: CollectFunction<Gauge>;
}

/**
 * Injectable factory for creating Prometheus metrics on one registry.
 * Registration is idempotent, so two services asking for the same metric share it.
 *
 * @example
 * ```typescript
 * constructor(private readonly metricsFactory: MetricsFactory) {
 *   this.conversions = metricsFactory.getOrCreateCounter({
 *     name: 'currency_conversions_total',
 *     help: 'Total successful currency conversions',
 *   });
 * }
 * ```
 */
@Injectable()
export class MetricsFactory {
  constructor(@Inject(METRICS_REGISTRY) readonly registry: Registry) {}

  /**
   * Get an existing counter or create a new one if it doesn't exist.
   */
  getOrCreateCounter(config: CounterConfig): Counter {
    const existing = this.registry.getSingleMetric(config.name);
    if (existing) {
      if (existing instanceof Counter) return existing;
      throw new Error(`Metric ${config.name} is already registered with another type`);
    }
    return new Counter({
      name: config.name,
      help: config.help,
      labelNames: config.labelNames ?? [],
      registers: [this.registry],
    });
  }

  /**
   * Get an existing histogram or create a new one if it doesn't exist.
   */
  getOrCreateHistogram(config: HistogramConfig): Histogram {
    const existing = this.registry.getSingleMetric(config.name);
    if (existing) {
      if (existing instanceof Histogram) return existing;
      throw new Error(`Metric ${config.name} is already registered with another type`);
    }
    return new Histogram({
      name: config.name,
      help: config.help,
      labelNames: config.labelNames ?? [],
      ...(config.buckets && { buckets: config.buckets }),
      registers: [this.registry],
    });
  }

  /**
   * Get an existing gauge or create a new one if it doesn't exist.
   */
  getOrCreateGauge(config: GaugeConfig): Gauge {
    const existing = this.registry.getSingleMetric(config.name);
    if (existing) {
      if (existing instanceof Gauge) return existing;
      throw new Error(`Metric ${config.name} is already registered with another type`);
    }
    return new Gauge({
      name: config.name,
      help: config.help,
      labelNames: config.labelNames ?? [],
      ...(config.collect && { collect: config.collect }),
      registers: [this.registry],
    });
  }
}
