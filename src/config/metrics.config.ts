import { registerAs } from '@nestjs/config';

export interface MetricsConfig {
  /** Collect process metrics (CPU, memory, event loop) alongside the service's own */
  collectDefaults: boolean;
  /** Prefix for the default process metrics */
  prefix: string;
}

export default registerAs('metrics', (): MetricsConfig => {
  const isTest = process.env.NODE_ENV === 'test';
  const flag = process.env.METRICS_DEFAULT_COLLECT;

  return {
    collectDefaults: flag === undefined ? !isTest : flag === 'true',
    prefix: process.env.METRICS_PREFIX || 'currency_',
  };
});
