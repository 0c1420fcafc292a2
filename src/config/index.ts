export { validate } from './env-validation';
export { default as exchangeConfig } from './exchange.config';
export type { ExchangeConfig } from './exchange.config';
export { default as metricsConfig } from './metrics.config';
export type { MetricsConfig } from './metrics.config';
