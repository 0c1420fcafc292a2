/**
 * Exchange Configuration
 *
 * Rate cache, rate provider and rounding settings.
 *
 * @example
 * ```typescript
 * constructor(
 *   @Inject(exchangeConfig.KEY)
 *   private readonly config: ConfigType<typeof exchangeConfig>,
 * ) {}
 *
 * const { ttlSeconds } = this.config.cache;
 * ```
 */
import { registerAs } from '@nestjs/config';

export interface ExchangeConfig {
  cache: {
    /** Fixed time-to-live of every cached rate, in seconds (default: 5 minutes) */
    ttlSeconds: number;
  };

  provider: {
    /** Base URL of the Frankfurter-compatible rate API */
    baseUrl: string;
    /** Upper bound on a single provider call, in milliseconds */
    timeoutMs: number;
  };

  /** Decimal places kept on converted amounts */
  amountPrecision: number;
}

export default registerAs(
  'exchange',
  (): ExchangeConfig => ({
    cache: {
      ttlSeconds: parseInt(process.env.EXCHANGE_CACHE_TTL_SECONDS || '300', 10),
    },
    provider: {
      baseUrl: process.env.EXCHANGE_PROVIDER_BASE_URL || 'https://api.frankfurter.app',
      timeoutMs: parseInt(process.env.EXCHANGE_PROVIDER_TIMEOUT_MS || '10000', 10),
    },
    amountPrecision: parseInt(process.env.EXCHANGE_AMOUNT_PRECISION || '2', 10),
  }),
);
