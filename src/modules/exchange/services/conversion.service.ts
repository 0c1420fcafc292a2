import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import {
  CacheUnavailableError,
  InvalidInputError,
  RateProviderError,
  RateUnavailableError,
} from '../../../common/exceptions';
import { MathUtils } from '../../../common/utils/math.utils';
import exchangeConfig from '../../../config/exchange.config';
import { MetricsService } from '../../metrics/metrics.service';
import { Currency, isSupportedCurrency, supportedCurrencies } from '../enums/currency.enum';
import { ConversionResult, ConvertOptions } from '../interfaces/conversion-result.interface';
import { CurrencyPair } from '../interfaces/currency-pair.interface';
import { RATE_PROVIDER, RateProvider } from '../providers/rate-provider.interface';
import { RateCacheService } from './rate-cache.service';

type AbortReason = 'timeout' | 'cancelled';

/**
 * Converts amounts between supported currencies.
 *
 * Rates come from the cache while fresh; a miss or an expired entry is fetched
 * from the provider and written back. Concurrent misses for the same pair each
 * call the provider and the last write wins.
 */
@Injectable()
export class ConversionService {
  constructor(
    private readonly rateCache: RateCacheService,
    @Inject(RATE_PROVIDER)
    private readonly rateProvider: RateProvider,
    private readonly metrics: MetricsService,
    @Inject(exchangeConfig.KEY)
    private readonly config: ConfigType<typeof exchangeConfig>,
  ) {}

  async convert(from: string, to: string, amount: number, options: ConvertOptions = {}): Promise<ConversionResult> {
    const base = this.parseCurrency(from);
    const quote = this.parseCurrency(to);
    if (!MathUtils.isNonNegativeFinite(amount)) {
      throw new InvalidInputError(`Amount must be a finite, non-negative number, got ${String(amount)}`);
    }

    const identity = base === quote;
    const rate = identity ? 1 : await this.resolveRate({ base, quote }, options.signal);

    const result: ConversionResult = Object.freeze({
      from: base,
      to: quote,
      amount,
      convertedAmount: identity ? amount : MathUtils.multiply(amount, rate, this.config.amountPrecision),
      rate,
      timestamp: new Date().toISOString(),
      ...(options.traceId ? { traceId: options.traceId } : {}),
    });

    this.metrics.recordConversion();
    return result;
  }

  /**
   * Empty the rate cache. Idempotent; returns how many entries were dropped.
   */
  clearCache(): number {
    return this.rateCache.clear();
  }

  listSupportedCurrencies(): Currency[] {
    return supportedCurrencies();
  }

  private parseCurrency(code: string): Currency {
    const normalized = typeof code === 'string' ? code.trim().toUpperCase() : '';
    if (!isSupportedCurrency(normalized)) {
      throw new InvalidInputError(`Unsupported currency code: ${String(code)}`);
    }
    return normalized;
  }

  private async resolveRate(pair: CurrencyPair, signal?: AbortSignal): Promise<number> {
    const cached = this.withCache(() => this.rateCache.getRate(pair));
    if (cached !== undefined) {
      this.metrics.recordCacheHit();
      return cached;
    }

    this.metrics.recordCacheMiss();
    const rate = await this.fetchRate(pair, signal);
    this.withCache(() => this.rateCache.putRate(pair, rate));
    return rate;
  }

  /**
   * Call the provider under the configured timeout and the caller's signal.
   * Resolves only with a valid rate, and never after the caller has aborted.
   */
  private async fetchRate(pair: CurrencyPair, callerSignal?: AbortSignal): Promise<number> {
    if (callerSignal?.aborted) {
      throw new RateUnavailableError(pair, 'cancelled');
    }

    const controller = new AbortController();
    const onCallerAbort = () => controller.abort('cancelled' satisfies AbortReason);
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    const timeoutId = setTimeout(() => controller.abort('timeout' satisfies AbortReason), this.config.provider.timeoutMs);

    // Settles the race even when a provider ignores its signal
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(new RateUnavailableError(pair, controller.signal.reason === 'timeout' ? 'timeout' : 'cancelled')),
        { once: true },
      );
    });

    const endTimer = this.metrics.startProviderTimer();
    try {
      const rate = await Promise.race([this.rateProvider.fetchRate(pair.base, pair.quote, controller.signal), aborted]);

      if (controller.signal.aborted) {
        throw new RateUnavailableError(pair, controller.signal.reason === 'timeout' ? 'timeout' : 'cancelled');
      }
      if (!MathUtils.isPositiveFinite(rate)) {
        throw new RateUnavailableError(pair, 'provider_error', `malformed rate ${String(rate)}`);
      }

      endTimer('success');
      return rate;
    } catch (error) {
      endTimer('error');
      throw this.toRateUnavailable(pair, error);
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private toRateUnavailable(pair: CurrencyPair, error: unknown): RateUnavailableError {
    if (error instanceof RateUnavailableError) {
      return error;
    }
    if (error instanceof RateProviderError) {
      return new RateUnavailableError(
        pair,
        error.kind === 'unsupported_pair' ? 'unsupported_pair' : 'provider_error',
        error.message,
      );
    }
    return new RateUnavailableError(pair, 'provider_error', error instanceof Error ? error.message : String(error));
  }

  private withCache<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      throw new CacheUnavailableError(error);
    }
  }
}
