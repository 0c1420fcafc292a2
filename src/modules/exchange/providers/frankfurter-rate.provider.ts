/**
 * Frankfurter Exchange Rate Provider
 *
 * Fetches the latest ECB reference rates from a Frankfurter-compatible API
 * (`GET {baseUrl}/latest?from=EUR&to=USD`).
 */
import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { RateProviderError } from '../../../common/exceptions';
import { MathUtils } from '../../../common/utils/math.utils';
import exchangeConfig from '../../../config/exchange.config';
import { RateProvider } from './rate-provider.interface';

/**
 * Response structure of `/latest`
 */
interface FrankfurterLatestResponse {
  amount: number;
  base: string;
  date: string;
  rates: Record<string, unknown>;
}

function isLatestResponse(body: unknown): body is FrankfurterLatestResponse {
  return (
    typeof body === 'object' &&
    body !== null &&
    'rates' in body &&
    typeof body.rates === 'object' &&
    body.rates !== null
  );
}

@Injectable()
export class FrankfurterRateProvider implements RateProvider {
  private readonly logger = new Logger(FrankfurterRateProvider.name);

  constructor(
    @Inject(exchangeConfig.KEY)
    private readonly config: ConfigType<typeof exchangeConfig>,
  ) {}

  async fetchRate(from: string, to: string, signal?: AbortSignal): Promise<number> {
    const url = new URL(`${this.config.provider.baseUrl.replace(/\/+$/, '')}/latest`);
    url.searchParams.set('from', from);
    url.searchParams.set('to', to);

    let response: Response;
    try {
      response = await fetch(url, { signal, headers: { Accept: 'application/json' } });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Rate request ${from} -> ${to} failed: ${reason}`);
      throw new RateProviderError('transient', `Rate request failed: ${reason}`);
    }

    // Frankfurter answers 404 for currencies it does not know
    if (response.status === 404 || response.status === 422) {
      throw new RateProviderError('unsupported_pair', `Provider does not quote ${from} -> ${to}`);
    }
    if (!response.ok) {
      this.logger.warn(`Rate provider answered HTTP ${response.status} for ${from} -> ${to}`);
      throw new RateProviderError('transient', `HTTP ${response.status}: ${response.statusText}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new RateProviderError('transient', 'Provider returned a body that is not JSON');
    }

    if (!isLatestResponse(body)) {
      throw new RateProviderError('transient', 'Provider response has no rates');
    }

    const rate = body.rates[to];
    if (rate === undefined) {
      throw new RateProviderError('unsupported_pair', `Provider response has no rate for ${to}`);
    }
    if (!MathUtils.isPositiveFinite(rate)) {
      throw new RateProviderError('transient', `Provider returned an invalid rate for ${to}: ${String(rate)}`);
    }

    this.logger.debug(`Rate fetched ${from} -> ${to}: ${rate} (as of ${body.date})`);
    return rate;
  }
}
