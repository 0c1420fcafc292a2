import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { InvalidInputError } from '../../../common/exceptions';
import { MathUtils } from '../../../common/utils/math.utils';
import exchangeConfig from '../../../config/exchange.config';
import { CachedRate, CurrencyPair, isIdentityPair, pairKey } from '../interfaces/currency-pair.interface';

export interface RateCacheStats {
  /** Entries held, expired ones included */
  size: number;
  /** Entries older than the TTL that have not been refreshed yet */
  expired: number;
  oldestFetchedAt?: number;
}

/**
 * In-memory rate store with a fixed TTL.
 *
 * Expiry is lazy: an entry past its TTL is skipped by {@link getRate} but stays
 * in the map, and in {@link size}, until a refresh overwrites it or the cache is
 * cleared. The cache never fetches; callers fetch on a miss and {@link putRate}.
 *
 * Every method is synchronous, so on the event loop each call runs to
 * completion before any other cache call starts.
 */
@Injectable()
export class RateCacheService {
  private readonly entries = new Map<string, CachedRate>();
  private readonly ttlMs: number;

  constructor(
    @Inject(exchangeConfig.KEY)
    config: ConfigType<typeof exchangeConfig>,
  ) {
    this.ttlMs = config.cache.ttlSeconds * 1000;
  }

  get ttlSeconds(): number {
    return this.ttlMs / 1000;
  }

  getRate(pair: CurrencyPair, now = Date.now()): number | undefined {
    const entry = this.entries.get(pairKey(pair));
    if (!entry || this.isExpired(entry, now)) {
      return undefined;
    }
    return entry.rate;
  }

  putRate(pair: CurrencyPair, rate: number, now = Date.now()): void {
    if (isIdentityPair(pair)) {
      return;
    }
    if (!MathUtils.isPositiveFinite(rate)) {
      throw new InvalidInputError(`Rate for ${pairKey(pair)} must be a positive number, got ${rate}`);
    }

    this.entries.set(
      pairKey(pair),
      Object.freeze({ pair: Object.freeze({ base: pair.base, quote: pair.quote }), rate, fetchedAt: now }),
    );
  }

  /**
   * Drop every entry. Returns how many were removed.
   */
  clear(): number {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  size(): number {
    return this.entries.size;
  }

  stats(now = Date.now()): RateCacheStats {
    let expired = 0;
    let oldestFetchedAt: number | undefined;

    for (const entry of this.entries.values()) {
      if (this.isExpired(entry, now)) {
        expired++;
      }
      if (oldestFetchedAt === undefined || entry.fetchedAt < oldestFetchedAt) {
        oldestFetchedAt = entry.fetchedAt;
      }
    }

    return { size: this.entries.size, expired, ...(oldestFetchedAt !== undefined && { oldestFetchedAt }) };
  }

  private isExpired(entry: CachedRate, now: number): boolean {
    return now - entry.fetchedAt >= this.ttlMs;
  }
}
