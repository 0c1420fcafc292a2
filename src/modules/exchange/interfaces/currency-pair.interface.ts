import { Currency } from '../enums/currency.enum';

/**
 * Ordered (base, quote) pair identifying a conversion direction.
 */
export interface CurrencyPair {
  readonly base: Currency;
  readonly quote: Currency;
}

export interface CachedRate {
  readonly pair: CurrencyPair;
  /** Units of quote per one unit of base, unrounded */
  readonly rate: number;
  /** Epoch milliseconds of the provider fetch */
  readonly fetchedAt: number;
}

export function pairKey(pair: CurrencyPair): string {
  return `${pair.base}:${pair.quote}`;
}

export function isIdentityPair(pair: CurrencyPair): boolean {
  return pair.base === pair.quote;
}
