/**
 * Rate Provider Interface
 *
 * The external source of current exchange rates. Implementations may be slow
 * or fail; they reject with a `RateProviderError` and should stop work when
 * `signal` aborts.
 */
export interface RateProvider {
  /**
   * Get the current rate between two currencies
   * @param from Source currency code (ISO 4217)
   * @param to Target currency code (ISO 4217)
   * @returns Units of `to` per one unit of `from`
   */
  fetchRate(from: string, to: string, signal?: AbortSignal): Promise<number>;
}

/**
 * Injection token for the active rate provider
 */
export const RATE_PROVIDER = Symbol('RATE_PROVIDER');
