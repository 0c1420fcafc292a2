/**
 * Typed Exchange Exception Classes
 *
 * Every failure of the conversion core is one of these. They carry a stable
 * `code` for clients and map onto HTTP statuses through NestJS exceptions.
 *
 * @example
 * ```typescript
 * throw new InvalidInputError('Unsupported currency code: XXX');
 * throw new RateUnavailableError({ base: 'EUR', quote: 'USD' }, 'timeout');
 * ```
 */

import { BadRequestException, ServiceUnavailableException } from '@nestjs/common';

/**
 * Why a rate could not be obtained.
 */
export type RateUnavailableReason = 'timeout' | 'cancelled' | 'unsupported_pair' | 'provider_error';

interface PairLike {
  base: string;
  quote: string;
}

// ==================== Client Errors ====================

/**
 * Unsupported currency code or an amount that is not a finite, non-negative number.
 * Raised before any cache or provider interaction.
 */
export class InvalidInputError extends BadRequestException {
  constructor(message: string) {
    super({
      code: 'exchange.invalid_input',
      message,
    });
  }
}

// ==================== Upstream Errors ====================

export class RateUnavailableError extends ServiceUnavailableException {
  readonly base: string;
  readonly quote: string;
  readonly reason: RateUnavailableReason;

  constructor(pair: PairLike, reason: RateUnavailableReason, detail?: string) {
    super({
      code: 'exchange.rate_unavailable',
      message: `Exchange rate ${pair.base} -> ${pair.quote} unavailable (${reason})${detail ? `: ${detail}` : ''}`,
      reason,
    });

    this.base = pair.base;
    this.quote = pair.quote;
    this.reason = reason;
  }
}

/**
 * The rate cache itself could not be read or written.
 * Never expected from the in-memory store; kept for stores that can fail.
 */
export class CacheUnavailableError extends ServiceUnavailableException {
  constructor(cause: unknown) {
    super(
      {
        code: 'exchange.cache_unavailable',
        message: `Rate cache unavailable: ${cause instanceof Error ? cause.message : String(cause)}`,
      },
      { cause },
    );
  }
}

// ==================== Provider Errors ====================

export type RateProviderErrorKind = 'unsupported_pair' | 'transient';

/**
 * Raised by rate provider implementations. Callers above the conversion
 * service only ever see it as a {@link RateUnavailableError}.
 */
export class RateProviderError extends Error {
  constructor(
    readonly kind: RateProviderErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'RateProviderError';
  }
}
