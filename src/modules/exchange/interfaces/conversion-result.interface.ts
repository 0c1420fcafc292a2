import { Currency } from '../enums/currency.enum';

export interface ConversionResult {
  readonly from: Currency;
  readonly to: Currency;
  readonly amount: number;
  /** amount * rate, rounded half-up to the configured precision */
  readonly convertedAmount: number;
  readonly rate: number;
  /** ISO-8601 time the result was built */
  readonly timestamp: string;
  readonly traceId?: string;
}

export interface ConvertOptions {
  /** Copied onto the result for log correlation */
  traceId?: string;
  /** Aborting rejects the conversion; nothing is cached after an abort */
  signal?: AbortSignal;
}
