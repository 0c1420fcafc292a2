import Decimal from 'decimal.js';

export class MathUtils {
  /**
   * Rounding for monetary amounts, half-up, via decimal.js so that
   * 1.005 rounds to 1.01 rather than 1.00.
   */
  static round(value: number, precision = 2): number {
    return new Decimal(value).toDecimalPlaces(precision, Decimal.ROUND_HALF_UP).toNumber();
  }

  /**
   * Safe multiplication (a * b) rounded to precision
   */
  static multiply(a: number, b: number, precision = 2): number {
    return new Decimal(a).times(b).toDecimalPlaces(precision, Decimal.ROUND_HALF_UP).toNumber();
  }

  static isNonNegativeFinite(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value) && value >= 0;
  }

  static isPositiveFinite(value: unknown): value is number {
    return typeof value === 'number' && Number.isFinite(value) && value > 0;
  }
}
