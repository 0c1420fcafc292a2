export enum Currency {
  AUD = 'AUD',
  BRL = 'BRL',
  CAD = 'CAD',
  CHF = 'CHF',
  CNY = 'CNY',
  EUR = 'EUR',
  GBP = 'GBP',
  INR = 'INR',
  JPY = 'JPY',
  USD = 'USD',
}

const SUPPORTED_CURRENCIES: ReadonlySet<string> = new Set(Object.values(Currency));

export function isSupportedCurrency(code: string): code is Currency {
  return SUPPORTED_CURRENCIES.has(code);
}

export function supportedCurrencies(): Currency[] {
  return Object.values(Currency).sort();
}
