/**
 * Supported currency codes and their display symbols.
 */
export const SUPPORTED_CURRENCIES: Readonly<Record<string, string>> = {
  SGD: 'S$',
  USD: '$',
  EUR: '€',
  GBP: '£',
  JPY: '¥',
  CNY: '¥',
  MYR: 'RM',
  THB: '฿',
  IDR: 'Rp',
  PHP: '₱',
  VND: '₫',
  KRW: '₩',
  INR: '₹',
  AUD: 'A$',
  NZD: 'NZ$',
  HKD: 'HK$',
  TWD: 'NT$',
};

// "$" is read as USD; the user can override with an explicit code
export const CURRENCY_SYMBOL_TO_CODE: Readonly<Record<string, string>> = {
  $: 'USD',
  '€': 'EUR',
  '£': 'GBP',
  '¥': 'JPY',
  '฿': 'THB',
  '₱': 'PHP',
  '₫': 'VND',
  '₩': 'KRW',
  '₹': 'INR',
  S$: 'SGD',
  A$: 'AUD',
  HK$: 'HKD',
  NZ$: 'NZD',
  NT$: 'TWD',
  RM: 'MYR',
  Rp: 'IDR',
};

export const CURRENCY_WORD_TO_CODE: Readonly<Record<string, string>> = {
  BAHT: 'THB',
};

// Longest first so "S$" wins over "$"
export const CURRENCY_SYMBOLS_BY_LENGTH: readonly string[] = Object.keys(CURRENCY_SYMBOL_TO_CODE).sort(
  (a, b) => b.length - a.length,
);

export function isSupportedCurrency(code: string): boolean {
  return Object.prototype.hasOwnProperty.call(SUPPORTED_CURRENCIES, code);
}

export function getCurrencySymbol(code: string): string {
  return isSupportedCurrency(code) ? SUPPORTED_CURRENCIES[code] : code;
}
