/**
 * Custom Drizzle column type for ticker symbols
 *
 * Symbols are stored trimmed and upper-cased so "tcs", " TCS" and "TCS"
 * all refer to the same membership row.
 */

import { customType } from 'drizzle-orm/sqlite-core';

/**
 * Ticker symbols: letters, digits and the separators NSE uses (&, -, .)
 */
const SYMBOL_REGEX = /^[A-Z0-9][A-Z0-9&.\-_]{0,31}$/;

/**
 * @example
 * normalizeSymbol(" tcs ") // => "TCS"
 * normalizeSymbol("M&M")   // => "M&M"
 */
export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * Validate a normalized symbol
 */
export function isValidSymbol(symbol: string): boolean {
  return SYMBOL_REGEX.test(symbol);
}

export const tickerSymbol = customType<{
  data: string;
  driverData: string;
}>({
  dataType() {
    return 'text';
  },
  fromDriver(value: string): string {
    return normalizeSymbol(value);
  },
  toDriver(value: string): string {
    return normalizeSymbol(value);
  },
});
