import { normalizeSymbol } from '../../db/columns/symbol';
import type { SmartApiInstrument } from './types';

/**
 * NSE cash-segment instrument tokens for the symbols the terminal tracks by default.
 * Symbols outside this table are priced by the mock pricer.
 */
const NSE_EQUITY_TOKENS: Readonly<Record<string, string>> = {
  RELIANCE: '2885',
  TCS: '11536',
  INFY: '1594',
  HDFCBANK: '1333',
  ICICIBANK: '4963',
  SBIN: '3045',
  ITC: '1660',
  WIPRO: '3787',
  HINDUNILVR: '1394',
  BHARTIARTL: '10604',
  KOTAKBANK: '1922',
  LT: '11483',
  AXISBANK: '5900',
  MARUTI: '10999',
  ASIANPAINT: '236',
};

export function lookupInstrument(symbol: string): SmartApiInstrument | null {
  const normalized = normalizeSymbol(symbol);
  const token = Object.hasOwn(NSE_EQUITY_TOKENS, normalized) ? NSE_EQUITY_TOKENS[normalized] : undefined;
  if (!token) {
    return null;
  }
  return { exchange: 'NSE', tradingSymbol: `${normalized}-EQ`, symbolToken: token };
}
