/**
 * Mock Pricer
 *
 * Deterministic synthetic quotes for symbols without live data. The same
 * symbol always yields the same quote, in every process.
 */

import { fnv1a32 } from './hash';
import { MOCK_SECTOR, type Quote } from './types';

export function roundPercent(value: number): number {
  return Number(value.toFixed(2));
}

export function mockQuote(symbol: string): Quote {
  const h = fnv1a32(symbol);
  const base = 1000 + (h % 2000);
  const delta = (h % 200) - 100;

  return {
    symbol,
    ltp: base + delta,
    change: delta,
    changePercent: roundPercent((delta / base) * 100),
    volume: 100000 + (h % 1000000),
    sector: MOCK_SECTOR,
  };
}
