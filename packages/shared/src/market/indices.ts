export interface MarketIndex {
  name: string;
  value: number;
  change: number;
  changePercent: number;
}

/**
 * Headline indices shown in the terminal ticker. Static snapshot values.
 */
const MARKET_INDICES: readonly MarketIndex[] = [
  { name: 'NIFTY 50', value: 19674.25, change: 156.8, changePercent: 0.8 },
  { name: 'SENSEX', value: 66023.69, change: 525.42, changePercent: 0.8 },
  { name: 'BANK NIFTY', value: 44258.75, change: -125.3, changePercent: -0.28 },
];

export function getMarketIndices(): MarketIndex[] {
  return MARKET_INDICES.map((index) => ({ ...index }));
}
