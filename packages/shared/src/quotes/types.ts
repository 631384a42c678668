/**
 * Quote shown for one watchlist symbol. Recomputed on every read.
 */
export interface Quote {
  symbol: string;
  ltp: number;
  change: number;
  changePercent: number;
  volume: number;
  sector: string;
}

/** Sector reported for broker quotes, which carry no sector or volume */
export const LIVE_DATA_SECTOR = 'Live Data';

/** Sector reported by the mock pricer */
export const MOCK_SECTOR = 'Technology';
