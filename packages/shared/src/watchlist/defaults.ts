/**
 * Watchlists every fresh database starts with
 */

export interface DefaultWatchlist {
  id: number;
  name: string;
  symbols: readonly string[];
}

export const DEFAULT_WATCHLISTS: readonly DefaultWatchlist[] = [
  { id: 1, name: 'My Portfolio', symbols: ['RELIANCE', 'TCS', 'INFY', 'HDFCBANK', 'ICICIBANK'] },
  { id: 2, name: 'Growth Stocks', symbols: [] },
  { id: 3, name: 'Value Picks', symbols: [] },
];
