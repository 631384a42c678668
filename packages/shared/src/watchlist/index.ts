/**
 * Watchlist Management Module
 * Named symbol lists with SQLite storage via Drizzle ORM
 */

export { DrizzleWatchlistDatabase as WatchlistDatabase } from '../db/drizzle-watchlist-database';
export { isValidSymbol, normalizeSymbol } from '../db/columns/symbol';
export { DEFAULT_WATCHLISTS, type DefaultWatchlist } from './defaults';

export type {
  CreateWatchlistInput,
  SeedResult,
  Watchlist,
  WatchlistStock,
  WatchlistSummary,
  WatchlistSummaryResponse,
} from './types';
export { DuplicateWatchlistStockError, InvalidSymbolError, WatchlistNotFoundError } from './types';
