/**
 * Watchlist Types and Error Classes
 */

import { BadRequestError, ConflictError, NotFoundError } from '../errors';

/**
 * Watchlist - A named collection of watched symbols
 */
export interface Watchlist {
  id: number;
  name: string;
  createdAt: Date;
}

/**
 * Membership of one symbol in one watchlist
 */
export interface WatchlistStock {
  watchlistId: number;
  symbol: string;
  addedAt: Date;
}

export interface WatchlistSummary extends Watchlist {
  stockCount: number;
}

export interface CreateWatchlistInput {
  name: string;
  symbols?: string[];
}

/**
 * Result of seeding the default watchlists
 */
export interface SeedResult {
  watchlistsCreated: number;
  stocksAdded: number;
}

/**
 * A watchlist referenced by id does not exist
 */
export class WatchlistNotFoundError extends NotFoundError {
  override readonly code: string = 'WATCHLIST_NOT_FOUND';

  constructor(readonly watchlistId: number) {
    super(`Watchlist with ID ${watchlistId} not found`);
  }
}

/**
 * The symbol is already a member of the watchlist
 */
export class DuplicateWatchlistStockError extends ConflictError {
  override readonly code: string = 'DUPLICATE_STOCK';

  constructor(
    readonly symbol: string,
    readonly watchlistId: number
  ) {
    super(`Stock ${symbol} already exists in watchlist ${watchlistId}`);
  }
}

/**
 * The symbol is not a plausible ticker after normalization
 */
export class InvalidSymbolError extends BadRequestError {
  override readonly code: string = 'INVALID_SYMBOL';

  constructor(readonly symbol: string) {
    super(`Invalid symbol: "${symbol}"`);
  }
}

// ============================================================
// API Response Types
// ============================================================

export interface WatchlistSummaryResponse {
  id: number;
  name: string;
  stock_count: number;
}
