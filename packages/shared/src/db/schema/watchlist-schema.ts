/**
 * Watchlist Drizzle Schema
 *
 * - watchlists: named collections of ticker symbols
 * - watchlist_stocks: one row per (watchlist, symbol) membership
 */

import { sql } from 'drizzle-orm';
import { index, integer, sqliteTable, text, unique } from 'drizzle-orm/sqlite-core';
import { tickerSymbol } from '../columns/symbol';

export const watchlists = sqliteTable('watchlists', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  createdAt: text('created_at').default(sql`CURRENT_TIMESTAMP`),
});

/**
 * Membership rows; the (watchlist_id, symbol) pair is unique so duplicate adds
 * are rejected by SQLite itself, even under concurrent writers.
 */
export const watchlistStocks = sqliteTable(
  'watchlist_stocks',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    watchlistId: integer('watchlist_id')
      .notNull()
      .references(() => watchlists.id, { onDelete: 'cascade' }),
    symbol: tickerSymbol('symbol').notNull(),
    addedAt: text('added_at').default(sql`CURRENT_TIMESTAMP`),
  },
  (table) => [
    unique('watchlist_stocks_watchlist_symbol_unique').on(table.watchlistId, table.symbol),
    index('idx_watchlist_stocks_watchlist_id').on(table.watchlistId),
  ]
);

export type WatchlistRow = typeof watchlists.$inferSelect;
export type WatchlistStockRow = typeof watchlistStocks.$inferSelect;
