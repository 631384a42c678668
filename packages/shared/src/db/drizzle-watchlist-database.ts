/**
 * Drizzle-based Watchlist Database
 *
 * Owns the `watchlists` and `watchlist_stocks` tables. One libSQL client per
 * instance; open with `DrizzleWatchlistDatabase.open()` and call close() on shutdown.
 */

import { type Client, createClient } from '@libsql/client';
import { and, asc, eq, sql } from 'drizzle-orm';
import { drizzle, type LibSQLDatabase } from 'drizzle-orm/libsql';
import { logger } from '../utils/logger';
import { DEFAULT_WATCHLISTS, type DefaultWatchlist } from '../watchlist/defaults';
import {
  type CreateWatchlistInput,
  DuplicateWatchlistStockError,
  InvalidSymbolError,
  type SeedResult,
  type Watchlist,
  WatchlistNotFoundError,
  type WatchlistStock,
  type WatchlistSummary,
} from '../watchlist/types';
import { isValidSymbol, normalizeSymbol } from './columns/symbol';
import { type WatchlistRow, type WatchlistStockRow, watchlistStocks, watchlists } from './schema/watchlist-schema';
import {
  executeTransaction,
  isUniqueConstraintError,
  parseSqliteTimestamp,
  type SQLiteExecutor,
} from './transaction-helpers';

export class DrizzleWatchlistDatabase {
  private readonly client: Client;
  private readonly db: LibSQLDatabase;

  private constructor(dbPath: string) {
    this.client = createClient({ url: `file:${dbPath}` });
    this.db = drizzle(this.client);
  }

  /**
   * Open (or create) the store at `dbPath` and ensure its tables exist
   */
  static async open(dbPath: string): Promise<DrizzleWatchlistDatabase> {
    const database = new DrizzleWatchlistDatabase(dbPath);
    try {
      await database.initializeSchema();
    } catch (error) {
      database.client.close();
      throw error;
    }
    return database;
  }

  private async initializeSchema(): Promise<void> {
    await this.client.execute('PRAGMA journal_mode = WAL');
    await this.applyConnectionPragmas();

    await this.client.executeMultiple(`
      CREATE TABLE IF NOT EXISTS watchlists (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      );

      CREATE TABLE IF NOT EXISTS watchlist_stocks (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        watchlist_id INTEGER NOT NULL,
        symbol TEXT NOT NULL,
        added_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        FOREIGN KEY (watchlist_id) REFERENCES watchlists(id) ON DELETE CASCADE,
        UNIQUE(watchlist_id, symbol)
      );

      CREATE INDEX IF NOT EXISTS idx_watchlist_stocks_watchlist_id
        ON watchlist_stocks(watchlist_id);
    `);
  }

  /**
   * foreign_keys is per connection. A libSQL transaction keeps the connection it
   * started on and the client opens a fresh one afterwards, so this runs again
   * after every transaction.
   */
  private async applyConnectionPragmas(): Promise<void> {
    await this.client.execute('PRAGMA foreign_keys = ON');
  }

  private async inTransaction<T>(operationName: string, operation: (tx: SQLiteExecutor) => Promise<T>): Promise<T> {
    try {
      return await executeTransaction(this.db, operation, { operationName });
    } finally {
      await this.applyConnectionPragmas();
    }
  }

  private normalizeAndValidate(symbol: string): string {
    const normalized = normalizeSymbol(symbol);
    if (!isValidSymbol(normalized)) {
      throw new InvalidSymbolError(symbol);
    }
    return normalized;
  }

  private async assertWatchlistExists(id: number): Promise<void> {
    if (!(await this.getWatchlist(id))) {
      throw new WatchlistNotFoundError(id);
    }
  }

  private async insertStock(executor: SQLiteExecutor, watchlistId: number, symbol: string): Promise<WatchlistStock> {
    try {
      const row = await executor.insert(watchlistStocks).values({ watchlistId, symbol }).returning().get();
      return this.mapStockRow(row);
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        throw new DuplicateWatchlistStockError(symbol, watchlistId);
      }
      throw error;
    }
  }

  /**
   * Create a watchlist together with its initial symbols as one unit.
   * A repeated symbol or any insert failure rolls back the watchlist row too.
   */
  async createWatchlist(input: CreateWatchlistInput): Promise<Watchlist> {
    const symbols = (input.symbols ?? []).map((symbol) => this.normalizeAndValidate(symbol));

    const watchlist = await this.inTransaction('createWatchlist', async (tx) => {
      const row = await tx.insert(watchlists).values({ name: input.name }).returning().get();
      for (const symbol of symbols) {
        await this.insertStock(tx, row.id, symbol);
      }
      return this.mapWatchlistRow(row);
    });

    logger.debug('Created watchlist', { id: watchlist.id, name: watchlist.name, symbols: symbols.length });
    return watchlist;
  }

  async getWatchlist(id: number): Promise<Watchlist | null> {
    const row = await this.db.select().from(watchlists).where(eq(watchlists.id, id)).get();
    return row ? this.mapWatchlistRow(row) : null;
  }

  async listWatchlistSummaries(): Promise<WatchlistSummary[]> {
    const rows = await this.db
      .select({
        id: watchlists.id,
        name: watchlists.name,
        createdAt: watchlists.createdAt,
        stockCount: sql<number>`COUNT(${watchlistStocks.id})`,
      })
      .from(watchlists)
      .leftJoin(watchlistStocks, eq(watchlists.id, watchlistStocks.watchlistId))
      .groupBy(watchlists.id)
      .orderBy(asc(watchlists.id))
      .all();

    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      createdAt: parseSqliteTimestamp(row.createdAt),
      stockCount: Number(row.stockCount),
    }));
  }

  /**
   * Add one symbol. Duplicate detection relies on the UNIQUE(watchlist_id, symbol)
   * constraint rather than a prior lookup.
   */
  async addStock(watchlistId: number, symbol: string): Promise<WatchlistStock> {
    const normalized = this.normalizeAndValidate(symbol);
    await this.assertWatchlistExists(watchlistId);

    const stock = await this.insertStock(this.db, watchlistId, normalized);
    logger.debug('Added stock to watchlist', { watchlistId, symbol: normalized });
    return stock;
  }

  /**
   * Remove one symbol; returns false when it was not a member.
   */
  async removeStock(watchlistId: number, symbol: string): Promise<boolean> {
    const normalized = normalizeSymbol(symbol);
    await this.assertWatchlistExists(watchlistId);

    const result = await this.db
      .delete(watchlistStocks)
      .where(and(eq(watchlistStocks.watchlistId, watchlistId), eq(watchlistStocks.symbol, normalized)))
      .run();

    logger.debug('Removed stock from watchlist', { watchlistId, symbol: normalized, removed: result.rowsAffected });
    return result.rowsAffected > 0;
  }

  async listStocks(watchlistId: number): Promise<WatchlistStock[]> {
    await this.assertWatchlistExists(watchlistId);

    const rows = await this.db
      .select()
      .from(watchlistStocks)
      .where(eq(watchlistStocks.watchlistId, watchlistId))
      .orderBy(asc(watchlistStocks.addedAt), asc(watchlistStocks.id))
      .all();
    return rows.map((row) => this.mapStockRow(row));
  }

  /**
   * Symbols in insertion order
   */
  async listSymbols(watchlistId: number): Promise<string[]> {
    const stocks = await this.listStocks(watchlistId);
    return stocks.map((stock) => stock.symbol);
  }

  /**
   * Insert-or-ignore the default watchlists. Default symbols are only added to a
   * watchlist created by this call, so symbols a user removed stay removed.
   */
  async seedDefaults(defaults: readonly DefaultWatchlist[] = DEFAULT_WATCHLISTS): Promise<SeedResult> {
    const result = await this.inTransaction('seedDefaults', async (tx) => {
      let watchlistsCreated = 0;
      let stocksAdded = 0;

      for (const entry of defaults) {
        const inserted = await tx
          .insert(watchlists)
          .values({ id: entry.id, name: entry.name })
          .onConflictDoNothing()
          .run();
        if (inserted.rowsAffected === 0) continue;
        watchlistsCreated++;

        for (const symbol of entry.symbols) {
          const added = await tx
            .insert(watchlistStocks)
            .values({ watchlistId: entry.id, symbol: this.normalizeAndValidate(symbol) })
            .onConflictDoNothing()
            .run();
          stocksAdded += added.rowsAffected;
        }
      }

      return { watchlistsCreated, stocksAdded };
    });

    logger.debug('Seeded default watchlists', { ...result });
    return result;
  }

  async close(): Promise<void> {
    try {
      await this.client.execute('PRAGMA wal_checkpoint(TRUNCATE)');
    } catch (error) {
      logger.warn('WAL checkpoint failed on close', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
    this.client.close();
    logger.debug('Watchlist database connection closed');
  }

  private mapWatchlistRow(row: WatchlistRow): Watchlist {
    return {
      id: row.id,
      name: row.name,
      createdAt: parseSqliteTimestamp(row.createdAt),
    };
  }

  private mapStockRow(row: WatchlistStockRow): WatchlistStock {
    return {
      watchlistId: row.watchlistId,
      symbol: row.symbol,
      addedAt: parseSqliteTimestamp(row.addedAt),
    };
  }
}
