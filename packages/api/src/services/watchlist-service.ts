import { logger } from '@market-terminal/shared/utils/logger';
import {
  type CreateWatchlistInput,
  type SeedResult,
  type Watchlist,
  WatchlistDatabase,
  type WatchlistStock,
  type WatchlistSummary,
} from '@market-terminal/shared/watchlist';

/**
 * Watchlist persistence for the API layer. Owns one store connection.
 */
export class WatchlistService {
  private constructor(private readonly db: WatchlistDatabase) {}

  static async open(dbPath: string): Promise<WatchlistService> {
    const db = await WatchlistDatabase.open(dbPath);
    logger.debug('WatchlistService initialized', { dbPath });
    return new WatchlistService(db);
  }

  async listWatchlists(): Promise<WatchlistSummary[]> {
    logger.debug('Listing all watchlists');
    return this.db.listWatchlistSummaries();
  }

  async createWatchlist(input: CreateWatchlistInput): Promise<Watchlist> {
    logger.debug('Creating watchlist', { name: input.name, symbols: input.symbols?.length ?? 0 });
    return this.db.createWatchlist(input);
  }

  async addStock(watchlistId: number, symbol: string): Promise<WatchlistStock> {
    logger.debug('Adding stock to watchlist', { watchlistId, symbol });
    return this.db.addStock(watchlistId, symbol);
  }

  /**
   * @returns whether a membership was actually removed
   */
  async removeStock(watchlistId: number, symbol: string): Promise<boolean> {
    logger.debug('Removing stock from watchlist', { watchlistId, symbol });
    return this.db.removeStock(watchlistId, symbol);
  }

  async listSymbols(watchlistId: number): Promise<string[]> {
    return this.db.listSymbols(watchlistId);
  }

  async seedDefaults(): Promise<SeedResult> {
    const result = await this.db.seedDefaults();
    logger.info('Default watchlists seeded', { ...result });
    return result;
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
