import { DuplicateWatchlistStockError, WatchlistNotFoundError } from '@market-terminal/shared/watchlist';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTempDbPath, type TempDbPath } from '../../test-utils/temp-db';
import { WatchlistService } from '../watchlist-service';

describe('WatchlistService', () => {
  let tempDb: TempDbPath;
  let service: WatchlistService;

  beforeEach(async () => {
    tempDb = createTempDbPath();
    service = await WatchlistService.open(tempDb.path);
  });

  afterEach(async () => {
    await service.close();
    tempDb.cleanup();
  });

  it('seeds the default watchlists once', async () => {
    await expect(service.seedDefaults()).resolves.toEqual({ watchlistsCreated: 3, stocksAdded: 5 });
    await expect(service.seedDefaults()).resolves.toEqual({ watchlistsCreated: 0, stocksAdded: 0 });

    const summaries = await service.listWatchlists();
    expect(summaries.map((w) => [w.id, w.name, w.stockCount])).toEqual([
      [1, 'My Portfolio', 5],
      [2, 'Growth Stocks', 0],
      [3, 'Value Picks', 0],
    ]);
  });

  it('adds and removes stocks with normalized symbols', async () => {
    const { id } = await service.createWatchlist({ name: 'Tech' });

    const added = await service.addStock(id, ' wipro ');
    expect(added.symbol).toBe('WIPRO');
    await expect(service.addStock(id, 'WIPRO')).rejects.toBeInstanceOf(DuplicateWatchlistStockError);

    await expect(service.removeStock(id, 'wipro')).resolves.toBe(true);
    await expect(service.removeStock(id, 'wipro')).resolves.toBe(false);
    await expect(service.listSymbols(id)).resolves.toEqual([]);
  });

  it('rejects stock operations on an unknown watchlist', async () => {
    await expect(service.addStock(42, 'TCS')).rejects.toBeInstanceOf(WatchlistNotFoundError);
    await expect(service.removeStock(42, 'TCS')).rejects.toBeInstanceOf(WatchlistNotFoundError);
  });
});
