import { WatchlistNotFoundError } from '@market-terminal/shared/watchlist';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { FakeBroker } from '../../test-utils/fake-broker';
import { createTempDbPath, type TempDbPath } from '../../test-utils/temp-db';
import { QuoteService } from '../quote-service';
import { WatchlistService } from '../watchlist-service';

const TCS_MOCK = { symbol: 'TCS', ltp: 1878, change: -11, changePercent: -0.58, volume: 386889, sector: 'Technology' };
const INFY_MOCK = { symbol: 'INFY', ltp: 3010, change: 55, changePercent: 1.86, volume: 465955, sector: 'Technology' };

describe('QuoteService', () => {
  let tempDb: TempDbPath;
  let watchlists: WatchlistService;

  beforeEach(async () => {
    tempDb = createTempDbPath();
    watchlists = await WatchlistService.open(tempDb.path);
  });

  afterEach(async () => {
    await watchlists.close();
    tempDb.cleanup();
  });

  it('prices every symbol with the mock pricer when the broker has no session', async () => {
    const broker = new FakeBroker();
    const { id } = await watchlists.createWatchlist({ name: 'Tech', symbols: ['tcs', 'infy'] });

    const quotes = await new QuoteService(watchlists, broker).getQuotes(id);

    expect(quotes).toEqual([TCS_MOCK, INFY_MOCK]);
    expect(broker.quoteCalls).toEqual(['TCS', 'INFY']);
  });

  it('mixes live and mock quotes in membership order', async () => {
    const broker = new FakeBroker({ INFY: { ltp: 1500.5, close: 1480.5, change: 20, changePercent: 1.35 } }, true);
    await broker.login();
    const { id } = await watchlists.createWatchlist({ name: 'Tech', symbols: ['TCS', 'INFY'] });

    const quotes = await new QuoteService(watchlists, broker).getQuotes(id);

    expect(quotes).toEqual([
      TCS_MOCK,
      { symbol: 'INFY', ltp: 1500.5, change: 20, changePercent: 1.35, volume: 0, sector: 'Live Data' },
    ]);
  });

  it('falls back to the mock pricer when the broker throws', async () => {
    const broker = new FakeBroker();
    broker.quote = async () => {
      throw new Error('socket hang up');
    };
    const { id } = await watchlists.createWatchlist({ name: 'Tech', symbols: ['TCS'] });

    await expect(new QuoteService(watchlists, broker).getQuotes(id)).resolves.toEqual([TCS_MOCK]);
  });

  it('returns an empty list for an empty watchlist', async () => {
    const { id } = await watchlists.createWatchlist({ name: 'Empty' });

    await expect(new QuoteService(watchlists, new FakeBroker()).getQuotes(id)).resolves.toEqual([]);
  });

  it('rejects an unknown watchlist', async () => {
    await expect(new QuoteService(watchlists, new FakeBroker()).getQuotes(999)).rejects.toBeInstanceOf(
      WatchlistNotFoundError
    );
  });

  it('never changes stored memberships', async () => {
    const { id } = await watchlists.createWatchlist({ name: 'Tech', symbols: ['TCS', 'INFY'] });
    const service = new QuoteService(watchlists, new FakeBroker());

    await service.getQuotes(id);
    await service.getQuotes(id);

    await expect(watchlists.listSymbols(id)).resolves.toEqual(['TCS', 'INFY']);
  });
});
