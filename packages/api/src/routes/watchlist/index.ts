import type { QuoteService } from '../../services/quote-service';
import type { WatchlistService } from '../../services/watchlist-service';
import { createOpenAPIApp } from '../../utils';
import { createWatchlistCrudRoutes } from './watchlist-crud';
import { createWatchlistQuoteRoutes } from './watchlist-quotes';
import { createWatchlistStockRoutes } from './watchlist-stocks';

export function createWatchlistApp(getWatchlistService: () => Promise<WatchlistService>, getQuoteService: () => Promise<QuoteService>) {
  const watchlistApp = createOpenAPIApp();

  watchlistApp.route('/', createWatchlistCrudRoutes(getWatchlistService));
  watchlistApp.route('/', createWatchlistStockRoutes(getWatchlistService));
  watchlistApp.route('/', createWatchlistQuoteRoutes(getQuoteService));

  return watchlistApp;
}
