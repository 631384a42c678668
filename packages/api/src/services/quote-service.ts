import { getErrorMessage } from '@market-terminal/shared';
import type { BrokerClient, LiveQuote } from '@market-terminal/shared/broker';
import { LIVE_DATA_SECTOR, mockQuote, type Quote } from '@market-terminal/shared/quotes';
import { logger } from '@market-terminal/shared/utils/logger';
import type { WatchlistService } from './watchlist-service';

export function fromLiveQuote(live: LiveQuote): Quote {
  return {
    symbol: live.symbol,
    ltp: live.ltp,
    change: live.change,
    changePercent: live.changePercent,
    volume: 0,
    sector: LIVE_DATA_SECTOR,
  };
}

/**
 * Enriches watchlist symbols with prices. Live broker quotes where available,
 * the deterministic mock pricer for everything else. Read-only.
 */
export class QuoteService {
  constructor(
    private readonly watchlistService: WatchlistService,
    private readonly broker: BrokerClient
  ) {}

  /**
   * One quote per member symbol, in membership order.
   * Throws WatchlistNotFoundError for an unknown watchlist; broker failures never surface.
   */
  async getQuotes(watchlistId: number): Promise<Quote[]> {
    const symbols = await this.watchlistService.listSymbols(watchlistId);
    const quotes: Quote[] = [];

    // Sequential: one broker session, one request at a time
    for (const symbol of symbols) {
      quotes.push(await this.quoteSymbol(symbol));
    }

    logger.debug('Quotes resolved', {
      watchlistId,
      count: quotes.length,
      live: quotes.filter((quote) => quote.sector === LIVE_DATA_SECTOR).length,
    });
    return quotes;
  }

  async quoteSymbol(symbol: string): Promise<Quote> {
    try {
      const live = await this.broker.quote(symbol);
      if (live) {
        return fromLiveQuote({ ...live, symbol });
      }
    } catch (error) {
      logger.warn('Broker quote threw, using mock price', { symbol, error: getErrorMessage(error) });
    }
    return mockQuote(symbol);
  }
}
