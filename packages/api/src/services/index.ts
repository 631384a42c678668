import { type BrokerClient, SmartApiClient } from '@market-terminal/shared/broker';
import type { AppConfig } from '@market-terminal/shared/config';
import { createManagedService, registerServiceForCleanup } from '../utils';
import { QuoteService } from './quote-service';
import { WatchlistService } from './watchlist-service';

/**
 * Lazy service accessors handed to the route factories
 */
export interface ApiServices {
  getWatchlistService: () => Promise<WatchlistService>;
  getQuoteService: () => Promise<QuoteService>;
  getBrokerClient: () => BrokerClient;
}

/**
 * Wire the production services. The store is opened and seeded on first use;
 * on shutdown it is closed and the broker session logged out.
 */
export function createApiServices(config: AppConfig, broker?: BrokerClient): ApiServices {
  const brokerClient =
    broker ??
    new SmartApiClient({
      baseUrl: config.broker.baseUrl,
      timeoutMs: config.broker.timeoutMs,
      credentials: config.broker.credentials,
    });
  registerServiceForCleanup('BrokerClient', { close: () => brokerClient.logout() });

  const getWatchlistService = createManagedService('WatchlistService', {
    factory: () => WatchlistService.open(config.database.path),
    setup: async (service) => {
      await service.seedDefaults();
    },
  });

  let quoteService: Promise<QuoteService> | null = null;

  return {
    getWatchlistService,
    getQuoteService: () => {
      if (!quoteService) {
        quoteService = getWatchlistService().then((watchlists) => new QuoteService(watchlists, brokerClient));
      }
      return quoteService;
    },
    getBrokerClient: () => brokerClient,
  };
}

export { getBrokerStatus, type BrokerStatus } from './broker-status';
export { QuoteService } from './quote-service';
export { WatchlistService } from './watchlist-service';
