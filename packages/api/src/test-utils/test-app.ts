import type { OpenAPIHono } from '@hono/zod-openapi';
import { createApp } from '../app';
import type { ApiServices } from '../services';
import { QuoteService } from '../services/quote-service';
import { WatchlistService } from '../services/watchlist-service';
import { FakeBroker } from './fake-broker';
import { createTempDbPath } from './temp-db';

export interface TestApp {
  app: OpenAPIHono;
  broker: FakeBroker;
  watchlistService: WatchlistService;
  cleanup: () => Promise<void>;
}

/**
 * Full API app over a seeded temp store and an in-memory broker
 */
export async function createTestApp(broker: FakeBroker = new FakeBroker()): Promise<TestApp> {
  const tempDb = createTempDbPath();
  const watchlistService = await WatchlistService.open(tempDb.path);
  await watchlistService.seedDefaults();
  const quoteService = new QuoteService(watchlistService, broker);

  const services: ApiServices = {
    getWatchlistService: async () => watchlistService,
    getQuoteService: async () => quoteService,
    getBrokerClient: () => broker,
  };

  return {
    app: createApp(services, { corsOrigin: '*' }),
    broker,
    watchlistService,
    cleanup: async () => {
      await watchlistService.close();
      tempDb.cleanup();
    },
  };
}

export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}
