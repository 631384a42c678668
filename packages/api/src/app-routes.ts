import type { OpenAPIHono } from '@hono/zod-openapi';
import { createBrokerRoutes } from './routes/broker/login';
import { createHealthRoutes } from './routes/health';
import marketIndicesApp from './routes/market/indices';
import { createWatchlistApp } from './routes/watchlist';
import type { ApiServices } from './services';

/**
 * Mount all API routes onto the given Hono app.
 * Used by both the server (index.ts) and tests.
 */
export function mountAllRoutes(app: OpenAPIHono, services: ApiServices): void {
  app.route('/', createHealthRoutes(services.getBrokerClient));

  // Watchlist management and enrichment
  app.route('/', createWatchlistApp(services.getWatchlistService, services.getQuoteService));

  // Market overview
  app.route('/', marketIndicesApp);

  // Broker session
  app.route('/', createBrokerRoutes(services.getBrokerClient));
}
