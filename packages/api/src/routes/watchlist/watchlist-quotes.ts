import { createRoute } from '@hono/zod-openapi';
import { getCorrelationId } from '../../middleware/correlation';
import { ErrorResponseSchema } from '../../schemas/common';
import { WatchlistIdParamSchema, WatchlistStocksResponseSchema } from '../../schemas/watchlist';
import type { QuoteService } from '../../services/quote-service';
import { createOpenAPIApp, safeParseId } from '../../utils';
import { handleWatchlistError } from './watchlist-helpers';

export function createWatchlistQuoteRoutes(getQuoteService: () => Promise<QuoteService>) {
  const app = createOpenAPIApp();

  const getStocksRoute = createRoute({
    method: 'get',
    path: '/api/watchlists/{id}/stocks',
    tags: ['Watchlists'],
    summary: 'Get watchlist quotes',
    description:
      'One quote per member symbol in insertion order. Live broker prices where available, mock prices otherwise.',
    request: {
      params: WatchlistIdParamSchema,
    },
    responses: {
      200: {
        content: { 'application/json': { schema: WatchlistStocksResponseSchema } },
        description: 'Quotes retrieved successfully',
      },
      400: {
        content: { 'application/json': { schema: ErrorResponseSchema } },
        description: 'Invalid request parameters',
      },
      404: {
        content: { 'application/json': { schema: ErrorResponseSchema } },
        description: 'Watchlist not found',
      },
      500: {
        content: { 'application/json': { schema: ErrorResponseSchema } },
        description: 'Internal server error',
      },
    },
  });

  app.openapi(getStocksRoute, async (c) => {
    const correlationId = getCorrelationId(c);
    const { id } = c.req.valid('param');

    try {
      const watchlistId = safeParseId(id, 'watchlistId');
      const quoteService = await getQuoteService();
      const stocks = await quoteService.getQuotes(watchlistId);
      return c.json({ stocks }, 200);
    } catch (error) {
      return handleWatchlistError(c, error, correlationId, 'get watchlist quotes', { id }, [400, 404, 500] as const);
    }
  });

  return app;
}
