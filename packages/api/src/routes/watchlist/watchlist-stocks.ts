import { createRoute } from '@hono/zod-openapi';
import { normalizeSymbol } from '@market-terminal/shared/watchlist';
import { getCorrelationId } from '../../middleware/correlation';
import { ErrorResponseSchema, MessageResponseSchema } from '../../schemas/common';
import { AddStockRequestSchema, WatchlistIdParamSchema, WatchlistStockParamSchema } from '../../schemas/watchlist';
import type { WatchlistService } from '../../services/watchlist-service';
import { createOpenAPIApp, safeParseId } from '../../utils';
import { handleWatchlistError } from './watchlist-helpers';

export function createWatchlistStockRoutes(getWatchlistService: () => Promise<WatchlistService>) {
  const app = createOpenAPIApp();

  const addStockRoute = createRoute({
    method: 'post',
    path: '/api/watchlists/{id}/add-stock',
    tags: ['Watchlists'],
    summary: 'Add stock to watchlist',
    description: 'Add one symbol to a watchlist. The symbol is stored upper-cased.',
    request: {
      params: WatchlistIdParamSchema,
      body: { content: { 'application/json': { schema: AddStockRequestSchema } }, required: true },
    },
    responses: {
      200: {
        content: { 'application/json': { schema: MessageResponseSchema } },
        description: 'Stock added successfully',
      },
      400: {
        content: { 'application/json': { schema: ErrorResponseSchema } },
        description: 'Invalid request parameters',
      },
      404: {
        content: { 'application/json': { schema: ErrorResponseSchema } },
        description: 'Watchlist not found',
      },
      409: {
        content: { 'application/json': { schema: ErrorResponseSchema } },
        description: 'Stock already in watchlist',
      },
      500: {
        content: { 'application/json': { schema: ErrorResponseSchema } },
        description: 'Internal server error',
      },
    },
  });

  app.openapi(addStockRoute, async (c) => {
    const correlationId = getCorrelationId(c);
    const { id } = c.req.valid('param');
    const { symbol } = c.req.valid('json');

    try {
      const watchlistId = safeParseId(id, 'watchlistId');
      const watchlistService = await getWatchlistService();
      const stock = await watchlistService.addStock(watchlistId, symbol);
      return c.json({ message: `Stock ${stock.symbol} added to watchlist` }, 200);
    } catch (error) {
      return handleWatchlistError(c, error, correlationId, 'add stock to watchlist', { id, symbol }, [
        400, 404, 409, 500,
      ] as const);
    }
  });

  const removeStockRoute = createRoute({
    method: 'delete',
    path: '/api/watchlists/{id}/stocks/{symbol}',
    tags: ['Watchlists'],
    summary: 'Remove stock from watchlist',
    description: 'Remove a symbol from a watchlist. Removing a symbol that is not a member succeeds.',
    request: {
      params: WatchlistStockParamSchema,
    },
    responses: {
      200: {
        content: { 'application/json': { schema: MessageResponseSchema } },
        description: 'Stock removed (or was not a member)',
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

  app.openapi(removeStockRoute, async (c) => {
    const correlationId = getCorrelationId(c);
    const { id, symbol: rawSymbol } = c.req.valid('param');

    try {
      const watchlistId = safeParseId(id, 'watchlistId');
      const symbol = normalizeSymbol(rawSymbol);
      const watchlistService = await getWatchlistService();
      await watchlistService.removeStock(watchlistId, symbol);
      return c.json({ message: `Stock ${symbol} removed from watchlist` }, 200);
    } catch (error) {
      return handleWatchlistError(c, error, correlationId, 'remove stock from watchlist', { id, rawSymbol }, [
        400, 404, 500,
      ] as const);
    }
  });

  return app;
}
