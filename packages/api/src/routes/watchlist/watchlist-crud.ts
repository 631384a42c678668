import { createRoute } from '@hono/zod-openapi';
import { getCorrelationId } from '../../middleware/correlation';
import { ErrorResponseSchema } from '../../schemas/common';
import {
  CreateWatchlistRequestSchema,
  CreateWatchlistResponseSchema,
  ListWatchlistsResponseSchema,
} from '../../schemas/watchlist';
import type { WatchlistService } from '../../services/watchlist-service';
import { createOpenAPIApp } from '../../utils';
import { handleWatchlistError, serializeWatchlistSummary } from './watchlist-helpers';

export function createWatchlistCrudRoutes(getWatchlistService: () => Promise<WatchlistService>) {
  const app = createOpenAPIApp();

  const listWatchlistsRoute = createRoute({
    method: 'get',
    path: '/api/watchlists',
    tags: ['Watchlists'],
    summary: 'List all watchlists',
    description: 'All watchlists ordered by id, each with its member count',
    responses: {
      200: {
        content: { 'application/json': { schema: ListWatchlistsResponseSchema } },
        description: 'Watchlists retrieved successfully',
      },
      500: {
        content: { 'application/json': { schema: ErrorResponseSchema } },
        description: 'Internal server error',
      },
    },
  });

  app.openapi(listWatchlistsRoute, async (c) => {
    const correlationId = getCorrelationId(c);
    try {
      const watchlistService = await getWatchlistService();
      const watchlists = await watchlistService.listWatchlists();
      return c.json({ watchlists: watchlists.map((w) => serializeWatchlistSummary(w)) }, 200);
    } catch (error) {
      return handleWatchlistError(c, error, correlationId, 'list watchlists', undefined, [500] as const);
    }
  });

  const createWatchlistRoute = createRoute({
    method: 'post',
    path: '/api/watchlists',
    tags: ['Watchlists'],
    summary: 'Create a new watchlist',
    description: 'Create a watchlist, optionally with initial symbols. All-or-nothing.',
    request: {
      body: { content: { 'application/json': { schema: CreateWatchlistRequestSchema } }, required: true },
    },
    responses: {
      201: {
        content: { 'application/json': { schema: CreateWatchlistResponseSchema } },
        description: 'Watchlist created successfully',
      },
      400: {
        content: { 'application/json': { schema: ErrorResponseSchema } },
        description: 'Invalid request parameters',
      },
      409: {
        content: { 'application/json': { schema: ErrorResponseSchema } },
        description: 'A symbol appears more than once in the request',
      },
      500: {
        content: { 'application/json': { schema: ErrorResponseSchema } },
        description: 'Internal server error',
      },
    },
  });

  app.openapi(createWatchlistRoute, async (c) => {
    const correlationId = getCorrelationId(c);
    const body = c.req.valid('json');

    try {
      const watchlistService = await getWatchlistService();
      const watchlist = await watchlistService.createWatchlist(body);
      return c.json({ id: watchlist.id, message: `Watchlist '${watchlist.name}' created` }, 201);
    } catch (error) {
      return handleWatchlistError(c, error, correlationId, 'create watchlist', { name: body.name }, [
        400, 409, 500,
      ] as const);
    }
  });

  return app;
}
