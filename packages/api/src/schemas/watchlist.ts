import { z } from '@hono/zod-openapi';

/**
 * Watchlist ID parameter schema
 */
export const WatchlistIdParamSchema = z
  .object({
    id: z
      .string()
      .regex(/^\d+$/, 'Watchlist ID must be a positive integer')
      .openapi({
        example: '1',
        description: 'Watchlist ID',
        param: {
          name: 'id',
          in: 'path',
        },
      }),
  })
  .openapi('WatchlistIdParam');

export const WatchlistStockParamSchema = z
  .object({
    id: z
      .string()
      .regex(/^\d+$/, 'Watchlist ID must be a positive integer')
      .openapi({
        example: '1',
        description: 'Watchlist ID',
        param: {
          name: 'id',
          in: 'path',
        },
      }),
    symbol: z
      .string()
      .min(1)
      .openapi({
        example: 'TCS',
        description: 'Ticker symbol (case-insensitive)',
        param: {
          name: 'symbol',
          in: 'path',
        },
      }),
  })
  .openapi('WatchlistStockParam');

const SymbolSchema = z.string().trim().min(1, 'Symbol is required').max(32, 'Symbol is too long');

/**
 * Create Watchlist request schema
 */
export const CreateWatchlistRequestSchema = z
  .object({
    name: z.string().trim().min(1, 'Watchlist name is required').max(100).openapi({
      example: 'Tech',
      description: 'Watchlist name (not required to be unique)',
    }),
    symbols: z
      .array(SymbolSchema)
      .default([])
      .openapi({
        example: ['TCS', 'INFY'],
        description: 'Initial symbols, stored upper-cased in the given order',
      }),
  })
  .openapi('CreateWatchlistRequest');

export const AddStockRequestSchema = z
  .object({
    symbol: SymbolSchema.openapi({ example: 'WIPRO', description: 'Ticker symbol (case-insensitive)' }),
  })
  .openapi('AddStockRequest');

export const WatchlistSummarySchema = z
  .object({
    id: z.number().int(),
    name: z.string(),
    stock_count: z.number().int().nonnegative(),
  })
  .openapi('WatchlistSummary');

export const ListWatchlistsResponseSchema = z
  .object({
    watchlists: z.array(WatchlistSummarySchema),
  })
  .openapi('ListWatchlistsResponse');

export const CreateWatchlistResponseSchema = z
  .object({
    id: z.number().int(),
    message: z.string().openapi({ example: "Watchlist 'Tech' created" }),
  })
  .openapi('CreateWatchlistResponse');

export const QuoteSchema = z
  .object({
    symbol: z.string(),
    ltp: z.number().openapi({ description: 'Last traded price' }),
    change: z.number(),
    changePercent: z.number(),
    volume: z.number().int().openapi({ description: '0 for live quotes' }),
    sector: z.string().openapi({ description: '"Live Data" for live quotes' }),
  })
  .openapi('Quote');

export const WatchlistStocksResponseSchema = z
  .object({
    stocks: z.array(QuoteSchema),
  })
  .openapi('WatchlistStocksResponse');
