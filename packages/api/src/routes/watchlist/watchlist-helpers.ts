import { BadRequestError } from '@market-terminal/shared';
import {
  DuplicateWatchlistStockError,
  WatchlistNotFoundError,
  type WatchlistSummary,
  type WatchlistSummaryResponse,
} from '@market-terminal/shared/watchlist';
import type { Context } from 'hono';
import { type ErrorResponseResult, type ErrorStatusCode, handleDomainError, type KnownErrorConfig } from '../../utils';

/**
 * Classify a watchlist error into an HTTP error type and status code.
 * Returns null for unknown errors (which fall through to 500).
 */
function classifyWatchlistError(error: unknown): KnownErrorConfig | null {
  if (error instanceof WatchlistNotFoundError) {
    return { type: 'Not Found', status: 404 };
  }

  // includes InvalidSymbolError and malformed ids
  if (error instanceof BadRequestError) {
    return { type: 'Bad Request', status: 400 };
  }

  if (error instanceof DuplicateWatchlistStockError) {
    return { type: 'Conflict', status: 409 };
  }

  return null;
}

export function handleWatchlistError<Code extends ErrorStatusCode>(
  c: Context,
  error: unknown,
  correlationId: string,
  operationName: string,
  logContext: Record<string, unknown> | undefined,
  allowedStatusCodes: readonly Code[]
): ErrorResponseResult<Code> {
  return handleDomainError(
    c,
    error,
    correlationId,
    operationName,
    classifyWatchlistError,
    logContext,
    allowedStatusCodes
  );
}

export function serializeWatchlistSummary(summary: WatchlistSummary): WatchlistSummaryResponse {
  return {
    id: summary.id,
    name: summary.name,
    stock_count: summary.stockCount,
  };
}
