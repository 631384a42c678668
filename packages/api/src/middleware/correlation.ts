import { logger } from '@market-terminal/shared/utils/logger';
import type { Context, Next } from 'hono';

export const CORRELATION_ID_HEADER = 'x-correlation-id';

declare module 'hono' {
  interface ContextVariableMap {
    correlationId: string;
  }
}

/**
 * The id lives on the request context only; log calls pass it explicitly
 * as `{ correlationId: getCorrelationId(c) }`.
 */
export const correlationMiddleware = async (c: Context, next: Next) => {
  const correlationId = c.req.header(CORRELATION_ID_HEADER) || logger.createCorrelationId();

  c.set('correlationId', correlationId);
  c.header(CORRELATION_ID_HEADER, correlationId);

  await next();
};

/**
 * Correlation id of the current request; falls back to the header, then a fresh id,
 * for handlers running outside `correlationMiddleware`.
 */
export function getCorrelationId(c: Context): string {
  return c.get('correlationId') || c.req.header(CORRELATION_ID_HEADER) || logger.createCorrelationId();
}
