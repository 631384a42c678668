import { getErrorMessage, getErrorStack, isMarketTerminalError } from '@market-terminal/shared';
import { logger } from '@market-terminal/shared/utils/logger';
import type { ErrorHandler, MiddlewareHandler, NotFoundHandler } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { createErrorResponse, isErrorStatusCode, statusToErrorType } from '../utils/error-responses';
import { correlationMiddleware, getCorrelationId } from './correlation';

/**
 * One access log line per request: `METHOD path status elapsed`
 */
export const httpLogger = (): MiddlewareHandler => {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;

    await next();

    const status = c.res.status;
    const elapsed = Date.now() - start;
    const context = { correlationId: getCorrelationId(c), method, path, status, elapsed };
    const line = `${method} ${path} ${status} ${elapsed}ms`;

    if (status >= 500) {
      logger.error(line, context);
    } else {
      logger.info(line, context);
    }
  };
};

export const requestLogger = (): MiddlewareHandler[] => {
  return [correlationMiddleware, httpLogger()];
};

/**
 * Last-resort handler for errors thrown out of route handlers.
 * Domain errors keep their status; anything else is a 500.
 */
export const errorHandler: ErrorHandler = (error, c) => {
  const correlationId = getCorrelationId(c);

  if (isMarketTerminalError(error)) {
    const status = isErrorStatusCode(error.httpStatus) ? error.httpStatus : 500;
    logger.warn('Request error', {
      correlationId,
      errorCode: error.code,
      httpStatus: status,
      message: error.message,
    });

    return c.json(
      createErrorResponse({
        error: statusToErrorType(status),
        message: error.message,
        correlationId,
      }),
      status
    );
  }

  // Raised by Hono itself, e.g. a request body that is not valid JSON
  if (error instanceof HTTPException) {
    if (!isErrorStatusCode(error.status)) {
      return error.getResponse();
    }
    logger.warn('Request rejected', { correlationId, httpStatus: error.status, message: error.message });
    return c.json(
      createErrorResponse({
        error: statusToErrorType(error.status),
        message: error.message,
        correlationId,
      }),
      error.status
    );
  }

  logger.error('Unhandled error', {
    correlationId,
    error: getErrorMessage(error),
    stack: getErrorStack(error),
  });

  return c.json(
    createErrorResponse({
      error: 'Internal Server Error',
      message: getErrorMessage(error),
      correlationId,
    }),
    500
  );
};

export const notFoundHandler: NotFoundHandler = (c) => {
  return c.json(
    createErrorResponse({
      error: 'Not Found',
      message: `Route ${c.req.method} ${c.req.path} not found`,
      correlationId: getCorrelationId(c),
    }),
    404
  );
};
