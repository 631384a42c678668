import type { Hook } from '@hono/zod-openapi';
import { OpenAPIHono } from '@hono/zod-openapi';
import { logger } from '@market-terminal/shared/utils/logger';
import { CORRELATION_ID_HEADER } from '../middleware/correlation';
import { createErrorResponse } from './error-responses';

/**
 * Shared validation error hook for OpenAPI routes
 *
 * Turns Zod validation failures into the unified 400 error body, with one
 * `details` entry per issue.
 */
// Hook's generics vary per route schema; only the failure branch is read here.
export const validationHook: Hook<any, any, any, any> = (result, c) => {
  if (!result.success) {
    const correlationId = c.get('correlationId') || c.req.header(CORRELATION_ID_HEADER) || logger.createCorrelationId();

    return c.json(
      createErrorResponse({
        error: 'Bad Request',
        message: 'Request validation failed',
        details: result.error.issues.map((issue) => ({
          field: issue.path.join('.'),
          message: issue.message,
        })),
        correlationId,
      }),
      400
    );
  }
};

/**
 * Create a new OpenAPIHono instance with the shared validation hook pre-configured
 */
export function createOpenAPIApp(): OpenAPIHono {
  return new OpenAPIHono({
    defaultHook: validationHook,
  });
}
