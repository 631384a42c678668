import { getErrorMessage, getErrorStack } from '@market-terminal/shared';
import { logger } from '@market-terminal/shared/utils/logger';
import type { Context } from 'hono';
import {
  createErrorResponse,
  type ErrorResponseResult,
  type ErrorStatusCode,
  type ErrorType,
  resolveAllowedStatus,
} from './error-responses';

/**
 * Known error classification result from domain-specific error detection
 */
export interface KnownErrorConfig {
  type: ErrorType;
  status: ErrorStatusCode;
}

/**
 * Handle domain-specific route errors with standardized response
 *
 * Known domain errors (per `classifyError`) are answered with their mapped
 * status and logged at warn; anything else is logged at error and becomes 500.
 * `allowedStatusCodes` narrows the response type to what the route declares.
 */
export function handleDomainError<Code extends ErrorStatusCode>(
  c: Context,
  error: unknown,
  correlationId: string,
  operationName: string,
  classifyError: (error: unknown) => KnownErrorConfig | null,
  logContext: Record<string, unknown> | undefined,
  allowedStatusCodes: readonly Code[]
): ErrorResponseResult<Code> {
  const errorMessage = getErrorMessage(error);
  const errorConfig = classifyError(error);

  if (errorConfig) {
    logger.warn(`${operationName} failed`, {
      correlationId,
      statusCode: errorConfig.status,
      error: errorMessage,
      ...logContext,
    });

    const statusCode = resolveAllowedStatus(errorConfig.status, allowedStatusCodes);
    return c.json(
      createErrorResponse({
        error: errorConfig.type,
        message: errorMessage,
        correlationId,
      }),
      statusCode
    ) as ErrorResponseResult<Code>;
  }

  logger.error(`Failed to ${operationName}`, {
    correlationId,
    error: errorMessage,
    stack: getErrorStack(error),
    ...logContext,
  });

  const statusCode = resolveAllowedStatus(500, allowedStatusCodes);
  return c.json(
    createErrorResponse({
      error: 'Internal Server Error',
      message: errorMessage,
      correlationId,
    }),
    statusCode
  ) as ErrorResponseResult<Code>;
}
