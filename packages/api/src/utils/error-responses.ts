import type { z } from '@hono/zod-openapi';
import type { TypedResponse } from 'hono';
import type { ErrorResponseSchema } from '../schemas/common';

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

export const ERROR_STATUS_CODES = [400, 404, 409, 500] as const;
export type ErrorStatusCode = (typeof ERROR_STATUS_CODES)[number];

export type ErrorResponseResult<Code extends ErrorStatusCode = ErrorStatusCode> = Response &
  TypedResponse<ErrorResponse, Code, 'json'>;

export type ErrorType = 'Bad Request' | 'Not Found' | 'Conflict' | 'Internal Server Error';

export interface ErrorResponseParams {
  error: ErrorType;
  message: string;
  details?: Array<{ field: string; message: string }>;
  correlationId: string;
}

/**
 * Create a standardized error response
 * Ensures all errors include correlationId and follow unified format
 */
export function createErrorResponse(params: ErrorResponseParams): ErrorResponse {
  return {
    status: 'error',
    error: params.error,
    message: params.message,
    details: params.details,
    timestamp: new Date().toISOString(),
    correlationId: params.correlationId,
  };
}

export function isErrorStatusCode(statusCode: number): statusCode is ErrorStatusCode {
  return ERROR_STATUS_CODES.some((code) => code === statusCode);
}

export function statusToErrorType(statusCode: ErrorStatusCode): ErrorType {
  switch (statusCode) {
    case 400:
      return 'Bad Request';
    case 404:
      return 'Not Found';
    case 409:
      return 'Conflict';
    default:
      return 'Internal Server Error';
  }
}

/**
 * Narrow a status to one the route declares; undeclared statuses degrade to 500
 * (or the first declared code when 500 is not declared either).
 */
export function resolveAllowedStatus<Code extends ErrorStatusCode>(
  statusCode: ErrorStatusCode,
  allowedStatusCodes: readonly Code[]
): Code {
  const declared = allowedStatusCodes.find((code) => code === statusCode);
  if (declared !== undefined) {
    return declared;
  }
  const fallback = allowedStatusCodes.find((code) => code === 500) ?? allowedStatusCodes[0];
  if (fallback === undefined) {
    throw new Error('allowedStatusCodes must not be empty');
  }
  return fallback;
}
