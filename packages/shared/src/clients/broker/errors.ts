import { HttpRequestError } from '../base/http-client';

/** SmartAPI error codes for an expired or unknown session token */
const INVALID_TOKEN_CODES = new Set(['AG8001', 'AG8002']);
const INVALID_TOKEN_STATUSES = new Set([401, 403]);

/**
 * SmartAPI answered, but with `status: false`
 */
export class SmartApiError extends Error {
  constructor(
    message: string,
    readonly errorCode: string | null
  ) {
    super(message);
    this.name = 'SmartApiError';
  }
}

function readErrorCode(body: unknown): string | null {
  if (typeof body === 'object' && body !== null && 'errorcode' in body && typeof body.errorcode === 'string') {
    return body.errorcode;
  }
  return null;
}

/**
 * Whether the error means the session token is no longer accepted
 */
export function isInvalidTokenError(error: unknown): boolean {
  if (error instanceof SmartApiError) {
    return error.errorCode !== null && INVALID_TOKEN_CODES.has(error.errorCode);
  }
  if (error instanceof HttpRequestError && error.kind === 'http') {
    if (error.status !== undefined && INVALID_TOKEN_STATUSES.has(error.status)) {
      return true;
    }
    const code = readErrorCode(error.body);
    return code !== null && INVALID_TOKEN_CODES.has(code);
  }
  return false;
}
