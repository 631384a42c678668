/**
 * Error hierarchy for the market terminal.
 *
 * Every domain error carries a machine-readable code and the HTTP status
 * the API layer should answer with.
 */

/**
 * Abstract base class for all market terminal errors.
 */
export abstract class MarketTerminalError extends Error {
  /** Error code for programmatic error handling */
  abstract readonly code: string;
  /** HTTP status code for API responses */
  abstract readonly httpStatus: number;

  constructor(
    message: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * 400 Bad Request - Invalid input or request format
 */
export class BadRequestError extends MarketTerminalError {
  readonly code: string = 'BAD_REQUEST';
  readonly httpStatus: number = 400;
}

/**
 * 404 Not Found - Requested resource does not exist
 */
export class NotFoundError extends MarketTerminalError {
  readonly code: string = 'NOT_FOUND';
  readonly httpStatus: number = 404;
}

/**
 * 409 Conflict - Resource already exists
 */
export class ConflictError extends MarketTerminalError {
  readonly code: string = 'CONFLICT';
  readonly httpStatus: number = 409;
}

export function isMarketTerminalError(error: unknown): error is MarketTerminalError {
  return error instanceof MarketTerminalError;
}
