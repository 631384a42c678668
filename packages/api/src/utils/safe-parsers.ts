/**
 * Safe Parser Utilities
 *
 * Parse user input or throw a BadRequestError; never return NaN.
 */

import { BadRequestError } from '@market-terminal/shared';

/**
 * Safely parse a string to a positive integer.
 *
 * @example
 * ```typescript
 * const watchlistId = safeParseId(c.req.param('id'), 'watchlistId');
 * ```
 */
export function safeParseId(value: string, fieldName: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new BadRequestError(`Invalid ${fieldName}: must be a positive integer`);
  }
  return parsed;
}
