import { z } from '@hono/zod-openapi';

/**
 * Unified error response schema
 * All error responses follow this structure with correlationId always included
 */
export const ErrorResponseSchema = z
  .object({
    status: z.literal('error'),
    error: z.enum(['Bad Request', 'Not Found', 'Conflict', 'Internal Server Error']),
    message: z.string(),
    details: z
      .array(
        z.object({
          field: z.string(),
          message: z.string(),
        })
      )
      .optional(),
    timestamp: z.string().datetime(),
    correlationId: z.string(),
  })
  .openapi('ErrorResponse', {
    description: 'Standard error response with correlation tracking',
  });

/**
 * Plain confirmation message
 */
export const MessageResponseSchema = z
  .object({
    message: z.string().openapi({ example: 'Stock TCS added to watchlist' }),
  })
  .openapi('MessageResponse');

export const BrokerStatusSchema = z.enum(['Connected', 'Mock Data']).openapi({
  description: 'Whether quotes come from a live broker session or the mock pricer',
  example: 'Mock Data',
});
