import { z } from '@hono/zod-openapi';
import { BrokerStatusSchema } from './common';

export const HealthResponseSchema = z
  .object({
    status: z.literal('healthy'),
    timestamp: z.string().datetime(),
    broker_status: BrokerStatusSchema,
  })
  .openapi('HealthResponse', {
    description: 'Health check response indicating service is operational',
  });

export const BrokerLoginResponseSchema = z
  .object({
    broker_status: BrokerStatusSchema,
  })
  .openapi('BrokerLoginResponse');
