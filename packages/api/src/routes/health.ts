import { createRoute } from '@hono/zod-openapi';
import type { BrokerClient } from '@market-terminal/shared/broker';
import { HealthResponseSchema } from '../schemas/health';
import { getBrokerStatus } from '../services/broker-status';
import { createOpenAPIApp } from '../utils';

export function createHealthRoutes(getBrokerClient: () => BrokerClient) {
  const healthApp = createOpenAPIApp();

  const healthRoute = createRoute({
    method: 'get',
    path: '/health',
    tags: ['Health'],
    summary: 'Health check',
    description: 'Check that the API is responsive and whether quotes are live',
    responses: {
      200: {
        content: {
          'application/json': {
            schema: HealthResponseSchema,
          },
        },
        description: 'Service is healthy',
      },
    },
  });

  healthApp.openapi(healthRoute, (c) => {
    return c.json(
      {
        status: 'healthy' as const,
        timestamp: new Date().toISOString(),
        broker_status: getBrokerStatus(getBrokerClient()),
      },
      200
    );
  });

  return healthApp;
}
