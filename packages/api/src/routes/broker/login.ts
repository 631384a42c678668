import { createRoute } from '@hono/zod-openapi';
import type { BrokerClient } from '@market-terminal/shared/broker';
import { BrokerLoginResponseSchema } from '../../schemas/health';
import { getBrokerStatus } from '../../services/broker-status';
import { createOpenAPIApp } from '../../utils';

export function createBrokerRoutes(getBrokerClient: () => BrokerClient) {
  const app = createOpenAPIApp();

  const loginRoute = createRoute({
    method: 'post',
    path: '/api/broker/login',
    tags: ['Broker'],
    summary: 'Log in to the broker',
    description:
      'Attempt a fresh broker session with the configured credentials. A failed login leaves the terminal on mock data.',
    responses: {
      200: {
        content: { 'application/json': { schema: BrokerLoginResponseSchema } },
        description: 'Broker status after the attempt',
      },
    },
  });

  app.openapi(loginRoute, async (c) => {
    const broker = getBrokerClient();
    await broker.login();
    return c.json({ broker_status: getBrokerStatus(broker) }, 200);
  });

  return app;
}
