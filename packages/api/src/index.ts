import 'dotenv/config';

import { serve } from '@hono/node-server';
import { getErrorMessage } from '@market-terminal/shared';
import { getConfig } from '@market-terminal/shared/config';
import { logger } from '@market-terminal/shared/utils/logger';
import { createApp } from './app';
import { createApiServices, getBrokerStatus } from './services';

async function startServer(): Promise<void> {
  const config = getConfig();
  const services = createApiServices(config);

  // Open and seed the store before accepting requests
  await services.getWatchlistService();

  const broker = services.getBrokerClient();
  await broker.login();
  logger.info('Quote source selected', { brokerStatus: getBrokerStatus(broker) });

  const app = createApp(services, {
    corsOrigin: config.server.corsOrigin,
    staticDir: config.server.staticDir,
  });

  serve({ fetch: app.fetch, port: config.server.port, hostname: '0.0.0.0' }, (info) => {
    logger.info(`Backend server running at http://localhost:${info.port}`);
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error: getErrorMessage(error) });
  process.exit(1);
});
