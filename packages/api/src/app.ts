import { OpenAPIHono } from '@hono/zod-openapi';
import { serveStatic } from '@hono/node-server/serve-static';
import { logger } from '@market-terminal/shared/utils/logger';
import { apiReference } from '@scalar/hono-api-reference';
import { cors } from 'hono/cors';
import { mountAllRoutes } from './app-routes';
import { CORRELATION_ID_HEADER } from './middleware/correlation';
import { errorHandler, notFoundHandler, requestLogger } from './middleware/http-logger';
import { openapiConfig, scalarConfig } from './openapi/config';
import type { ApiServices } from './services';
import { validationHook } from './utils';

export interface AppOptions {
  corsOrigin: string;
  /** Directory served at `/` after the API routes, e.g. the terminal front end */
  staticDir?: string;
}

export function createApp(services: ApiServices, options: AppOptions): OpenAPIHono {
  const app = new OpenAPIHono({ defaultHook: validationHook });

  app.use('*', ...requestLogger());

  app.use(
    '/*',
    cors({
      origin: options.corsOrigin,
      allowHeaders: ['Content-Type', 'Authorization', CORRELATION_ID_HEADER],
      allowMethods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      exposeHeaders: [CORRELATION_ID_HEADER],
    })
  );

  mountAllRoutes(app, services);

  app.doc31('/openapi.json', openapiConfig);
  app.get('/doc', apiReference(scalarConfig));

  if (options.staticDir) {
    app.use('/*', serveStatic({ root: options.staticDir }));
    logger.info('Serving static files', { staticDir: options.staticDir });
  }

  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return app;
}
