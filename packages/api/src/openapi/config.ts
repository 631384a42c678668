/**
 * OpenAPI configuration for the Market Terminal API
 */

import { DEFAULT_PORT } from '@market-terminal/shared/config';

export const API_VERSION = '1.0.0';

/**
 * Scalar configuration for API documentation UI
 */
export const scalarConfig = {
  spec: {
    url: '/openapi.json',
  },
  theme: 'default' as const,
  layout: 'modern' as const,
  defaultHttpClient: {
    targetKey: 'js' as const,
    clientKey: 'fetch' as const,
  },
};

/**
 * OpenAPI document configuration
 */
export const openapiConfig = {
  openapi: '3.1.0' as const,
  info: {
    title: 'Market Terminal API',
    version: API_VERSION,
    description: `# Market Terminal API

Watchlists of NSE symbols with last traded prices.

Prices come from an Angel One SmartAPI session when one is available and from a
deterministic mock pricer otherwise. \`GET /health\` reports which mode is active.`,
    license: {
      name: 'MIT',
      url: 'https://opensource.org/licenses/MIT',
    },
  },
  servers: [
    {
      url: `http://localhost:${DEFAULT_PORT}`,
      description: 'Development server',
    },
  ],
  tags: [
    {
      name: 'Health',
      description: 'Service liveness and quote source',
    },
    {
      name: 'Watchlists',
      description: 'Create watchlists, manage their symbols and read enriched quotes',
    },
    {
      name: 'Market',
      description: 'Headline market indices',
    },
    {
      name: 'Broker',
      description: 'Broker session management',
    },
  ],
};
