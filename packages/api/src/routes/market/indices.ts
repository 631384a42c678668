import { createRoute } from '@hono/zod-openapi';
import { getMarketIndices } from '@market-terminal/shared/market';
import { MarketIndicesResponseSchema } from '../../schemas/market';
import { createOpenAPIApp } from '../../utils';

const marketIndicesApp = createOpenAPIApp();

const getIndicesRoute = createRoute({
  method: 'get',
  path: '/api/market/indices',
  tags: ['Market'],
  summary: 'Headline market indices',
  description: 'NIFTY 50, SENSEX and BANK NIFTY snapshot values',
  responses: {
    200: {
      content: { 'application/json': { schema: MarketIndicesResponseSchema } },
      description: 'Indices retrieved successfully',
    },
  },
});

marketIndicesApp.openapi(getIndicesRoute, (c) => {
  return c.json({ indices: getMarketIndices() }, 200);
});

export default marketIndicesApp;
