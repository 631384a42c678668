import { z } from '@hono/zod-openapi';

export const MarketIndexSchema = z
  .object({
    name: z.string(),
    value: z.number(),
    change: z.number(),
    changePercent: z.number(),
  })
  .openapi('MarketIndex');

export const MarketIndicesResponseSchema = z
  .object({
    indices: z.array(MarketIndexSchema),
  })
  .openapi('MarketIndicesResponse');
