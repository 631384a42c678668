import { z } from 'zod';

/**
 * SmartAPI wraps every payload in `{ status, message, errorcode, data }`.
 * On failure `status` is false and `data` is null.
 */
function smartApiEnvelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({
    status: z.boolean(),
    message: z.string().nullish(),
    errorcode: z.string().nullish(),
    data: data.nullish(),
  });
}

export const loginResponseSchema = smartApiEnvelope(
  z.object({
    jwtToken: z.string().min(1),
    refreshToken: z.string().optional(),
    feedToken: z.string().optional(),
  })
);

export const ltpResponseSchema = smartApiEnvelope(
  z.object({
    exchange: z.string(),
    tradingsymbol: z.string(),
    symboltoken: z.string(),
    open: z.number().optional(),
    high: z.number().optional(),
    low: z.number().optional(),
    close: z.number(),
    ltp: z.number(),
  })
);

export type LtpResponse = z.infer<typeof ltpResponseSchema>;
export type LtpData = NonNullable<LtpResponse['data']>;
