import { z } from 'zod';

/**
 * FTX Response Schemas
 *
 * Records only declare the fields the client reads; everything else is kept as received
 */

export const ftxEnvelopeSchema = z.object({
  success: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().nullable().optional(),
});

export const ftxFutureSchema = z
  .object({
    name: z.string(),
    underlying: z.string(),
    type: z.string(),
    enabled: z.boolean(),
    expired: z.boolean(),
    // ISO-8601 on the live API, null for perpetuals
    expiry: z.union([z.string(), z.number()]).nullable().optional(),
  })
  .passthrough();

// Single market lookups read the price
export const ftxMarketSchema = z
  .object({
    name: z.string(),
    price: z.number().nullable(),
  })
  .passthrough();

// Market lists and orders are returned untouched; only the container is checked
export const ftxRecordSchema = z.object({}).passthrough();

export const ftxFutureListSchema = z.array(ftxFutureSchema);
export const ftxRecordListSchema = z.array(ftxRecordSchema);
