/**
 * Order book depth schemas.
 */

import { z } from "zod";

export const priceLevelSchema = z.object({
  price: z.number(),
  size: z.number(),
});

export type PriceLevel = z.infer<typeof priceLevelSchema>;

/**
 * Depth snapshot; also the payload of `depth:<market>:<aggregation>`.
 */
export const marketDepthSchema = z
  .object({
    market: z.string(),
    bids: z.array(priceLevelSchema),
    asks: z.array(priceLevelSchema),
    unix_ms: z.number().int(),
  })
  .passthrough();

export type MarketDepth = z.infer<typeof marketDepthSchema>;
