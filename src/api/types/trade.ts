/**
 * Trade schemas.
 */

import { z } from "zod";

/** Integer that may arrive tagged as a big integer */
const integer = z.union([z.number().int(), z.bigint()]);

export const marketTradeSchema = z
  .object({
    account: z.string(),
    market: z.string(),
    action: z.string(),
    size: z.number(),
    price: z.number(),
    is_profit: z.boolean(),
    realized_pnl_amount: z.number(),
    is_funding_positive: z.boolean(),
    realized_funding_amount: z.number(),
    is_rebate: z.boolean(),
    fee_amount: z.number(),
    transaction_unix_ms: integer,
    transaction_version: integer,
  })
  .passthrough();

export type MarketTrade = z.infer<typeof marketTradeSchema>;

export const marketTradesResponseSchema = z.object({
  items: z.array(marketTradeSchema),
  total_count: z.number().int(),
});

export type MarketTradesResponse = z.infer<typeof marketTradesResponseSchema>;

/** Payload of `trades:<market>` */
export const marketTradesMessageSchema = z.object({ trades: z.array(marketTradeSchema) });

export type MarketTradesMessage = z.infer<typeof marketTradesMessageSchema>;
