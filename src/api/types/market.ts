/**
 * Market and price schemas for the trading REST and WebSocket APIs.
 */

import { z } from "zod";

export const marketModeSchema = z.enum(["Open", "ReduceOnly", "AllowlistOnly", "Halt", "Delisting"]);

export type MarketMode = z.infer<typeof marketModeSchema>;

/**
 * A perpetual market as listed by `/api/v1/markets`.
 */
export const perpMarketSchema = z
  .object({
    market_addr: z.string(),
    market_name: z.string(),
    sz_decimals: z.number().int(),
    px_decimals: z.number().int(),
    max_leverage: z.number(),
    tick_size: z.number(),
    min_size: z.number(),
    lot_size: z.number(),
    max_open_interest: z.number(),
    mode: marketModeSchema,
  })
  .passthrough();

export type PerpMarket = z.infer<typeof perpMarketSchema>;

export const perpMarketListSchema = z.array(perpMarketSchema);

const marketModeConfigSchema = z.discriminatedUnion("__variant__", [
  z.object({ __variant__: z.literal("Open") }),
  z.object({ __variant__: z.literal("ReduceOnly") }),
  z.object({ __variant__: z.literal("AllowlistOnly"), allowlist: z.array(z.string()) }),
  z.object({ __variant__: z.literal("Halt") }),
]);

export type MarketModeConfig = z.infer<typeof marketModeConfigSchema>;

/**
 * On-chain `perp_market_config::PerpMarketConfig` resource data.
 * Sizes are chain-unit decimal strings.
 */
export const perpMarketConfigSchema = z.object({
  __variant__: z.literal("V1"),
  name: z.string(),
  sz_precision: z.object({
    decimals: z.number().int(),
    multiplier: z.string(),
  }),
  min_size: z.string(),
  lot_size: z.string(),
  ticker_size: z.string(),
  max_leverage: z.coerce.number(),
  mode: marketModeConfigSchema,
});

export type PerpMarketConfig = z.infer<typeof perpMarketConfigSchema>;

export const marketPriceSchema = z
  .object({
    market: z.string(),
    mark_px: z.number(),
    mid_px: z.number(),
    oracle_px: z.number(),
    funding_rate_bps: z.number(),
    is_funding_positive: z.boolean(),
    open_interest: z.number(),
    transaction_unix_ms: z.number().int(),
  })
  .passthrough();

export type MarketPrice = z.infer<typeof marketPriceSchema>;

export const marketPriceListSchema = z.array(marketPriceSchema);

/** Payload of `market_price:<market>` */
export const marketPriceMessageSchema = z.object({ price: marketPriceSchema });

export type MarketPriceMessage = z.infer<typeof marketPriceMessageSchema>;

/** Payload of `all_market_prices` */
export const allMarketPricesMessageSchema = z.object({ prices: z.array(marketPriceSchema) });

export type AllMarketPricesMessage = z.infer<typeof allMarketPricesMessageSchema>;
