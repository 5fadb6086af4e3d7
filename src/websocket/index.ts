/**
 * WebSocket module: one shared socket multiplexing topic subscriptions.
 *
 * @example
 * ```typescript
 * import { websocket, TESTNET_CONFIG } from "perp-dex-sdk";
 * import { z } from "zod";
 *
 * const ws = new websocket.WsSubscriptionClient(TESTNET_CONFIG);
 * const sub = ws.subscribe("all_market_prices", z.object({ prices: z.array(z.unknown()) }), ({ prices }) => {
 *   console.log(prices.length);
 * });
 * sub.unsubscribe();
 * ```
 *
 * @module websocket
 */

// Client
export { WsSubscriptionClient, WS_SUBPROTOCOL, reconnectDelayMs } from "./client";
export type { WsSubscriptionOptions, ConnectionState, WsSubscription } from "./client";

// Error types
export { WebSocketError } from "./error";
export type { WebSocketErrorVariant } from "./error";

// Framing and topics
export type { WsMethod, WsRequest, WsDataMessage, MarketDepthAggregationSize } from "./types";
export {
  createSubscribeRequest,
  createUnsubscribeRequest,
  parseWsMessage,
  MARKET_DEPTH_AGGREGATION_SIZES,
  ALL_MARKET_PRICES_TOPIC,
  marketPriceTopic,
  marketDepthTopic,
  marketTradesTopic,
  accountOverviewTopic,
} from "./types";
