/**
 * Wire types and framing for the subscription socket.
 */

import { isRecord, parseJson } from "../shared/json";
import { WebSocketError } from "./error";

// ============================================================================
// REQUESTS
// ============================================================================

export type WsMethod = "subscribe" | "unsubscribe";

/** Outbound control message */
export interface WsRequest {
  method: WsMethod;
  topic: string;
}

export function createSubscribeRequest(topic: string): WsRequest {
  return { method: "subscribe", topic };
}

export function createUnsubscribeRequest(topic: string): WsRequest {
  return { method: "unsubscribe", topic };
}

// ============================================================================
// INBOUND
// ============================================================================

/** A data message: its topic and every other field as payload */
export interface WsDataMessage {
  topic: string;
  data: Record<string, unknown>;
}

/**
 * Parse one inbound text frame.
 *
 * Returns null for control acknowledgements (frames with a `success`
 * field). Tagged big integers are revived.
 *
 * @throws {WebSocketError} `MessageParseError` for invalid JSON or a
 * missing topic
 */
export function parseWsMessage(text: string): WsDataMessage | null {
  let json: unknown;
  try {
    json = parseJson(text);
  } catch {
    throw WebSocketError.messageParseError(`failed to parse JSON: ${text}`);
  }

  if (isRecord(json) && "success" in json) {
    return null;
  }
  if (!isRecord(json) || typeof json.topic !== "string") {
    throw WebSocketError.messageParseError(`missing topic field: ${text}`);
  }

  const { topic, ...data } = json;
  return { topic, data };
}

// ============================================================================
// TOPICS
// ============================================================================

/** Aggregation levels the depth feed accepts */
export const MARKET_DEPTH_AGGREGATION_SIZES = [1, 2, 5, 10, 100, 1000] as const;

export type MarketDepthAggregationSize = (typeof MARKET_DEPTH_AGGREGATION_SIZES)[number];

export function marketPriceTopic(marketAddr: string): string {
  return `market_price:${marketAddr}`;
}

export const ALL_MARKET_PRICES_TOPIC = "all_market_prices";

export function marketDepthTopic(marketAddr: string, aggregationSize: MarketDepthAggregationSize): string {
  return `depth:${marketAddr}:${aggregationSize}`;
}

export function marketTradesTopic(marketAddr: string): string {
  return `trades:${marketAddr}`;
}

export function accountOverviewTopic(subaccountAddr: string): string {
  return `account_overview:${subaccountAddr}`;
}
