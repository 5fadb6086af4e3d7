/**
 * REST read client for the trading API, plus typed WebSocket helpers.
 */

import { z } from "zod";
import { getMarketAddress } from "../shared/address";
import type { DexConfig } from "../shared/config";
import { parseJson } from "../shared/json";
import { WsSubscriptionClient, type WsSubscription } from "../websocket/client";
import {
  ALL_MARKET_PRICES_TOPIC,
  accountOverviewTopic,
  marketDepthTopic,
  marketPriceTopic,
  marketTradesTopic,
  type MarketDepthAggregationSize,
} from "../websocket/types";
import { ApiError, getErrorMessage, toErrorResponse } from "./error";
import {
  accountOverviewMessageSchema,
  accountOverviewSchema,
  allMarketPricesMessageSchema,
  marketDepthSchema,
  marketPriceListSchema,
  marketPriceMessageSchema,
  marketTradesMessageSchema,
  marketTradesResponseSchema,
  perpMarketConfigSchema,
  perpMarketListSchema,
  type AccountOverview,
  type AccountOverviewMessage,
  type AllMarketPricesMessage,
  type MarketDepth,
  type MarketPrice,
  type MarketPriceMessage,
  type MarketTrade,
  type MarketTradesMessage,
  type PerpMarket,
  type PerpMarketConfig,
  type VolumeWindow,
} from "./types";
import { DEFAULT_TIMEOUT_MS, validateAddress, validateLimit } from "./validation";

/**
 * Convert a typed params object to query string record.
 */
function toQueryParams(params: object): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      result[key] = String(value);
    }
  }
  return result;
}

/**
 * Configuration for retry behavior.
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 0 = disabled) */
  maxRetries: number;
  /** Initial delay in milliseconds (default: 100) */
  baseDelayMs: number;
  /** Maximum delay cap in milliseconds (default: 10000) */
  maxDelayMs: number;
}

/** Default retry configuration (disabled) */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 0,
  baseDelayMs: 100,
  maxDelayMs: 10000,
};

/**
 * Configuration for the read client.
 */
export interface ReadClientConfig {
  /** Shared subscription socket; one is created when omitted */
  ws?: WsSubscriptionClient;
  /** Bearer token for the trading API and WebSocket */
  apiKey?: string;
  /** Sent as `x-api-key` on node requests */
  nodeApiKey?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Retry configuration for transient failures */
  retry?: Partial<RetryConfig>;
}

export interface AccountOverviewParams {
  subAddr: string;
  volumeWindow?: VolumeWindow;
  includePerformance?: boolean;
}

/**
 * Calculate delay with exponential backoff and jitter.
 * Jitter: 75-100% of calculated delay (prevents thundering herd)
 */
function calculateRetryDelay(attempt: number, config: RetryConfig): number {
  const expDelay = config.baseDelayMs * Math.pow(2, Math.min(attempt, 10));
  const cappedDelay = Math.min(expDelay, config.maxDelayMs);
  const jitterRange = cappedDelay * 0.25;
  const jitter = Math.random() * jitterRange;
  return cappedDelay - jitterRange + jitter;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessageFromBody(text: string, status: number): string {
  const fallback = text || `HTTP ${status}`;
  let body: unknown;
  try {
    body = parseJson(text);
  } catch {
    return fallback;
  }
  const errorData = toErrorResponse(body);
  const known = errorData.message || errorData.error || errorData.details || errorData.error_code;
  return known ? getErrorMessage(errorData) : fallback;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(" -> ") || "root"}: ${issue.message}`).join("; ");
}

interface RequestOptions {
  method?: "GET" | "POST";
  query?: Record<string, string>;
  body?: unknown;
  headers?: Record<string, string>;
}

const viewResultSchema = z.array(z.unknown());
const resourceSchema = z.object({ type: z.string(), data: z.unknown() });

/**
 * Read client for markets, prices, depth, trades and account state.
 *
 * @example
 * ```typescript
 * const reader = new ReadClient(TESTNET_CONFIG);
 * const markets = await reader.getMarkets();
 * const sub = reader.subscribeMarketPrice("BTC/USD", ({ price }) => {
 *   console.log(price.mark_px);
 * });
 * ```
 */
export class ReadClient {
  readonly config: DexConfig;
  readonly ws: WsSubscriptionClient;
  private readonly timeout: number;
  private readonly headers: Record<string, string>;
  private readonly nodeHeaders: Record<string, string>;
  private readonly retryConfig: RetryConfig;

  constructor(config: DexConfig, options: ReadClientConfig = {}) {
    this.config = config;
    this.ws = options.ws ?? new WsSubscriptionClient(config, { apiKey: options.apiKey });
    this.timeout = options.timeout || DEFAULT_TIMEOUT_MS;
    this.headers = options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {};
    this.nodeHeaders = options.nodeApiKey ? { "x-api-key": options.nodeApiKey } : {};
    this.retryConfig = {
      ...DEFAULT_RETRY_CONFIG,
      ...options.retry,
    };
  }

  // ============================================================================
  // PRIVATE HELPERS
  // ============================================================================

  private apiUrl(path: string): string {
    return `${this.config.tradingHttpUrl}${path}`;
  }

  private marketAddr(marketName: string): string {
    return getMarketAddress(marketName, this.config.deployment.perpEngineGlobal).toString();
  }

  /**
   * Make an HTTP request with retry support and validate the body.
   */
  private async request<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const method = options.method ?? "GET";
    if (options.query && Object.keys(options.query).length > 0) {
      url += `?${new URLSearchParams(options.query).toString()}`;
    }
    const headers: Record<string, string> = {
      ...(options.headers ?? this.headers),
      ...(options.body !== undefined ? { "Content-Type": "application/json" } : {}),
    };

    let lastError: ApiError | undefined;

    for (let attempt = 0; attempt <= this.retryConfig.maxRetries; attempt++) {
      // Delay before retry (not on first attempt)
      if (attempt > 0) {
        const delay = calculateRetryDelay(attempt - 1, this.retryConfig);
        await sleep(delay);
      }

      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), this.timeout);

      try {
        const response = await fetch(url, {
          method,
          headers,
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          signal: controller.signal,
        });
        const text = await response.text();
        clearTimeout(timeoutId);

        if (!response.ok) {
          const error = ApiError.fromStatus(response.status, errorMessageFromBody(text, response.status), url);

          if (error.retryable && attempt < this.retryConfig.maxRetries) {
            lastError = error;
            continue;
          }
          throw error;
        }

        let json: unknown;
        try {
          json = parseJson(text);
        } catch {
          throw ApiError.deserialize(`Invalid JSON from ${url}`, text, url);
        }
        const parsed = schema.safeParse(json);
        if (!parsed.success) {
          throw ApiError.deserialize(describeIssues(parsed.error), text, url);
        }
        return parsed.data;
      } catch (error) {
        clearTimeout(timeoutId);

        if (error instanceof ApiError) {
          if (error.retryable && attempt < this.retryConfig.maxRetries) {
            lastError = error;
            continue;
          }
          throw error;
        }

        let apiError: ApiError;
        if (error instanceof Error) {
          apiError =
            error.name === "AbortError" ? ApiError.timeout(this.timeout, url) : ApiError.http(error.message, url);
        } else {
          apiError = ApiError.http("Unknown error", url);
        }

        if (apiError.retryable && attempt < this.retryConfig.maxRetries) {
          lastError = apiError;
          continue;
        }
        throw apiError;
      }
    }

    throw lastError || ApiError.http("Unknown error", url);
  }

  // ============================================================================
  // MARKETS
  // ============================================================================

  /**
   * All listed markets, without duplicate addresses.
   */
  async getMarkets(): Promise<PerpMarket[]> {
    const markets = await this.request(this.apiUrl("/api/v1/markets"), perpMarketListSchema);
    const seen = new Set<string>();
    return markets.filter((market) => {
      if (seen.has(market.market_addr)) return false;
      seen.add(market.market_addr);
      return true;
    });
  }

  /**
   * On-chain configuration of a market, or null when it cannot be read.
   */
  async getMarketByName(marketName: string): Promise<PerpMarketConfig | null> {
    const addr = this.marketAddr(marketName);
    const resourceType = `${this.config.deployment.package}::perp_market_config::PerpMarketConfig`;
    try {
      const resource = await this.request(
        `${this.config.fullnodeUrl}/accounts/${addr}/resource/${encodeURIComponent(resourceType)}`,
        resourceSchema,
        { headers: this.nodeHeaders }
      );
      return perpMarketConfigSchema.parse(resource.data);
    } catch (e) {
      console.error(`Failed to get market config for ${marketName}:`, e);
      return null;
    }
  }

  /** Addresses of every market known to the perp engine */
  async listMarketAddresses(): Promise<string[]> {
    const result = await this.view("perp_engine::list_markets", []);
    const first = result[0];
    return Array.isArray(first) ? first.map((addr) => String(addr)) : [];
  }

  async marketNameByAddress(marketAddr: string): Promise<string> {
    const result = await this.view("perp_engine::market_name", [validateAddress(marketAddr, "marketAddr")]);
    return String(result[0]);
  }

  private async view(fn: string, args: unknown[]): Promise<unknown[]> {
    return this.request(`${this.config.fullnodeUrl}/view`, viewResultSchema, {
      method: "POST",
      headers: this.nodeHeaders,
      body: {
        function: `${this.config.deployment.package}::${fn}`,
        type_arguments: [],
        arguments: args,
      },
    });
  }

  // ============================================================================
  // PRICES / DEPTH / TRADES
  // ============================================================================

  async getAllMarketPrices(): Promise<MarketPrice[]> {
    return this.request(this.apiUrl("/api/v1/prices"), marketPriceListSchema);
  }

  async getMarketPrice(marketName: string): Promise<MarketPrice[]> {
    return this.request(this.apiUrl("/api/v1/prices"), marketPriceListSchema, {
      query: { market: this.marketAddr(marketName) },
    });
  }

  /**
   * @throws {ApiError} If limit is out of bounds (1-1000)
   */
  async getMarketDepth(marketName: string, limit?: number): Promise<MarketDepth> {
    validateLimit(limit);
    return this.request(this.apiUrl("/api/v1/depth"), marketDepthSchema, {
      query: toQueryParams({ market: this.marketAddr(marketName), limit }),
    });
  }

  /**
   * @throws {ApiError} If limit is out of bounds (1-1000)
   */
  async getMarketTrades(marketName: string, limit?: number): Promise<MarketTrade[]> {
    validateLimit(limit);
    const response = await this.request(this.apiUrl("/api/v1/trades"), marketTradesResponseSchema, {
      query: toQueryParams({ market: this.marketAddr(marketName), limit }),
    });
    return response.items;
  }

  // ============================================================================
  // ACCOUNT
  // ============================================================================

  async getAccountOverview(params: AccountOverviewParams): Promise<AccountOverview> {
    return this.request(this.apiUrl("/api/v1/account_overviews"), accountOverviewSchema, {
      query: toQueryParams({
        account: validateAddress(params.subAddr, "subAddr"),
        volume_window: params.volumeWindow,
        include_performance: params.includePerformance ? "true" : undefined,
      }),
    });
  }

  // ============================================================================
  // SUBSCRIPTIONS
  // ============================================================================

  subscribeMarketPrice(
    marketName: string,
    onData: (message: MarketPriceMessage) => void | Promise<void>
  ): WsSubscription {
    return this.ws.subscribe(marketPriceTopic(this.marketAddr(marketName)), marketPriceMessageSchema, onData);
  }

  subscribeAllMarketPrices(onData: (message: AllMarketPricesMessage) => void | Promise<void>): WsSubscription {
    return this.ws.subscribe(ALL_MARKET_PRICES_TOPIC, allMarketPricesMessageSchema, onData);
  }

  subscribeMarketDepth(
    marketName: string,
    aggregationSize: MarketDepthAggregationSize,
    onData: (depth: MarketDepth) => void | Promise<void>
  ): WsSubscription {
    return this.ws.subscribe(
      marketDepthTopic(this.marketAddr(marketName), aggregationSize),
      marketDepthSchema,
      onData
    );
  }

  /** Ask the server for a fresh depth snapshot */
  resetMarketDepth(marketName: string, aggregationSize: MarketDepthAggregationSize = 1): void {
    this.ws.reset(marketDepthTopic(this.marketAddr(marketName), aggregationSize));
  }

  subscribeMarketTrades(
    marketName: string,
    onData: (message: MarketTradesMessage) => void | Promise<void>
  ): WsSubscription {
    return this.ws.subscribe(marketTradesTopic(this.marketAddr(marketName)), marketTradesMessageSchema, onData);
  }

  subscribeAccountOverview(
    subAddr: string,
    onData: (message: AccountOverviewMessage) => void | Promise<void>
  ): WsSubscription {
    return this.ws.subscribe(
      accountOverviewTopic(validateAddress(subAddr, "subAddr")),
      accountOverviewMessageSchema,
      onData
    );
  }

  /** Close the subscription socket */
  close(): void {
    this.ws.close();
  }
}
