/**
 * REST read client for the trading HTTP API.
 *
 * @example
 * ```typescript
 * import { api, TESTNET_CONFIG } from "perp-dex-sdk";
 *
 * const reader = new api.ReadClient(TESTNET_CONFIG);
 * const markets = await reader.getMarkets();
 * ```
 *
 * @module api
 */

// Client
export { ReadClient, DEFAULT_RETRY_CONFIG } from "./client";
export type { ReadClientConfig, RetryConfig, AccountOverviewParams } from "./client";

// Error types
export { ApiError, getErrorMessage, toErrorResponse } from "./error";
export type { ApiErrorVariant, ErrorResponse } from "./error";

// Validation utilities
export { validateAddress, validateLimit, MAX_PAGINATION_LIMIT, DEFAULT_TIMEOUT_MS } from "./validation";

// Response schemas and types
export * from "./types";
