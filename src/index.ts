/**
 * perp-dex-sdk - TypeScript SDK for an on-chain perpetual futures exchange.
 *
 * Modules:
 * - `transaction`: argument encoding, orderless transaction building, gas
 *   pricing, fee-payer submission and the send pipeline
 * - `write`: trading write methods on top of the pipeline
 * - `api`: REST read client for markets, prices, depth, trades and accounts
 * - `websocket`: topic subscriptions over one shared socket
 *
 * @example
 * ```typescript
 * import { TESTNET_CONFIG, api, write, transaction } from "perp-dex-sdk";
 *
 * const account = transaction.Ed25519Account.fromPrivateKey(process.env.DEX_PRIVATE_KEY ?? "");
 * const writer = new write.WriteClient(TESTNET_CONFIG, account);
 * await writer.placeOrder({
 *   marketName: "BTC/USD",
 *   price: 97_000_000_000,
 *   size: 1_000,
 *   isBuy: true,
 *   timeInForce: write.TimeInForce.GoodTillCanceled,
 *   isReduceOnly: false,
 * });
 *
 * const reader = new api.ReadClient(TESTNET_CONFIG);
 * reader.subscribeMarketPrice("BTC/USD", ({ price }) => console.log(price.mark_px));
 * ```
 */

// ============================================================================
// MODULE EXPORTS
// ============================================================================

/**
 * Shared configuration, addresses and rounding helpers.
 */
export * from "./shared";

/**
 * Function-signature registry for the exchange package.
 */
export * as abi from "./abi";

/**
 * Transaction encoding, signing, gas and submission.
 */
export * as transaction from "./transaction";

/**
 * Trading write methods.
 */
export * as write from "./write";

/**
 * REST read client.
 */
export * as api from "./api";

/**
 * Real-time topic subscriptions.
 */
export * as websocket from "./websocket";
