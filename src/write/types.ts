/**
 * Argument and result types of the trading write calls.
 *
 * Prices and sizes are chain units (integers scaled by the market's
 * decimals). Use the helpers in `shared/price` to convert.
 */

import type { AccountAddressInput } from "../shared/address";
import type { TransactionSigner } from "../transaction/account";

export enum TimeInForce {
  GoodTillCanceled = 0,
  PostOnly = 1,
  ImmediateOrCancel = 2,
}

/** An integer amount in chain units */
export type ChainAmount = number | bigint | string;

/** Order ids are u128 on chain */
export type OrderId = number | bigint | string;

/** Options shared by calls that act on a subaccount */
export interface SubaccountOptions {
  /** Defaults to the signer's primary subaccount */
  subaccountAddr?: AccountAddressInput;
  /** Sign with this account instead of the client's */
  accountOverride?: TransactionSigner;
}

// ============================================================================
// ORDERS
// ============================================================================

export interface PlaceOrderArgs extends SubaccountOptions {
  marketName: string;
  price: ChainAmount;
  size: ChainAmount;
  isBuy: boolean;
  timeInForce: TimeInForce;
  isReduceOnly: boolean;
  clientOrderId?: string;
  stopPrice?: ChainAmount;
  tpTriggerPrice?: ChainAmount;
  tpLimitPrice?: ChainAmount;
  slTriggerPrice?: ChainAmount;
  slLimitPrice?: ChainAmount;
  builderAddr?: AccountAddressInput;
  builderFee?: ChainAmount;
  /** When set, every price is snapped to a multiple of it */
  tickSize?: ChainAmount;
}

export interface PlaceTwapOrderArgs extends SubaccountOptions {
  marketName: string;
  size: ChainAmount;
  isBuy: boolean;
  isReduceOnly: boolean;
  twapFrequencySeconds: number;
  twapDurationSeconds: number;
  clientOrderId?: string;
  builderAddress?: AccountAddressInput;
  builderFees?: ChainAmount;
}

/** Either `marketName` or `marketAddr` identifies the market */
export interface CancelOrderArgs extends SubaccountOptions {
  orderId: OrderId;
  marketName?: string;
  marketAddr?: AccountAddressInput;
}

export interface CancelClientOrderArgs extends SubaccountOptions {
  clientOrderId: string;
  marketName: string;
}

export interface CancelTwapOrderArgs extends SubaccountOptions {
  orderId: OrderId;
  marketAddr: AccountAddressInput;
}

export interface PlaceBulkOrdersArgs extends SubaccountOptions {
  marketName: string;
  /** Monotonic per subaccount; stale sequences are rejected on chain */
  sequenceNumber: ChainAmount;
  bidPrices: ChainAmount[];
  bidSizes: ChainAmount[];
  askPrices: ChainAmount[];
  askSizes: ChainAmount[];
  builderAddr?: AccountAddressInput;
  builderFee?: ChainAmount;
}

export interface CancelBulkOrderArgs extends SubaccountOptions {
  marketName: string;
}

export interface TriggerMatchingArgs {
  marketAddr: AccountAddressInput;
  maxWorkUnit: number;
}

// ============================================================================
// TP / SL
// ============================================================================

export interface PlaceTpSlOrderArgs extends SubaccountOptions {
  marketAddr: AccountAddressInput;
  tpTriggerPrice?: ChainAmount;
  tpLimitPrice?: ChainAmount;
  tpSize?: ChainAmount;
  slTriggerPrice?: ChainAmount;
  slLimitPrice?: ChainAmount;
  slSize?: ChainAmount;
  tickSize?: ChainAmount;
}

export interface UpdateTpOrderArgs extends SubaccountOptions {
  marketAddr: AccountAddressInput;
  prevOrderId: OrderId;
  tpTriggerPrice?: ChainAmount;
  tpLimitPrice?: ChainAmount;
  tpSize?: ChainAmount;
}

export interface UpdateSlOrderArgs extends SubaccountOptions {
  marketAddr: AccountAddressInput;
  prevOrderId: OrderId;
  slTriggerPrice?: ChainAmount;
  slLimitPrice?: ChainAmount;
  slSize?: ChainAmount;
}

export interface CancelTpSlOrderArgs extends SubaccountOptions {
  marketAddr: AccountAddressInput;
  orderId: OrderId;
}

// ============================================================================
// ACCOUNTS / DELEGATION
// ============================================================================

export interface ConfigureUserSettingsArgs extends SubaccountOptions {
  marketAddr: AccountAddressInput;
  isCross: boolean;
  userLeverage: number;
}

export interface DelegateTradingArgs extends SubaccountOptions {
  accountToDelegateTo: AccountAddressInput;
  expirationTimestampSecs?: number;
}

export interface RevokeDelegationArgs extends SubaccountOptions {
  accountToRevoke: AccountAddressInput;
}

export interface DeactivateSubaccountArgs extends SubaccountOptions {
  /** Default: true */
  revokeAllDelegations?: boolean;
}

export interface ApproveBuilderFeeArgs extends SubaccountOptions {
  builderAddr: AccountAddressInput;
  maxFee: ChainAmount;
}

export interface RevokeBuilderFeeArgs extends SubaccountOptions {
  builderAddr: AccountAddressInput;
}

// ============================================================================
// VAULTS
// ============================================================================

export interface CreateVaultArgs extends SubaccountOptions {
  /** Defaults to the deployment's USDC */
  contributionAssetType?: AccountAddressInput;
  vaultName: string;
  vaultDescription: string;
  vaultSocialLinks: string[];
  vaultShareSymbol: string;
  vaultShareIconUri?: string;
  vaultShareProjectUri?: string;
  feeBps: ChainAmount;
  feeIntervalS: ChainAmount;
  contributionLockupDurationS: ChainAmount;
  initialFunding?: ChainAmount;
  acceptsContributions?: boolean;
  delegateToCreator?: boolean;
}

export interface ActivateVaultArgs {
  vaultAddress: AccountAddressInput;
  accountOverride?: TransactionSigner;
}

export interface DepositToVaultArgs extends SubaccountOptions {
  vaultAddress: AccountAddressInput;
  amount: ChainAmount;
}

export interface WithdrawFromVaultArgs extends SubaccountOptions {
  vaultAddress: AccountAddressInput;
  shares: ChainAmount;
}

export interface DelegateVaultActionsArgs {
  vaultAddress: AccountAddressInput;
  accountToDelegateTo: AccountAddressInput;
  expirationTimestampSecs?: number;
  accountOverride?: TransactionSigner;
}

// ============================================================================
// RESULTS
// ============================================================================

export interface PlaceOrderSuccess {
  success: true;
  orderId: string | null;
  transactionHash: string;
}

export interface PlaceOrderFailure {
  success: false;
  error: string;
}

export type PlaceOrderResult = PlaceOrderSuccess | PlaceOrderFailure;

export interface PlaceBulkOrdersSuccess {
  success: true;
  transactionHash: string;
}

export interface PlaceBulkOrdersFailure {
  success: false;
  error: string;
}

export type PlaceBulkOrdersResult = PlaceBulkOrdersSuccess | PlaceBulkOrdersFailure;

export interface TriggerMatchingResult {
  success: true;
  transactionHash: string;
}
