/**
 * Trading write calls: every method is one entry-function call sent
 * through the transaction pipeline.
 */

import { AccountAddress, getMarketAddress, type AccountAddressInput } from "../shared/address";
import { isRecord } from "../shared/json";
import { roundToTickMultiple } from "../shared/price";
import type { TransactionSigner } from "../transaction/account";
import { TransactionClient, type CommittedTransaction } from "../transaction/client";
import type { EntryArgument } from "../transaction/encoder";
import { TransactionError } from "../transaction/error";
import type {
  ActivateVaultArgs,
  ApproveBuilderFeeArgs,
  CancelBulkOrderArgs,
  CancelClientOrderArgs,
  CancelOrderArgs,
  CancelTpSlOrderArgs,
  CancelTwapOrderArgs,
  ChainAmount,
  ConfigureUserSettingsArgs,
  CreateVaultArgs,
  DeactivateSubaccountArgs,
  DelegateTradingArgs,
  DelegateVaultActionsArgs,
  DepositToVaultArgs,
  PlaceBulkOrdersArgs,
  PlaceBulkOrdersResult,
  PlaceOrderArgs,
  PlaceOrderResult,
  PlaceTpSlOrderArgs,
  PlaceTwapOrderArgs,
  RevokeBuilderFeeArgs,
  RevokeDelegationArgs,
  SubaccountOptions,
  TriggerMatchingArgs,
  TriggerMatchingResult,
  UpdateSlOrderArgs,
  UpdateTpOrderArgs,
  WithdrawFromVaultArgs,
} from "./types";

const ORDER_EVENT = "market_types::OrderEvent";
const TWAP_EVENT = "async_matching_engine::TwapEvent";
const VAULT_CREATED_EVENT = "::vault::VaultCreatedEvent";

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function maybeRound(value: ChainAmount | undefined, tickSize: ChainAmount | undefined): EntryArgument {
  if (value === undefined) return null;
  return tickSize === undefined ? value : roundToTickMultiple(value, tickSize);
}

function sameAddress(a: unknown, b: AccountAddressInput): boolean {
  if (typeof a !== "string") return false;
  try {
    return AccountAddress.fromString(a).equals(b);
  } catch {
    return typeof b === "string" && a === b;
  }
}

/**
 * Order id emitted for `user` by an order or TWAP event of a committed
 * transaction, or null when there is none.
 */
export function extractOrderIdFromTransaction(
  transaction: CommittedTransaction,
  user: AccountAddressInput
): string | null {
  try {
    for (const event of transaction.events) {
      if (!event.type.includes(ORDER_EVENT) && !event.type.includes(TWAP_EVENT)) continue;
      const data = event.data;
      if (!isRecord(data)) continue;
      if (!sameAddress(data.user, user) && !sameAddress(data.account, user)) continue;

      const orderId = data.order_id;
      if (typeof orderId === "string") return orderId;
      if (isRecord(orderId) && orderId.order_id !== undefined && orderId.order_id !== null) {
        return String(orderId.order_id);
      }
    }
    return null;
  } catch (e) {
    console.error("Failed to extract order id from transaction:", e);
    return null;
  }
}

/**
 * Address of the vault a `createVault` transaction created.
 *
 * @throws {TransactionError} `Validation` when no `VaultCreatedEvent` names one
 */
export function extractVaultAddressFromCreateTx(transaction: CommittedTransaction): string {
  const event = transaction.events.find((e) => e.type.includes(VAULT_CREATED_EVENT));
  const vault = event !== undefined && isRecord(event.data) ? event.data.vault : undefined;
  if (typeof vault === "string") return vault;
  if (isRecord(vault) && typeof vault.inner === "string") return vault.inner;
  throw TransactionError.validation("Unable to extract vault address from transaction");
}

// ============================================================================
// CLIENT
// ============================================================================

/**
 * Signs and sends exchange transactions for one account.
 *
 * Calls that take a subaccount default to the signer's primary
 * subaccount. Prices and sizes are chain units.
 *
 * @example
 * ```typescript
 * const account = Ed25519Account.fromPrivateKey(process.env.DEX_PRIVATE_KEY ?? "");
 * const client = new WriteClient(TESTNET_CONFIG, account, { gasPriceManager });
 * const result = await client.placeOrder({
 *   marketName: "BTC/USD",
 *   price: 100_000_000_000n,
 *   size: 1000n,
 *   isBuy: true,
 *   timeInForce: TimeInForce.GoodTillCanceled,
 *   isReduceOnly: false,
 * });
 * if (result.success) console.log(result.orderId);
 * ```
 */
export class WriteClient extends TransactionClient {
  private functionId(module: string, name: string): string {
    return `${this.config.deployment.package}::${module}::${name}`;
  }

  private marketAddress(marketName: string): AccountAddress {
    return getMarketAddress(marketName, this.config.deployment.perpEngineGlobal);
  }

  private signerOf(accountOverride?: TransactionSigner): TransactionSigner {
    return accountOverride ?? this.account;
  }

  private subaccountOf(options: SubaccountOptions): string {
    if (options.subaccountAddr !== undefined) {
      return AccountAddress.from(options.subaccountAddr).toString();
    }
    return this.getPrimarySubaccountAddress(this.signerOf(options.accountOverride).address);
  }

  private async call(
    module: string,
    name: string,
    functionArguments: EntryArgument[],
    accountOverride?: TransactionSigner
  ): Promise<CommittedTransaction> {
    return this.sendTx(
      { function: this.functionId(module, name), functionArguments },
      { account: accountOverride }
    );
  }

  // ============================================================================
  // ACCOUNT
  // ============================================================================

  async createSubaccount(accountOverride?: TransactionSigner): Promise<CommittedTransaction> {
    return this.call("dex_accounts_entry", "create_new_subaccount", [], accountOverride);
  }

  /** Deposit USDC into a subaccount */
  async deposit(amount: ChainAmount, options: SubaccountOptions = {}): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "deposit_to_subaccount_at",
      [this.subaccountOf(options), this.config.deployment.usdc, amount],
      options.accountOverride
    );
  }

  /** Withdraw USDC from a subaccount */
  async withdraw(amount: ChainAmount, options: SubaccountOptions = {}): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "withdraw_from_subaccount",
      [this.subaccountOf(options), this.config.deployment.usdc, amount],
      options.accountOverride
    );
  }

  async configureUserSettingsForMarket(args: ConfigureUserSettingsArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "configure_user_settings_for_market",
      [this.subaccountOf(args), AccountAddress.from(args.marketAddr), args.isCross, args.userLeverage],
      args.accountOverride
    );
  }

  async deactivateSubaccount(args: DeactivateSubaccountArgs = {}): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "deactivate_subaccount",
      [this.subaccountOf(args), args.revokeAllDelegations ?? true],
      args.accountOverride
    );
  }

  async approveMaxBuilderFee(args: ApproveBuilderFeeArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "approve_max_builder_fee_for_subaccount",
      [this.subaccountOf(args), AccountAddress.from(args.builderAddr), args.maxFee],
      args.accountOverride
    );
  }

  async revokeMaxBuilderFee(args: RevokeBuilderFeeArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "revoke_max_builder_fee_for_subaccount",
      [this.subaccountOf(args), AccountAddress.from(args.builderAddr)],
      args.accountOverride
    );
  }

  // ============================================================================
  // ORDERS
  // ============================================================================

  /**
   * Place a limit order. Never throws: failures come back as
   * `{ success: false, error }`.
   */
  async placeOrder(args: PlaceOrderArgs): Promise<PlaceOrderResult> {
    try {
      const subaccount = this.subaccountOf(args);
      const tick = args.tickSize;
      const price = tick === undefined ? args.price : roundToTickMultiple(args.price, tick);

      const committed = await this.call(
        "dex_accounts_entry",
        "place_order_to_subaccount",
        [
          subaccount,
          this.marketAddress(args.marketName),
          price,
          args.size,
          args.isBuy,
          args.timeInForce,
          args.isReduceOnly,
          args.clientOrderId ?? null,
          maybeRound(args.stopPrice, tick),
          maybeRound(args.tpTriggerPrice, tick),
          maybeRound(args.tpLimitPrice, tick),
          maybeRound(args.slTriggerPrice, tick),
          maybeRound(args.slLimitPrice, tick),
          args.builderAddr === undefined ? null : AccountAddress.from(args.builderAddr),
          args.builderFee ?? null,
        ],
        args.accountOverride
      );

      return {
        success: true,
        orderId: extractOrderIdFromTransaction(committed, subaccount),
        transactionHash: committed.hash,
      };
    } catch (e) {
      console.error("Failed to place order:", e);
      return { success: false, error: errorMessage(e) };
    }
  }

  /** Same failure contract as {@link placeOrder} */
  async placeTwapOrder(args: PlaceTwapOrderArgs): Promise<PlaceOrderResult> {
    try {
      const subaccount = this.subaccountOf(args);
      const committed = await this.call(
        "dex_accounts_entry",
        "place_twap_order_to_subaccount_v2",
        [
          subaccount,
          this.marketAddress(args.marketName),
          args.size,
          args.isBuy,
          args.isReduceOnly,
          args.clientOrderId ?? null,
          args.twapFrequencySeconds,
          args.twapDurationSeconds,
          args.builderAddress === undefined ? null : AccountAddress.from(args.builderAddress),
          args.builderFees ?? null,
        ],
        args.accountOverride
      );
      return {
        success: true,
        orderId: extractOrderIdFromTransaction(committed, subaccount),
        transactionHash: committed.hash,
      };
    } catch (e) {
      console.error("Failed to place TWAP order:", e);
      return { success: false, error: errorMessage(e) };
    }
  }

  /**
   * @throws {TransactionError} `Validation` when neither `marketName` nor
   * `marketAddr` is given
   */
  async cancelOrder(args: CancelOrderArgs): Promise<CommittedTransaction> {
    let market: AccountAddress;
    if (args.marketName !== undefined) {
      market = this.marketAddress(args.marketName);
    } else if (args.marketAddr !== undefined) {
      market = AccountAddress.from(args.marketAddr);
    } else {
      throw TransactionError.validation("Either marketName or marketAddr must be provided");
    }
    return this.call(
      "dex_accounts_entry",
      "cancel_order_to_subaccount",
      [this.subaccountOf(args), args.orderId, market],
      args.accountOverride
    );
  }

  async cancelClientOrder(args: CancelClientOrderArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "cancel_client_order_to_subaccount",
      [this.subaccountOf(args), args.clientOrderId, this.marketAddress(args.marketName)],
      args.accountOverride
    );
  }

  async cancelTwapOrder(args: CancelTwapOrderArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "cancel_twap_orders_to_subaccount",
      [this.subaccountOf(args), AccountAddress.from(args.marketAddr), args.orderId],
      args.accountOverride
    );
  }

  /**
   * Replace the subaccount's resting bulk quotes on a market. Never throws.
   */
  async placeBulkOrders(args: PlaceBulkOrdersArgs): Promise<PlaceBulkOrdersResult> {
    try {
      const committed = await this.call(
        "dex_accounts_entry",
        "place_bulk_orders_to_subaccount",
        [
          this.subaccountOf(args),
          this.marketAddress(args.marketName),
          args.sequenceNumber,
          args.bidPrices,
          args.bidSizes,
          args.askPrices,
          args.askSizes,
          args.builderAddr === undefined ? null : AccountAddress.from(args.builderAddr),
          args.builderFee ?? null,
        ],
        args.accountOverride
      );
      return { success: true, transactionHash: committed.hash };
    } catch (e) {
      console.error("Failed to place bulk orders:", e);
      return { success: false, error: errorMessage(e) };
    }
  }

  async cancelBulkOrder(args: CancelBulkOrderArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "cancel_bulk_order_to_subaccount",
      [this.subaccountOf(args), this.marketAddress(args.marketName)],
      args.accountOverride
    );
  }

  /** Process pending matching work on a market; callable by anyone */
  async triggerMatching(args: TriggerMatchingArgs): Promise<TriggerMatchingResult> {
    const committed = await this.call("public_apis", "process_perp_market_pending_requests", [
      AccountAddress.from(args.marketAddr),
      args.maxWorkUnit,
    ]);
    return { success: true, transactionHash: committed.hash };
  }

  // ============================================================================
  // TP / SL
  // ============================================================================

  async placeTpSlOrderForPosition(args: PlaceTpSlOrderArgs): Promise<CommittedTransaction> {
    const tick = args.tickSize;
    return this.call(
      "dex_accounts_entry",
      "place_tp_sl_order_for_position",
      [
        this.subaccountOf(args),
        AccountAddress.from(args.marketAddr),
        maybeRound(args.tpTriggerPrice, tick),
        maybeRound(args.tpLimitPrice, tick),
        args.tpSize ?? null,
        maybeRound(args.slTriggerPrice, tick),
        maybeRound(args.slLimitPrice, tick),
        args.slSize ?? null,
        null,
        null,
      ],
      args.accountOverride
    );
  }

  async updateTpOrderForPosition(args: UpdateTpOrderArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "update_tp_order_for_position",
      [
        this.subaccountOf(args),
        args.prevOrderId,
        AccountAddress.from(args.marketAddr),
        args.tpTriggerPrice ?? null,
        args.tpLimitPrice ?? null,
        args.tpSize ?? null,
      ],
      args.accountOverride
    );
  }

  async updateSlOrderForPosition(args: UpdateSlOrderArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "update_sl_order_for_position",
      [
        this.subaccountOf(args),
        args.prevOrderId,
        AccountAddress.from(args.marketAddr),
        args.slTriggerPrice ?? null,
        args.slLimitPrice ?? null,
        args.slSize ?? null,
      ],
      args.accountOverride
    );
  }

  async cancelTpSlOrderForPosition(args: CancelTpSlOrderArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "cancel_tp_sl_order_for_position",
      [this.subaccountOf(args), AccountAddress.from(args.marketAddr), args.orderId],
      args.accountOverride
    );
  }

  // ============================================================================
  // DELEGATION
  // ============================================================================

  async delegateTradingTo(args: DelegateTradingArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "delegate_trading_to_for_subaccount",
      [this.subaccountOf(args), AccountAddress.from(args.accountToDelegateTo), args.expirationTimestampSecs ?? null],
      args.accountOverride
    );
  }

  async revokeDelegation(args: RevokeDelegationArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "revoke_delegation",
      [this.subaccountOf(args), AccountAddress.from(args.accountToRevoke)],
      args.accountOverride
    );
  }

  // ============================================================================
  // VAULTS
  // ============================================================================

  /** Create and fund a vault; pair with `extractVaultAddressFromCreateTx` */
  async createVault(args: CreateVaultArgs): Promise<CommittedTransaction> {
    return this.call(
      "vault_api",
      "create_and_fund_vault",
      [
        this.subaccountOf(args),
        AccountAddress.from(args.contributionAssetType ?? this.config.deployment.usdc),
        args.vaultName,
        args.vaultDescription,
        args.vaultSocialLinks,
        args.vaultShareSymbol,
        args.vaultShareIconUri ?? "",
        args.vaultShareProjectUri ?? "",
        args.feeBps,
        args.feeIntervalS,
        args.contributionLockupDurationS,
        args.initialFunding ?? 0,
        args.acceptsContributions ?? false,
        args.delegateToCreator ?? false,
      ],
      args.accountOverride
    );
  }

  async activateVault(args: ActivateVaultArgs): Promise<CommittedTransaction> {
    return this.call("vault_api", "activate_vault", [AccountAddress.from(args.vaultAddress)], args.accountOverride);
  }

  async depositToVault(args: DepositToVaultArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "contribute_to_vault",
      [this.subaccountOf(args), AccountAddress.from(args.vaultAddress), this.config.deployment.usdc, args.amount],
      args.accountOverride
    );
  }

  async withdrawFromVault(args: WithdrawFromVaultArgs): Promise<CommittedTransaction> {
    return this.call(
      "dex_accounts_entry",
      "redeem_from_vault",
      [this.subaccountOf(args), AccountAddress.from(args.vaultAddress), args.shares],
      args.accountOverride
    );
  }

  async delegateVaultActions(args: DelegateVaultActionsArgs): Promise<CommittedTransaction> {
    return this.call(
      "vault_admin_api",
      "delegate_dex_actions_to",
      [
        AccountAddress.from(args.vaultAddress),
        AccountAddress.from(args.accountToDelegateTo),
        args.expirationTimestampSecs ?? null,
      ],
      args.accountOverride
    );
  }
}
