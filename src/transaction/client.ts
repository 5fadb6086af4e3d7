/**
 * Transaction pipeline: build, simulate, rebuild, sign, submit, wait.
 */

import { z } from "zod";
import { AbiRegistry } from "../abi/registry";
import { AccountAddress, getPrimarySubaccountAddress, type AccountAddressInput } from "../shared/address";
import type { DexConfig } from "../shared/config";
import { isRecord } from "../shared/json";
import type { TransactionSigner } from "./account";
import {
  BCS_WRITER_OPTIONS,
  SignedTransaction,
  rawTransactionInput,
  serializeAccountAuthenticator,
  serializeRawTransaction,
  type Ed25519AuthenticatorData,
} from "./bcs";
import { buildSimpleTransaction, type InputEntryFunctionData, type SimpleTransaction } from "./builder";
import {
  DEFAULT_GAS_ESTIMATE,
  DEFAULT_MAX_GAS_AMOUNT,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_TXN_TIMEOUT_MS,
  MAX_GAS_UNITS_LIMIT,
  SIGNED_TRANSACTION_CONTENT_TYPE,
} from "./constants";
import { TransactionError } from "./error";
import { pendingFromTransaction, submitFeePaidTransaction, type PendingTransactionResponse } from "./fee_payer";
import { nodeHeaders, responseJson, responseText, sleep } from "./http";
import { nextReplayProtectionNonce } from "./nonce";

// ============================================================================
// TYPES
// ============================================================================

/**
 * A source of gas unit prices. `GasPriceManager` is the stock one.
 */
export interface GasPriceSource {
  getGasPrice(): number | null;
  fetchAndSetGasPrice(): Promise<number>;
}

export interface TransactionClientOptions {
  /** Skip the simulate-and-rebuild step */
  skipSimulate?: boolean;
  /** Submit straight to the node, paying gas from the sender */
  noFeePayer?: boolean;
  /** Sent as `x-api-key` on node requests */
  nodeApiKey?: string;
  gasPriceManager?: GasPriceSource;
  /** Local clock adjustment in milliseconds */
  timeDeltaMs?: number;
  /** Defaults to the bundled ABIs for `config.chainId` */
  abiRegistry?: AbiRegistry;
  /** Default: 1000 */
  pollIntervalMs?: number;
  /** Default: 30000 */
  timeoutMs?: number;
}

export interface BuildTxOverrides {
  maxGasAmount?: number;
  gasUnitPrice?: number;
}

export interface WaitOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

export interface SendTxOptions {
  /** Sign with this account instead of the client's */
  account?: TransactionSigner;
  signal?: AbortSignal;
}

export interface SimulatedGas {
  maxGasAmount: number;
  gasUnitPrice: number;
}

const transactionEventSchema = z
  .object({
    type: z.string(),
    data: z.unknown(),
  })
  .passthrough();

export const committedTransactionSchema = z
  .object({
    hash: z.string(),
    success: z.boolean(),
    vm_status: z.string().default(""),
    version: z.string().optional(),
    events: z.array(transactionEventSchema).default([]),
  })
  .passthrough();

export type TransactionEvent = z.infer<typeof transactionEventSchema>;

/** A transaction the node reports as committed */
export type CommittedTransaction = z.infer<typeof committedTransactionSchema>;

/**
 * Gas limit and price for the rebuild after simulation:
 * limit `min(max(2 * simulated, 200000), 2000000)`, price at least 1.
 */
export function computeGasBounds(simulated: SimulatedGas): SimulatedGas {
  return {
    maxGasAmount: Math.min(Math.max(simulated.maxGasAmount * 2, DEFAULT_MAX_GAS_AMOUNT), MAX_GAS_UNITS_LIMIT),
    gasUnitPrice: Math.max(simulated.gasUnitPrice, 1),
  };
}

/**
 * `SignedTransaction` with all-zero signatures, as the simulation
 * endpoint expects.
 */
export function serializeForSimulation(transaction: SimpleTransaction, publicKey: Uint8Array): Uint8Array {
  const zeroAuth: Ed25519AuthenticatorData = { publicKey, signature: new Uint8Array(64) };
  const authenticator =
    transaction.feePayerAddress !== undefined
      ? {
          FeePayer: {
            sender: { Ed25519: zeroAuth },
            secondarySignerAddresses: [],
            secondarySigners: [],
            feePayerAddress: transaction.feePayerAddress,
            feePayerAuthenticator: { Ed25519: zeroAuth },
          },
        }
      : { Ed25519: zeroAuth };

  return SignedTransaction.serialize(
    { rawTxn: rawTransactionInput(transaction.rawTransaction), authenticator },
    BCS_WRITER_OPTIONS
  ).toBytes();
}

/** Raw transaction BCS followed by the sender's `AccountAuthenticator` */
export function serializeSignedTransaction(
  transaction: SimpleTransaction,
  senderAuth: Ed25519AuthenticatorData
): Uint8Array {
  const raw = serializeRawTransaction(transaction.rawTransaction);
  const auth = serializeAccountAuthenticator(senderAuth);
  const out = new Uint8Array(raw.length + auth.length);
  out.set(raw, 0);
  out.set(auth, raw.length);
  return out;
}

function parseGasField(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && /^\d+$/.test(value)) return Number(value);
  return undefined;
}

function toTransactionError(error: unknown, hash?: string): TransactionError {
  if (error instanceof TransactionError) return error;
  if (error instanceof Error && error.name === "AbortError") return TransactionError.aborted(hash);
  const message = error instanceof Error ? error.message : String(error);
  return new TransactionError("Http", `Request failed: ${message}`, { hash, cause: error });
}

// ============================================================================
// CLIENT
// ============================================================================

/**
 * Sends entry-function calls as orderless transactions.
 *
 * @example
 * ```typescript
 * const client = new TransactionClient(TESTNET_CONFIG, account);
 * const committed = await client.sendTx({
 *   function: `${TESTNET_CONFIG.deployment.package}::dex_accounts_entry::create_new_subaccount`,
 *   functionArguments: [],
 * });
 * console.log(committed.hash);
 * ```
 */
export class TransactionClient {
  readonly config: DexConfig;
  readonly account: TransactionSigner;
  readonly abiRegistry: AbiRegistry;
  readonly skipSimulate: boolean;
  readonly noFeePayer: boolean;
  timeDeltaMs: number;

  private readonly nodeApiKey?: string;
  private readonly gasPriceManager?: GasPriceSource;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;

  constructor(config: DexConfig, account: TransactionSigner, options: TransactionClientOptions = {}) {
    this.config = config;
    this.account = account;
    this.skipSimulate = options.skipSimulate ?? false;
    this.noFeePayer = options.noFeePayer ?? false;
    this.nodeApiKey = options.nodeApiKey;
    this.gasPriceManager = options.gasPriceManager;
    this.timeDeltaMs = options.timeDeltaMs ?? 0;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TXN_TIMEOUT_MS;

    if (config.chainId === undefined) {
      console.warn("Using default ABI for unknown chainId, this might cause issues with the transaction builder");
    }
    this.abiRegistry = options.abiRegistry ?? new AbiRegistry(config.chainId);
  }

  // ============================================================================
  // BUILD
  // ============================================================================

  /**
   * Build an orderless transaction. Missing ABI or chain id fails before
   * any network call.
   */
  async buildTx(
    data: InputEntryFunctionData,
    sender: AccountAddressInput,
    overrides: BuildTxOverrides = {}
  ): Promise<SimpleTransaction> {
    const replayProtectionNonce = nextReplayProtectionNonce();

    const abi = this.abiRegistry.getFunction(data.function);
    const chainId = this.config.chainId;
    if (abi === undefined || chainId === undefined) {
      throw TransactionError.configuration(
        `Cannot build transaction: missing ABI for ${data.function} or chainId is undefined`
      );
    }

    const gasUnitPrice = overrides.gasUnitPrice ?? (await this.resolveGasPrice());

    return buildSimpleTransaction({
      sender,
      data,
      chainId,
      gasUnitPrice,
      abi,
      withFeePayer: !this.noFeePayer,
      replayProtectionNonce,
      timeDeltaMs: this.timeDeltaMs,
      maxGasAmount: overrides.maxGasAmount ?? DEFAULT_MAX_GAS_AMOUNT,
    });
  }

  private async resolveGasPrice(): Promise<number> {
    if (this.gasPriceManager) {
      return this.gasPriceManager.getGasPrice() ?? (await this.gasPriceManager.fetchAndSetGasPrice());
    }
    return this.fetchGasPriceEstimation();
  }

  /**
   * One-shot node estimate, unmultiplied. Falls back to 100 when the
   * response has no `gas_estimate`.
   */
  async fetchGasPriceEstimation(): Promise<number> {
    const response = await fetch(`${this.config.fullnodeUrl}/estimate_gas_price`, {
      method: "GET",
      headers: nodeHeaders(this.nodeApiKey),
    });
    if (!response.ok) {
      throw TransactionError.http(response.status, await responseText(response));
    }
    const data = await responseJson(response);
    const estimate = isRecord(data) ? parseGasField(data.gas_estimate) : undefined;
    return Math.floor(estimate ?? DEFAULT_GAS_ESTIMATE);
  }

  // ============================================================================
  // SIMULATE / SIGN / SUBMIT
  // ============================================================================

  /**
   * Simulate with placeholder signatures and return the node's gas figures.
   */
  async simulateTx(transaction: SimpleTransaction, publicKey: Uint8Array = this.account.publicKey): Promise<SimulatedGas> {
    const query = new URLSearchParams({
      estimate_max_gas_amount: "true",
      estimate_gas_unit_price: "true",
    });
    const response = await fetch(`${this.config.fullnodeUrl}/transactions/simulate?${query.toString()}`, {
      method: "POST",
      headers: nodeHeaders(this.nodeApiKey, { "Content-Type": SIGNED_TRANSACTION_CONTENT_TYPE }),
      body: serializeForSimulation(transaction, publicKey),
    });

    if (!response.ok) {
      throw TransactionError.simulation(response.status, await responseText(response));
    }

    const data = await responseJson(response);
    if (!Array.isArray(data) || data.length === 0) {
      throw TransactionError.emptySimulation("Transaction simulation returned empty results");
    }
    const first: unknown = data[0];
    const maxGasAmount = isRecord(first) ? parseGasField(first.max_gas_amount) : undefined;
    const gasUnitPrice = isRecord(first) ? parseGasField(first.gas_unit_price) : undefined;
    if (maxGasAmount === undefined || gasUnitPrice === undefined) {
      throw TransactionError.emptySimulation("Transaction simulation returned no results");
    }
    return { maxGasAmount, gasUnitPrice };
  }

  /**
   * Sign as sender. The fee-payer form is used whenever the transaction
   * carries a fee-payer slot.
   */
  signTx(transaction: SimpleTransaction, signer: TransactionSigner = this.account): Ed25519AuthenticatorData {
    return signer.signTransaction(transaction);
  }

  /**
   * Submit through the fee-payer relay, or directly when `noFeePayer`.
   */
  async submitTx(
    transaction: SimpleTransaction,
    senderAuth: Ed25519AuthenticatorData
  ): Promise<PendingTransactionResponse> {
    if (this.noFeePayer) {
      return this.submitDirect(transaction, senderAuth);
    }
    return submitFeePaidTransaction(this.config, transaction, senderAuth);
  }

  /**
   * POST the signed transaction to the node, sender paying gas.
   */
  async submitDirect(
    transaction: SimpleTransaction,
    senderAuth: Ed25519AuthenticatorData
  ): Promise<PendingTransactionResponse> {
    const response = await fetch(`${this.config.fullnodeUrl}/transactions`, {
      method: "POST",
      headers: nodeHeaders(this.nodeApiKey, { "Content-Type": SIGNED_TRANSACTION_CONTENT_TYPE }),
      body: serializeSignedTransaction(transaction, senderAuth),
    });

    if (!response.ok) {
      throw TransactionError.submission(response.status, await responseText(response));
    }

    const data = await responseJson(response);
    const hash = isRecord(data) && data.hash !== undefined && data.hash !== null ? String(data.hash) : "";
    return pendingFromTransaction(hash, transaction);
  }

  // ============================================================================
  // WAIT
  // ============================================================================

  /**
   * Poll until the transaction commits.
   *
   * @throws {TransactionError} `ExecutionFailed` when it committed with
   * `success: false`, `Timeout` after the deadline, `Aborted` when the
   * signal fires
   */
  async waitForTransaction(hash: string, options: WaitOptions = {}): Promise<CommittedTransaction> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const pollIntervalMs = options.pollIntervalMs ?? this.pollIntervalMs;
    const { signal } = options;
    const url = `${this.config.fullnodeUrl}/transactions/by_hash/${hash}`;
    const headers = nodeHeaders(this.nodeApiKey);
    const start = Date.now();

    for (;;) {
      if (signal?.aborted) {
        throw TransactionError.aborted(hash);
      }
      const remaining = timeoutMs - (Date.now() - start);
      if (remaining <= 0) {
        throw TransactionError.timeout(hash, timeoutMs);
      }

      // Each poll is cut off at the overall deadline
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), remaining);
      const onAbort = () => controller.abort();
      signal?.addEventListener("abort", onAbort, { once: true });

      let data: unknown;
      let ok = false;
      try {
        const response = await fetch(url, { method: "GET", headers, signal: controller.signal });
        ok = response.ok;
        data = ok ? await responseJson(response) : undefined;
      } catch (e) {
        if (signal?.aborted) throw TransactionError.aborted(hash);
        if (controller.signal.aborted) throw TransactionError.timeout(hash, timeoutMs);
        throw toTransactionError(e, hash);
      } finally {
        clearTimeout(timeoutId);
        signal?.removeEventListener("abort", onAbort);
      }

      if (ok && isRecord(data) && data.type !== "pending_transaction") {
        if (data.success === true) {
          return committedTransactionSchema.parse(data);
        }
        if (data.success === false) {
          const vmStatus = typeof data.vm_status === "string" ? data.vm_status : "Unknown error";
          throw TransactionError.executionFailed(hash, vmStatus);
        }
      }

      const left = timeoutMs - (Date.now() - start);
      if (left <= 0) {
        throw TransactionError.timeout(hash, timeoutMs);
      }

      await sleep(Math.min(pollIntervalMs, left), signal).catch(() => {
        throw TransactionError.aborted(hash);
      });
    }
  }

  // ============================================================================
  // PIPELINE
  // ============================================================================

  /**
   * Build, simulate and rebuild, sign, submit, and wait for commit.
   */
  async sendTx(data: InputEntryFunctionData, options: SendTxOptions = {}): Promise<CommittedTransaction> {
    if (options.signal?.aborted) {
      throw TransactionError.aborted();
    }
    const signer = options.account ?? this.account;
    const sender = signer.address;

    let transaction = await this.buildTx(data, sender);

    if (!this.skipSimulate) {
      const simulated = await this.simulateTx(transaction, signer.publicKey);
      transaction = await this.buildTx(data, sender, computeGasBounds(simulated));
    }

    const senderAuth = this.signTx(transaction, signer);
    const pending = await this.submitTx(transaction, senderAuth);
    return this.waitForTransaction(pending.hash, { signal: options.signal });
  }

  /** Primary subaccount of `owner` under this deployment */
  getPrimarySubaccountAddress(owner: AccountAddressInput): string {
    return getPrimarySubaccountAddress(owner, this.config.deployment.package).toString();
  }

  /** Address of the signing account */
  get address(): AccountAddress {
    return this.account.address;
  }
}
