/**
 * Cached gas unit price with periodic refresh.
 */

import { isRecord } from "../shared/json";
import type { DexConfig } from "../shared/config";
import { TransactionError } from "./error";
import { nodeHeaders, responseJson, responseText, sleep } from "./http";

export interface GasPriceInfo {
  gasEstimate: number;
  /** Milliseconds since epoch */
  timestamp: number;
}

export interface GasPriceManagerOptions {
  /** Sent as `x-api-key` to the fullnode */
  nodeApiKey?: string;
  /** Applied to the node estimate before caching (default: 2) */
  multiplier?: number;
  /** Background refresh period (default: 60000) */
  refreshIntervalMs?: number;
}

const DEFAULT_OPTIONS: Required<Omit<GasPriceManagerOptions, "nodeApiKey">> = {
  multiplier: 2,
  refreshIntervalMs: 60_000,
};

/**
 * Keeps a multiplied node gas estimate warm for the transaction builder.
 *
 * @example
 * ```typescript
 * const gas = new GasPriceManager(TESTNET_CONFIG);
 * await gas.initialize();
 * const client = new WriteClient(TESTNET_CONFIG, account, { gasPriceManager: gas });
 * // ...
 * await gas.destroy();
 * ```
 */
export class GasPriceManager {
  private readonly config: DexConfig;
  private readonly nodeApiKey?: string;
  private readonly multiplier: number;
  private readonly refreshIntervalMs: number;

  private info: GasPriceInfo | null = null;
  private initialized = false;
  private initializing: Promise<void> | null = null;
  private loopController: AbortController | null = null;
  private loopRun: Promise<void> | null = null;
  private inflightRefresh: Promise<void> | null = null;

  constructor(config: DexConfig, options: GasPriceManagerOptions = {}) {
    this.config = config;
    this.nodeApiKey = options.nodeApiKey;
    this.multiplier = options.multiplier ?? DEFAULT_OPTIONS.multiplier;
    this.refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_OPTIONS.refreshIntervalMs;
  }

  /** Cached estimate, or null before the first successful fetch */
  get gasPrice(): number | null {
    return this.info?.gasEstimate ?? null;
  }

  getGasPrice(): number | null {
    return this.gasPrice;
  }

  get gasPriceInfo(): GasPriceInfo | null {
    return this.info;
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Fetch once and start the refresh loop. A failed first fetch is
   * logged and leaves the manager uninitialized.
   */
  initialize(): Promise<void> {
    if (this.initialized) {
      return Promise.resolve();
    }
    if (this.initializing === null) {
      this.initializing = this.start().finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  private async start(): Promise<void> {
    try {
      await this.fetchAndSetGasPrice();
      this.initialized = true;
      const controller = new AbortController();
      this.loopController = controller;
      this.loopRun = this.refreshLoop(controller.signal);
    } catch (e) {
      console.error("Failed to initialize gas price manager:", e);
    }
  }

  /**
   * Stop the refresh loop and drop the cache. Waits for a pending
   * initialization or refresh first.
   */
  async destroy(): Promise<void> {
    if (this.initializing) {
      await this.initializing;
    }
    this.loopController?.abort();
    this.loopController = null;
    const running = this.loopRun;
    this.loopRun = null;
    if (running) {
      await running;
    }
    if (this.inflightRefresh) {
      await this.inflightRefresh;
    }
    this.initialized = false;
    this.info = null;
  }

  /**
   * Trigger a refresh without waiting. Concurrent calls share one fetch.
   */
  refresh(): Promise<void> {
    if (this.inflightRefresh === null) {
      this.inflightRefresh = this.fetchAndSetGasPrice()
        .then(
          () => undefined,
          (e: unknown) => {
            console.warn("Failed to fetch gas price:", e);
          }
        )
        .finally(() => {
          this.inflightRefresh = null;
        });
    }
    return this.inflightRefresh;
  }

  /**
   * `floor(gas_estimate * multiplier)` from the node's estimate endpoint.
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
    const estimate = isRecord(data) && typeof data.gas_estimate === "number" ? data.gas_estimate : 0;
    return Math.floor(estimate * this.multiplier);
  }

  /**
   * Fetch and cache. Errors are logged and rethrown.
   */
  async fetchAndSetGasPrice(): Promise<number> {
    try {
      const gasEstimate = await this.fetchGasPriceEstimation();
      if (!gasEstimate) {
        throw TransactionError.internal("Gas estimation returned no gas estimate");
      }
      this.info = { gasEstimate, timestamp: Date.now() };
      return gasEstimate;
    } catch (e) {
      console.error("Failed to fetch gas price:", e);
      throw e;
    }
  }

  private async refreshLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const slept = await sleep(this.refreshIntervalMs, signal).then(
        () => true,
        () => false
      );
      if (!slept) {
        return;
      }
      try {
        await this.fetchAndSetGasPrice();
      } catch (e) {
        console.warn("Failed to fetch gas price during refresh:", e);
      }
    }
  }
}
