/**
 * Lookup of function signatures per chain.
 */

import { abiDataSchema, type AbiData, type MoveFunction, type MoveFunctionId } from "./types";
import netnaAbi from "./json/netna.json";
import testnetAbi from "./json/testnet.json";

export const CHAIN_ID_NETNA = 208;
export const CHAIN_ID_TESTNET = 2;

type AbiSource = "netna" | "testnet";

const SOURCES: Record<AbiSource, unknown> = {
  netna: netnaAbi,
  testnet: testnetAbi,
};

const parsed = new Map<AbiSource, AbiData>();

function loadAbiData(source: AbiSource): AbiData {
  const cached = parsed.get(source);
  if (cached) {
    return cached;
  }
  const data = abiDataSchema.parse(SOURCES[source]);
  parsed.set(source, data);
  return data;
}

/**
 * Pick the bundled ABI document for a chain id. Unknown chains fall back
 * to netna with a warning; an absent chain id falls back silently.
 */
export function abiSourceForChain(chainId: number | undefined): AbiSource {
  if (chainId === CHAIN_ID_NETNA || chainId === undefined) {
    return "netna";
  }
  if (chainId === CHAIN_ID_TESTNET) {
    return "testnet";
  }
  console.warn(`Unknown chain id ${chainId}, falling back to netna ABIs`);
  return "netna";
}

/**
 * Function signatures of one deployment.
 *
 * Construct once per chain and pass it to the clients that need it.
 * Parsed documents are shared between registries of the same chain.
 *
 * @example
 * ```typescript
 * const registry = new AbiRegistry(208);
 * const fn = registry.getFunction(`${pkg}::dex_accounts_entry::deposit_to_subaccount_at`);
 * ```
 */
export class AbiRegistry {
  readonly chainId: number | undefined;
  private data: AbiData | null = null;
  private readonly preset: AbiData | null;

  /**
   * @param data - use this document instead of the bundled one
   */
  constructor(chainId?: number, data?: AbiData) {
    this.chainId = chainId;
    this.preset = data ?? null;
  }

  /** Build a registry from an ABI document fetched elsewhere */
  static fromJson(json: unknown, chainId?: number): AbiRegistry {
    return new AbiRegistry(chainId, abiDataSchema.parse(json));
  }

  get abiData(): AbiData {
    if (this.data === null) {
      this.data = this.preset ?? loadAbiData(abiSourceForChain(this.chainId));
    }
    return this.data;
  }

  get packageAddress(): string {
    return this.abiData.packageAddress;
  }

  get modules(): string[] {
    return this.abiData.modules;
  }

  getFunction(functionId: MoveFunctionId): MoveFunction | undefined {
    return this.abiData.abis[functionId];
  }

  hasFunction(functionId: MoveFunctionId): boolean {
    return functionId in this.abiData.abis;
  }

  getAllFunctions(): Record<MoveFunctionId, MoveFunction> {
    return this.abiData.abis;
  }

  getEntryFunctions(): Record<MoveFunctionId, MoveFunction> {
    return this.filter((fn) => fn.isEntry);
  }

  getViewFunctions(): Record<MoveFunctionId, MoveFunction> {
    return this.filter((fn) => fn.isView);
  }

  getModuleFunctions(moduleName: string): Record<MoveFunctionId, MoveFunction> {
    const pattern = `::${moduleName}::`;
    return this.filter((_, id) => id.includes(pattern));
  }

  private filter(
    predicate: (fn: MoveFunction, id: MoveFunctionId) => boolean
  ): Record<MoveFunctionId, MoveFunction> {
    const result: Record<MoveFunctionId, MoveFunction> = {};
    for (const [id, fn] of Object.entries(this.abiData.abis)) {
      if (predicate(fn, id)) {
        result[id] = fn;
      }
    }
    return result;
  }
}
