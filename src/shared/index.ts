/**
 * Shared configuration, addresses and numeric helpers used across all SDK modules.
 */

// ============================================================================
// CONFIGURATION
// ============================================================================
export {
  ConfigError,
  configFromEnv,
  createDeployment,
  getPerpEngineGlobalAddress,
  getTestcAddress,
  getUsdcAddress,
  DEFAULT_COMPAT_VERSION,
  DOCKER_CONFIG,
  LOCAL_CONFIG,
  MAINNET_CONFIG,
  MAINNET_DEPLOYMENT,
  NAMED_CONFIGS,
  NETNA_CONFIG,
  TESTNET_CONFIG,
} from "./config";
export type { CompatVersion, Deployment, DexConfig, DexEnv, NamedConfig, Network } from "./config";

// ============================================================================
// ADDRESSES
// ============================================================================
export {
  AccountAddress,
  ADDRESS_LENGTH,
  authKeyAddress,
  bcsStringSeed,
  createObjectAddress,
  getMarketAddress,
  getPrimarySubaccountAddress,
  getTradingCompetitionSubaccountAddress,
  getVaultShareAddress,
} from "./address";
export type { AccountAddressInput } from "./address";

// ============================================================================
// JSON
// ============================================================================
export { bigintReviver, isRecord, parseJson } from "./json";

// ============================================================================
// PRICE AND SIZE
// ============================================================================
export {
  amountToChainUnits,
  chainUnitsToAmount,
  roundToTickMultiple,
  roundToTickSize,
  roundToValidOrderSize,
  roundToValidPrice,
} from "./price";
export type { Numeric } from "./price";
