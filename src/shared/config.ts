/**
 * Network configuration for the exchange deployments.
 */

import { z } from "zod";
import { AccountAddress, createObjectAddress } from "./address";

// ============================================================================
// TYPES
// ============================================================================

export type Network = "mainnet" | "testnet" | "custom";

/** Protocol release the SDK speaks */
export type CompatVersion = "v0.4";

export const DEFAULT_COMPAT_VERSION: CompatVersion = "v0.4";

/**
 * On-chain addresses of one deployment of the exchange package.
 */
export interface Deployment {
  package: string;
  usdc: string;
  testc: string;
  perpEngineGlobal: string;
}

/**
 * Everything needed to talk to one deployment: node, trading API,
 * fee-payer relay and contract addresses.
 */
export interface DexConfig {
  network: Network;
  fullnodeUrl: string;
  tradingHttpUrl: string;
  tradingWsUrl: string;
  /** Fee-payer relay base URL */
  gasStationUrl?: string;
  /** Bearer token for the fee-payer relay; selects the bearer relay protocol */
  gasStationApiKey?: string;
  deployment: Deployment;
  /** Undefined for local stacks, where the node is asked instead */
  chainId?: number;
  compatVersion: CompatVersion;
}

// ============================================================================
// DEPLOYMENTS
// ============================================================================

export function getUsdcAddress(packageAddress: string): string {
  return createObjectAddress(packageAddress, "USDC").toString();
}

export function getTestcAddress(packageAddress: string): string {
  return createObjectAddress(packageAddress, "TESTC").toString();
}

export function getPerpEngineGlobalAddress(packageAddress: string): string {
  return createObjectAddress(packageAddress, "GlobalPerpEngine").toString();
}

/**
 * Deployment whose token and engine objects live under the package.
 */
export function createDeployment(packageAddress: string): Deployment {
  return {
    package: AccountAddress.fromString(packageAddress).toString(),
    usdc: getUsdcAddress(packageAddress),
    testc: getTestcAddress(packageAddress),
    perpEngineGlobal: getPerpEngineGlobalAddress(packageAddress),
  };
}

const MAINNET_PACKAGE = "0xe6683d451db246750f180fb78d9b5e0a855dacba64ddf5810dffdaeb221e46bf";
const MAINNET_USDC = "0xbae207659db88bea0cbead6da0ed00aac12edcdda169e591cd41c94180b46f3b";
const NETNA_PACKAGE = "0xb8a5788314451ce4d2fbbad32e1bad88d4184b73943b7fe5166eab93cf1a5a95";
const TESTNET_PACKAGE = "0x952535c3049e52f195f26798c2f1340d7dd5100edbe0f464e520a974d16fbe9f";

export const MAINNET_DEPLOYMENT: Deployment = {
  package: MAINNET_PACKAGE,
  usdc: MAINNET_USDC,
  testc: getTestcAddress(MAINNET_PACKAGE),
  perpEngineGlobal: getPerpEngineGlobalAddress(MAINNET_PACKAGE),
};

// ============================================================================
// NAMED CONFIGS
// ============================================================================

export const MAINNET_CONFIG: DexConfig = {
  network: "mainnet",
  fullnodeUrl: "https://api.mainnet.aptoslabs.com/v1",
  tradingHttpUrl: "https://api.mainnet.aptoslabs.com/decibel",
  tradingWsUrl: "wss://api.mainnet.aptoslabs.com/decibel/ws",
  gasStationUrl: "https://api.mainnet.aptoslabs.com/gs/v1",
  deployment: MAINNET_DEPLOYMENT,
  chainId: 1,
  compatVersion: DEFAULT_COMPAT_VERSION,
};

export const NETNA_CONFIG: DexConfig = {
  network: "custom",
  fullnodeUrl: "https://api.netna.staging.aptoslabs.com/v1",
  tradingHttpUrl: "https://api.netna.staging.aptoslabs.com/decibel",
  tradingWsUrl: "wss://api.netna.staging.aptoslabs.com/decibel/ws",
  gasStationUrl: "https://api.netna.staging.aptoslabs.com/gs/v1",
  deployment: createDeployment(NETNA_PACKAGE),
  chainId: 208,
  compatVersion: DEFAULT_COMPAT_VERSION,
};

export const TESTNET_CONFIG: DexConfig = {
  network: "testnet",
  fullnodeUrl: "https://api.testnet.aptoslabs.com/v1",
  tradingHttpUrl: "https://api.testnet.aptoslabs.com/decibel",
  tradingWsUrl: "wss://api.testnet.aptoslabs.com/decibel/ws",
  gasStationUrl: "https://api.testnet.aptoslabs.com/gs/v1",
  deployment: createDeployment(TESTNET_PACKAGE),
  chainId: 2,
  compatVersion: DEFAULT_COMPAT_VERSION,
};

export const LOCAL_CONFIG: DexConfig = {
  network: "custom",
  fullnodeUrl: "http://localhost:8080/v1",
  tradingHttpUrl: "http://localhost:8084",
  tradingWsUrl: "ws://localhost:8083",
  gasStationUrl: "http://localhost:8085",
  deployment: createDeployment(NETNA_PACKAGE),
  compatVersion: DEFAULT_COMPAT_VERSION,
};

export const DOCKER_CONFIG: DexConfig = {
  network: "custom",
  fullnodeUrl: "http://tradenet:8080/v1",
  tradingHttpUrl: "http://trading-api-http:8080",
  tradingWsUrl: "ws://trading-api-ws:8080",
  gasStationUrl: "http://fee-payer:8080",
  deployment: createDeployment(NETNA_PACKAGE),
  compatVersion: DEFAULT_COMPAT_VERSION,
};

export const NAMED_CONFIGS = {
  mainnet: MAINNET_CONFIG,
  netna: NETNA_CONFIG,
  testnet: TESTNET_CONFIG,
  local: LOCAL_CONFIG,
  docker: DOCKER_CONFIG,
} satisfies Record<string, DexConfig>;

export type NamedConfig = keyof typeof NAMED_CONFIGS;

// ============================================================================
// ENVIRONMENT
// ============================================================================

export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    const message = issues.map((issue) => `  - ${issue.path.join(".")}: ${issue.message}`).join("\n");
    super(`Configuration validation failed with the following issues:\n${message}`);
    this.name = "ConfigError";
  }
}

const envSchema = z.object({
  DEX_NETWORK: z.enum(["mainnet", "netna", "testnet", "local", "docker"]).default("testnet"),
  DEX_FULLNODE_URL: z.string().url().optional(),
  DEX_TRADING_HTTP_URL: z.string().url().optional(),
  DEX_TRADING_WS_URL: z.string().url().optional(),
  DEX_GAS_STATION_URL: z.string().url().optional(),
  DEX_GAS_STATION_API_KEY: z.string().min(1).optional(),
  DEX_CHAIN_ID: z.coerce.number().int().min(0).max(255).optional(),
});

export type DexEnv = z.infer<typeof envSchema>;

/**
 * Build a config from environment variables: `DEX_NETWORK` picks the
 * preset, the remaining `DEX_*` variables override its fields.
 * Empty strings count as unset.
 */
export function configFromEnv(env: Record<string, string | undefined> = process.env): DexConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith("DEX_") && value !== undefined && value !== "") {
      present[key] = value;
    }
  }

  const result = envSchema.safeParse(present);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  const vars = result.data;
  const base = NAMED_CONFIGS[vars.DEX_NETWORK];

  return {
    ...base,
    fullnodeUrl: vars.DEX_FULLNODE_URL ?? base.fullnodeUrl,
    tradingHttpUrl: vars.DEX_TRADING_HTTP_URL ?? base.tradingHttpUrl,
    tradingWsUrl: vars.DEX_TRADING_WS_URL ?? base.tradingWsUrl,
    gasStationUrl: vars.DEX_GAS_STATION_URL ?? base.gasStationUrl,
    gasStationApiKey: vars.DEX_GAS_STATION_API_KEY ?? base.gasStationApiKey,
    chainId: vars.DEX_CHAIN_ID ?? base.chainId,
  };
}
