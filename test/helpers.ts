/**
 * Shared fixtures for tests: fetch responses, a small ABI document and a
 * deterministic signer.
 */

import { vi } from "vitest";
import { AbiRegistry } from "../src/abi/registry";
import { createDeployment, type DexConfig } from "../src/shared/config";
import { Ed25519Account } from "../src/transaction/account";

export const TEST_PACKAGE = "0x0000000000000000000000000000000000000000000000000000000000000abc";

export const TEST_CONFIG: DexConfig = {
  network: "custom",
  fullnodeUrl: "http://node.test/v1",
  tradingHttpUrl: "http://trading.test",
  tradingWsUrl: "ws://trading.test/ws",
  gasStationUrl: "http://relay.test",
  deployment: createDeployment(TEST_PACKAGE),
  chainId: 4,
  compatVersion: "v0.4",
};

/** Fixed seed; not a real key */
export const TEST_SEED = new Uint8Array(32).fill(7);

export function testAccount(): Ed25519Account {
  return Ed25519Account.fromPrivateKey(TEST_SEED);
}

function fn(name: string, params: string[]) {
  return {
    name,
    visibility: "public",
    is_entry: true,
    is_view: false,
    generic_type_params: [],
    params,
    return: [],
  };
}

export const TEST_ABI_JSON = {
  packageAddress: TEST_PACKAGE,
  network: "custom",
  fullnodeUrl: "http://node.test/v1",
  fetchedAt: "2026-01-01T00:00:00.000Z",
  abis: {
    [`${TEST_PACKAGE}::counter::bump`]: fn("bump", ["&signer", "u64"]),
    [`${TEST_PACKAGE}::counter::label`]: fn("label", ["&signer", "0x1::string::String", "0x1::option::Option<u64>"]),
  },
  errors: [],
  summary: { totalModules: 1, totalFunctions: 2, successful: 2, failed: 0 },
  modules: ["counter"],
};

export function testRegistry(): AbiRegistry {
  return AbiRegistry.fromJson(TEST_ABI_JSON, TEST_CONFIG.chainId);
}

export interface MockResponseInit {
  ok?: boolean;
  status?: number;
  body?: unknown;
  text?: string;
}

/** Minimal `Response` stand-in for a mocked `fetch` */
export function mockResponse(init: MockResponseInit = {}) {
  const status = init.status ?? 200;
  const text = init.text ?? JSON.stringify(init.body ?? {});
  return {
    ok: init.ok ?? (status >= 200 && status < 300),
    status,
    url: "",
    json: async () => JSON.parse(text),
    text: async () => text,
  };
}

export function installFetchMock() {
  const fetchMock = vi.fn();
  global.fetch = fetchMock as unknown as typeof fetch;
  return fetchMock;
}

/** URL and init of the nth fetch call */
export function fetchCall(fetchMock: ReturnType<typeof vi.fn>, index: number): { url: string; init: RequestInit } {
  const [url, init] = fetchMock.mock.calls[index];
  return { url: String(url), init: init ?? {} };
}
