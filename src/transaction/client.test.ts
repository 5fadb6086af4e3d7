import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TransactionClient, computeGasBounds, serializeForSimulation, serializeSignedTransaction } from "./client";
import { serializeAccountAuthenticator, serializeRawTransaction } from "./bcs";
import { TransactionError } from "./error";
import { Ed25519Account } from "./account";
import {
  fetchCall,
  installFetchMock,
  mockResponse,
  testAccount,
  testRegistry,
  TEST_CONFIG,
  TEST_PACKAGE,
} from "../../test/helpers";

const BUMP = { function: `${TEST_PACKAGE}::counter::bump`, functionArguments: [3] };

function client(options: ConstructorParameters<typeof TransactionClient>[2] = {}) {
  return new TransactionClient(TEST_CONFIG, testAccount(), {
    abiRegistry: testRegistry(),
    pollIntervalMs: 1,
    ...options,
  });
}

describe("computeGasBounds", () => {
  it("doubles the simulated gas within the floor and ceiling", () => {
    expect(computeGasBounds({ maxGasAmount: 150_000, gasUnitPrice: 100 })).toEqual({
      maxGasAmount: 300_000,
      gasUnitPrice: 100,
    });
    expect(computeGasBounds({ maxGasAmount: 10, gasUnitPrice: 0 })).toEqual({
      maxGasAmount: 200_000,
      gasUnitPrice: 1,
    });
    expect(computeGasBounds({ maxGasAmount: 5_000_000, gasUnitPrice: 7 }).maxGasAmount).toBe(2_000_000);
  });
});

describe("TransactionClient", () => {
  let fetchMock: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    fetchMock = installFetchMock();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("buildTx", () => {
    it("fails before any request when the ABI is missing", async () => {
      await expect(
        client().buildTx({ function: `${TEST_PACKAGE}::counter::missing` }, testAccount().address)
      ).rejects.toThrow(`Cannot build transaction: missing ABI for ${TEST_PACKAGE}::counter::missing`);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("fails before any request without a chain id", async () => {
      vi.spyOn(console, "warn").mockImplementation(() => undefined);
      const c = new TransactionClient({ ...TEST_CONFIG, chainId: undefined }, testAccount(), {
        abiRegistry: testRegistry(),
      });
      const error = await c.buildTx(BUMP, testAccount().address).catch((e: unknown) => e);
      expect(error).toMatchObject({ variant: "Configuration" });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("uses the caller's gas price when given", async () => {
      const tx = await client().buildTx(BUMP, testAccount().address, { gasUnitPrice: 321, maxGasAmount: 5_000 });
      expect(tx.rawTransaction.gasUnitPrice).toBe(321n);
      expect(tx.rawTransaction.maxGasAmount).toBe(5_000n);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("prefers the cached price of a gas source", async () => {
      const source = { getGasPrice: vi.fn(() => 444), fetchAndSetGasPrice: vi.fn(async () => 555) };
      const tx = await client({ gasPriceManager: source }).buildTx(BUMP, testAccount().address);
      expect(tx.rawTransaction.gasUnitPrice).toBe(444n);
      expect(source.fetchAndSetGasPrice).not.toHaveBeenCalled();
    });

    it("asks the gas source to fetch when its cache is empty", async () => {
      const source = { getGasPrice: vi.fn(() => null), fetchAndSetGasPrice: vi.fn(async () => 555) };
      const tx = await client({ gasPriceManager: source }).buildTx(BUMP, testAccount().address);
      expect(tx.rawTransaction.gasUnitPrice).toBe(555n);
    });

    it("queries the node without a gas source", async () => {
      fetchMock.mockResolvedValueOnce(mockResponse({ body: { gas_estimate: 130 } }));
      const tx = await client({ nodeApiKey: "test-key" }).buildTx(BUMP, testAccount().address);
      expect(tx.rawTransaction.gasUnitPrice).toBe(130n);
      expect(fetchMock).toHaveBeenCalledWith(
        "http://node.test/v1/estimate_gas_price",
        expect.objectContaining({ headers: { "x-api-key": "test-key" } })
      );
    });

    it("defaults the node estimate to 100", async () => {
      fetchMock.mockResolvedValueOnce(mockResponse({ body: {} }));
      expect(await client().fetchGasPriceEstimation()).toBe(100);
    });

    it("attaches a fee payer unless disabled", async () => {
      const withPayer = await client().buildTx(BUMP, testAccount().address, { gasUnitPrice: 1 });
      const direct = await client({ noFeePayer: true }).buildTx(BUMP, testAccount().address, { gasUnitPrice: 1 });
      expect(withPayer.feePayerAddress).toBeDefined();
      expect(direct.feePayerAddress).toBeUndefined();
    });

    it("draws a fresh nonce on every build", async () => {
      const c = client();
      const a = await c.buildTx(BUMP, testAccount().address, { gasUnitPrice: 1 });
      const b = await c.buildTx(BUMP, testAccount().address, { gasUnitPrice: 1 });
      expect(a.rawTransaction.replayProtectionNonce).not.toBe(b.rawTransaction.replayProtectionNonce);
    });
  });

  describe("simulateTx", () => {
    it("posts zero-signature BCS and reads the gas figures", async () => {
      const c = client({ nodeApiKey: "test-key" });
      const tx = await c.buildTx(BUMP, testAccount().address, { gasUnitPrice: 1 });
      fetchMock.mockResolvedValueOnce(mockResponse({ body: [{ max_gas_amount: "1200", gas_unit_price: "150" }] }));

      expect(await c.simulateTx(tx)).toEqual({ maxGasAmount: 1200, gasUnitPrice: 150 });

      const { url, init } = fetchCall(fetchMock, 0);
      expect(url).toBe(
        "http://node.test/v1/transactions/simulate?estimate_max_gas_amount=true&estimate_gas_unit_price=true"
      );
      expect(init.headers).toEqual({
        "x-api-key": "test-key",
        "Content-Type": "application/x.aptos.signed_transaction+bcs",
      });
      expect(init.body).toEqual(serializeForSimulation(tx, testAccount().publicKey));
    });

    it("rejects a non-2xx simulation", async () => {
      const c = client();
      const tx = await c.buildTx(BUMP, testAccount().address, { gasUnitPrice: 1 });
      fetchMock.mockResolvedValueOnce(mockResponse({ status: 400, text: "bad txn" }));
      await expect(c.simulateTx(tx)).rejects.toThrow("Transaction simulation failed: 400 - bad txn");
    });

    it("rejects an empty result list", async () => {
      const c = client();
      const tx = await c.buildTx(BUMP, testAccount().address, { gasUnitPrice: 1 });
      fetchMock.mockResolvedValueOnce(mockResponse({ body: [] }));
      await expect(c.simulateTx(tx)).rejects.toThrow("Transaction simulation returned empty results");
    });

    it("rejects results without gas fields", async () => {
      const c = client();
      const tx = await c.buildTx(BUMP, testAccount().address, { gasUnitPrice: 1 });
      fetchMock.mockResolvedValueOnce(mockResponse({ body: [{ max_gas_amount: "10" }] }));
      await expect(c.simulateTx(tx)).rejects.toThrow("Transaction simulation returned no results");
    });
  });

  describe("serialization", () => {
    it("uses the fee-payer authenticator for simulation when a fee payer is set", async () => {
      const tx = await client().buildTx(BUMP, testAccount().address, { gasUnitPrice: 1 });
      const raw = serializeRawTransaction(tx.rawTransaction);
      const bytes = serializeForSimulation(tx, testAccount().publicKey);
      // TransactionAuthenticator::FeePayer, sender AccountAuthenticator::Ed25519
      expect(bytes[raw.length]).toBe(3);
      expect(bytes[raw.length + 1]).toBe(0);
    });

    it("uses a plain Ed25519 authenticator otherwise", async () => {
      const tx = await client({ noFeePayer: true }).buildTx(BUMP, testAccount().address, { gasUnitPrice: 1 });
      const raw = serializeRawTransaction(tx.rawTransaction);
      const bytes = serializeForSimulation(tx, testAccount().publicKey);
      expect(bytes.length).toBe(raw.length + 1 + 1 + 32 + 1 + 64);
      expect(bytes[raw.length]).toBe(0);
      expect(bytes.slice(bytes.length - 64).every((b) => b === 0)).toBe(true);
    });

    it("appends the account authenticator for direct submission", async () => {
      const tx = await client({ noFeePayer: true }).buildTx(BUMP, testAccount().address, { gasUnitPrice: 1 });
      const auth = testAccount().signTransaction(tx);
      expect(Array.from(serializeSignedTransaction(tx, auth))).toEqual([
        ...Array.from(serializeRawTransaction(tx.rawTransaction)),
        ...Array.from(serializeAccountAuthenticator(auth)),
      ]);
    });
  });

  describe("submitDirect", () => {
    it("echoes the transaction fields with the node's hash", async () => {
      const c = client({ noFeePayer: true });
      const tx = await c.buildTx(BUMP, testAccount().address, { gasUnitPrice: 9 });
      fetchMock.mockResolvedValueOnce(mockResponse({ status: 202, body: { hash: "0xabc" } }));

      const pending = await c.submitTx(tx, c.signTx(tx));
      expect(pending.hash).toBe("0xabc");
      expect(pending.gas_unit_price).toBe("9");
      expect(fetchCall(fetchMock, 0).url).toBe("http://node.test/v1/transactions");
    });

    it("reports a rejected submission", async () => {
      const c = client({ noFeePayer: true });
      const tx = await c.buildTx(BUMP, testAccount().address, { gasUnitPrice: 9 });
      fetchMock.mockResolvedValueOnce(mockResponse({ status: 400, text: "SEQUENCE_NUMBER_TOO_OLD" }));
      await expect(c.submitDirect(tx, c.signTx(tx))).rejects.toThrow(
        "Transaction submission failed: 400 - SEQUENCE_NUMBER_TOO_OLD"
      );
    });
  });

  describe("waitForTransaction", () => {
    it("polls past pending and failed lookups", async () => {
      fetchMock
        .mockResolvedValueOnce(mockResponse({ status: 404, text: "not found" }))
        .mockResolvedValueOnce(mockResponse({ body: { type: "pending_transaction", hash: "0x1" } }))
        .mockResolvedValueOnce(
          mockResponse({ body: { type: "user_transaction", hash: "0x1", success: true, vm_status: "Executed successfully" } })
        );

      const committed = await client().waitForTransaction("0x1");
      expect(committed.hash).toBe("0x1");
      expect(committed.events).toEqual([]);
      expect(fetchMock).toHaveBeenCalledTimes(3);
      expect(fetchCall(fetchMock, 0).url).toBe("http://node.test/v1/transactions/by_hash/0x1");
    });

    it("raises the VM status of a failed transaction", async () => {
      fetchMock.mockResolvedValueOnce(
        mockResponse({ body: { type: "user_transaction", hash: "0x2", success: false, vm_status: "Move abort: EINSUFFICIENT" } })
      );
      const error = await client().waitForTransaction("0x2").catch((e: unknown) => e);
      expect(error).toBeInstanceOf(TransactionError);
      expect(error).toMatchObject({
        variant: "ExecutionFailed",
        vmStatus: "Move abort: EINSUFFICIENT",
        message: "Transaction failed: Move abort: EINSUFFICIENT",
      });
    });

    it("defaults a missing VM status", async () => {
      fetchMock.mockResolvedValueOnce(mockResponse({ body: { hash: "0x3", success: false } }));
      await expect(client().waitForTransaction("0x3")).rejects.toThrow("Transaction failed: Unknown error");
    });

    it("times out", async () => {
      fetchMock.mockResolvedValue(mockResponse({ body: { type: "pending_transaction" } }));
      const error = await client()
        .waitForTransaction("0x4", { timeoutMs: 20, pollIntervalMs: 5 })
        .catch((e: unknown) => e);
      expect(error).toMatchObject({ variant: "Timeout", hash: "0x4", timeoutMs: 20 });
    });

    it("times out while a lookup never answers", async () => {
      vi.useFakeTimers();
      try {
        fetchMock.mockImplementation(
          (_url: string, init?: RequestInit) =>
            new Promise((_resolve, reject) => {
              init?.signal?.addEventListener("abort", () => reject(new DOMException("aborted", "AbortError")));
            })
        );
        const waiting = client()
          .waitForTransaction("0x6", { timeoutMs: 30_000 })
          .catch((e: unknown) => e);
        await vi.advanceTimersByTimeAsync(30_000);
        expect(await waiting).toMatchObject({ variant: "Timeout", hash: "0x6", timeoutMs: 30_000 });
        expect(fetchMock).toHaveBeenCalledTimes(1);
      } finally {
        vi.useRealTimers();
      }
    });

    it("stops when aborted", async () => {
      fetchMock.mockResolvedValue(mockResponse({ body: { type: "pending_transaction" } }));
      const controller = new AbortController();
      const waiting = client().waitForTransaction("0x5", { pollIntervalMs: 1_000, signal: controller.signal });
      setTimeout(() => controller.abort(), 10);
      await expect(waiting).rejects.toMatchObject({ variant: "Aborted", hash: "0x5" });
    });
  });

  describe("sendTx", () => {
    it("simulates, rebuilds with the bounded gas, signs and submits through the relay", async () => {
      fetchMock
        .mockResolvedValueOnce(mockResponse({ body: [{ max_gas_amount: "150000", gas_unit_price: "0" }] }))
        .mockResolvedValueOnce(mockResponse({ body: { transactionHash: "0xdone" } }))
        .mockResolvedValueOnce(mockResponse({ body: { hash: "0xdone", success: true, vm_status: "Executed successfully" } }));

      const source = { getGasPrice: () => 100, fetchAndSetGasPrice: async () => 100 };
      const c = client({ gasPriceManager: source });
      const committed = await c.sendTx(BUMP);

      expect(committed.hash).toBe("0xdone");
      const relay = fetchCall(fetchMock, 1);
      expect(relay.url).toBe("http://relay.test/transactions");
      const body = JSON.parse(String(relay.init.body));
      expect(Array.isArray(body.transaction)).toBe(true);

      // The relay receives the rebuilt transaction: max gas 300000, price 1
      const bytes = Uint8Array.from(body.transaction);
      const n = bytes.length;
      expect(Array.from(bytes.slice(n - 25, n - 17))).toEqual([0xe0, 0x93, 0x04, 0, 0, 0, 0, 0]);
      expect(Array.from(bytes.slice(n - 17, n - 9))).toEqual([1, 0, 0, 0, 0, 0, 0, 0]);
    });

    it("skips simulation and submits directly when configured", async () => {
      fetchMock
        .mockResolvedValueOnce(mockResponse({ body: { hash: "0xdirect" } }))
        .mockResolvedValueOnce(mockResponse({ body: { hash: "0xdirect", success: true } }));

      const c = client({
        skipSimulate: true,
        noFeePayer: true,
        gasPriceManager: { getGasPrice: () => 100, fetchAndSetGasPrice: async () => 100 },
      });
      const committed = await c.sendTx(BUMP);

      expect(committed.hash).toBe("0xdirect");
      expect(fetchCall(fetchMock, 0).url).toBe("http://node.test/v1/transactions");
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("signs with an override account", async () => {
      const other = Ed25519Account.fromPrivateKey(new Uint8Array(32).fill(9));
      fetchMock
        .mockResolvedValueOnce(mockResponse({ body: { transactionHash: "0xother" } }))
        .mockResolvedValueOnce(mockResponse({ body: { hash: "0xother", success: true } }));

      const c = client({
        skipSimulate: true,
        gasPriceManager: { getGasPrice: () => 100, fetchAndSetGasPrice: async () => 100 },
      });
      await c.sendTx(BUMP, { account: other });

      const body = JSON.parse(String(fetchCall(fetchMock, 0).init.body));
      expect(body.transaction.slice(0, 32)).toEqual(Array.from(other.address.toUint8Array()));
    });
  });

  it("derives the primary subaccount under the deployment package", () => {
    const c = client();
    expect(c.getPrimarySubaccountAddress(testAccount().address)).toMatch(/^0x[0-9a-f]{64}$/);
  });
});
