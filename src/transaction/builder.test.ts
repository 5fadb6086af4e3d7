import { describe, it, expect } from "vitest";
import {
  buildSimpleTransaction,
  generateExpireTimestamp,
  parseFunctionId,
  rawTransactionBytes,
  type BuildTransactionParams,
} from "./builder";
import { AccountAddress } from "../shared/address";
import { TransactionError } from "./error";
import { testRegistry, TEST_PACKAGE } from "../../test/helpers";

const SENDER = "0x00000000000000000000000000000000000000000000000000000000000000aa";

function params(overrides: Partial<BuildTransactionParams> = {}): BuildTransactionParams {
  const fn = `${TEST_PACKAGE}::counter::bump`;
  const abi = testRegistry().getFunction(fn);
  if (!abi) throw new Error("fixture ABI missing");
  return {
    sender: SENDER,
    data: { function: fn, functionArguments: [5] },
    chainId: 4,
    gasUnitPrice: 150,
    abi,
    withFeePayer: true,
    replayProtectionNonce: 0x0102030405060708n,
    ...overrides,
  };
}

describe("parseFunctionId", () => {
  it("splits three segments", () => {
    const id = parseFunctionId("0x1::coin::transfer");
    expect(id.moduleAddress.toString()).toBe("0x1");
    expect(id.moduleName).toBe("coin");
    expect(id.functionName).toBe("transfer");
  });

  it("rejects other shapes", () => {
    expect(() => parseFunctionId("0x1::coin")).toThrow(TransactionError);
    expect(() => parseFunctionId("0x1::coin::a::b")).toThrow("Invalid function format");
  });
});

describe("generateExpireTimestamp", () => {
  it("adds the clock skew before flooring", () => {
    expect(generateExpireTimestamp(500, 20, 1_700_000_000_600)).toBe(1_700_000_021);
  });

  it("defaults to a 20 second horizon", () => {
    expect(generateExpireTimestamp(0, undefined, 1_000_000)).toBe(1_020);
  });
});

describe("buildSimpleTransaction", () => {
  it("uses the orderless sentinel sequence number", () => {
    const tx = buildSimpleTransaction(params());
    expect(tx.rawTransaction.sequenceNumber).toBe(0xdeadbeefn);
    expect(tx.rawTransaction.maxGasAmount).toBe(200_000n);
    expect(tx.rawTransaction.gasUnitPrice).toBe(150n);
  });

  it("fills the fee-payer slot with the zero address", () => {
    expect(buildSimpleTransaction(params()).feePayerAddress?.equals(AccountAddress.ZERO)).toBe(true);
    expect(buildSimpleTransaction(params({ withFeePayer: false })).feePayerAddress).toBeUndefined();
  });

  it("serializes the orderless payload", () => {
    const bytes = rawTransactionBytes(buildSimpleTransaction(params({ maxGasAmount: 300 })));
    const n = bytes.length;

    expect(Array.from(bytes.slice(0, 32))).toEqual(Array.from(AccountAddress.fromString(SENDER).toUint8Array()));
    expect(Array.from(bytes.slice(32, 40))).toEqual([0xef, 0xbe, 0xad, 0xde, 0, 0, 0, 0]);
    // Payload, inner V1, entry-function executable
    expect(Array.from(bytes.slice(40, 43))).toEqual([4, 0, 1]);

    // Extra config V1, no multisig, Some(nonce)
    expect(Array.from(bytes.slice(n - 36, n - 25))).toEqual([0, 0, 1, 8, 7, 6, 5, 4, 3, 2, 1]);
    expect(Array.from(bytes.slice(n - 25, n - 17))).toEqual([0x2c, 0x01, 0, 0, 0, 0, 0, 0]);
    expect(Array.from(bytes.slice(n - 17, n - 9))).toEqual([150, 0, 0, 0, 0, 0, 0, 0]);
    expect(bytes[n - 1]).toBe(4);
  });

  it("encodes arguments against the ABI", () => {
    const tx = buildSimpleTransaction(params());
    expect(Array.from(tx.rawTransaction.entryFunction.args[0])).toEqual([5, 0, 0, 0, 0, 0, 0, 0]);
    expect(tx.rawTransaction.entryFunction.moduleName).toBe("counter");
  });

  it("parses type arguments", () => {
    const tx = buildSimpleTransaction(
      params({ data: { function: `${TEST_PACKAGE}::counter::bump`, functionArguments: [1], typeArguments: ["u8"] } })
    );
    expect(tx.rawTransaction.entryFunction.typeArgs).toEqual([{ kind: "u8" }]);
  });
});
