import { describe, it, expect } from "vitest";
import { bcs } from "@mysten/bcs";
import { encodeArgument, encodeFunctionArguments, entryParams, normalizeParamType } from "./encoder";
import { TransactionError } from "./error";
import { AccountAddress } from "../shared/address";

const u64 = (n: number) => {
  const out = new Array<number>(8).fill(0);
  out[0] = n & 0xff;
  out[1] = (n >> 8) & 0xff;
  return out;
};

describe("encodeArgument", () => {
  it("encodes bool", () => {
    expect(Array.from(encodeArgument(true, "bool"))).toEqual([1]);
    expect(Array.from(encodeArgument(false, "bool"))).toEqual([0]);
  });

  it("encodes unsigned integers little-endian", () => {
    expect(Array.from(encodeArgument(258, "u16"))).toEqual([2, 1]);
    expect(Array.from(encodeArgument("1000", "u64"))).toEqual(u64(1000));
    expect(Array.from(encodeArgument(1n, "u128"))).toEqual([1, ...new Array<number>(15).fill(0)]);
  });

  it.each([
    { type: "u8", reader: bcs.u8() },
    { type: "u16", reader: bcs.u16() },
    { type: "u32", reader: bcs.u32() },
    { type: "u64", reader: bcs.u64() },
    { type: "u128", reader: bcs.u128() },
    { type: "u256", reader: bcs.u256() },
  ])("decodes $type boundary values with a BCS reader", ({ type, reader }) => {
    const max = (1n << BigInt(type.slice(1))) - 1n;
    for (const value of [0n, max]) {
      expect(BigInt(String(reader.parse(encodeArgument(value, type))))).toBe(value);
    }
  });

  it("rejects out-of-range integers", () => {
    expect(() => encodeArgument(256, "u8")).toThrow("256 is out of range for u8");
    expect(() => encodeArgument(-1, "u64")).toThrow(TransactionError);
  });

  it("rejects unsafe numbers", () => {
    expect(() => encodeArgument(2 ** 60, "u64")).toThrow("pass a bigint");
  });

  it("rejects non-integer strings", () => {
    expect(() => encodeArgument("1.5", "u64")).toThrow("Cannot encode string as u64");
  });

  it("encodes String with a length prefix", () => {
    expect(Array.from(encodeArgument("hi", "0x1::string::String"))).toEqual([2, 104, 105]);
  });

  it("encodes Option", () => {
    expect(Array.from(encodeArgument(null, "0x1::option::Option<u64>"))).toEqual([0]);
    expect(Array.from(encodeArgument(undefined, "0x1::option::Option<u64>"))).toEqual([0]);
    expect(Array.from(encodeArgument(5, "0x1::option::Option<u64>"))).toEqual([1, ...u64(5)]);
  });

  it("encodes addresses and objects as 32 bytes", () => {
    const expected = [...new Array<number>(31).fill(0), 1];
    expect(Array.from(encodeArgument("0x1", "address"))).toEqual(expected);
    expect(
      Array.from(encodeArgument(AccountAddress.fromString("0x1"), "0x1::object::Object<0x1::fungible_asset::Metadata>"))
    ).toEqual(expected);
  });

  it("encodes vector<u8> from hex or bytes", () => {
    expect(Array.from(encodeArgument("0x0a0b", "vector<u8>"))).toEqual([2, 10, 11]);
    expect(Array.from(encodeArgument(new Uint8Array([9]), "vector<u8>"))).toEqual([1, 9]);
  });

  it("encodes vectors element by element", () => {
    expect(Array.from(encodeArgument([1, 2], "vector<u64>"))).toEqual([2, ...u64(1), ...u64(2)]);
    expect(Array.from(encodeArgument(["a", "bc"], "vector<0x1::string::String>"))).toEqual([2, 1, 97, 2, 98, 99]);
  });

  it("encodes nested options inside vectors", () => {
    expect(Array.from(encodeArgument([null, 3], "vector<0x1::option::Option<u8>>"))).toEqual([2, 0, 1, 3]);
  });

  it("rejects unsupported structs", () => {
    expect(() => encodeArgument(1, "0x1::table::Table<u64, u64>")).toThrow("Unsupported parameter type");
  });

  it("rejects malformed generics", () => {
    expect(() => encodeArgument([1], "vector<u64")).toThrow(TransactionError);
    expect(() => encodeArgument([1], "vector<u64>>")).toThrow(TransactionError);
  });

  it("rejects signer values", () => {
    expect(() => encodeArgument("0x1", "signer")).toThrow("signer arguments");
  });
});

describe("parameter lists", () => {
  it("normalizes references", () => {
    expect(normalizeParamType("&signer")).toBe("signer");
    expect(normalizeParamType("&mut u64")).toBe("u64");
  });

  it("drops only leading signers", () => {
    expect(entryParams(["&signer", "u64", "bool"])).toEqual(["u64", "bool"]);
    expect(entryParams(["u64"])).toEqual(["u64"]);
  });

  it("encodes a full argument list", () => {
    const args = encodeFunctionArguments([7, true], ["&signer", "u8", "bool"]);
    expect(args.map((a) => Array.from(a))).toEqual([[7], [1]]);
  });

  it("fails on argument count mismatch", () => {
    expect(() => encodeFunctionArguments([1, 2], ["&signer", "u64", "u64", "u64"])).toThrow(
      "Argument count mismatch: expected 3, got 2"
    );
  });
});
