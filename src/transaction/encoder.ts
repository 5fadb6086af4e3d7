/**
 * Argument encoder: typed call arguments to their BCS wire form, driven by
 * the parameter types of the target function.
 */

import { bcs, BcsWriter } from "@mysten/bcs";
import { AccountAddress } from "../shared/address";
import { BCS_WRITER_OPTIONS } from "./bcs";
import { TransactionError } from "./error";
import { isObjectTag, isStringTag, optionInner, parseTypeTag, typeTagToString, type TypeTag } from "./type_tag";

/**
 * A value accepted for an entry-function parameter.
 *
 * Integers may be given as `number` (safe integers only), `bigint` or a
 * decimal string; `vector<u8>` also takes a `Uint8Array` or a hex string;
 * `Option<T>` takes `null`/`undefined` for none.
 */
export type EntryArgument =
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | AccountAddress
  | null
  | undefined
  | readonly EntryArgument[];

const UINT_BITS = {
  u8: 8,
  u16: 16,
  u32: 32,
  u64: 64,
  u128: 128,
  u256: 256,
} as const;

type UintKind = keyof typeof UINT_BITS;

const DECIMAL = /^\d+$/;
const HEX = /^(0x)?([0-9a-fA-F]{2})*$/;

function describe(value: EntryArgument): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (value instanceof Uint8Array) return "Uint8Array";
  if (value instanceof AccountAddress) return "AccountAddress";
  return typeof value;
}

function toUint(value: EntryArgument, kind: UintKind): bigint {
  let n: bigint;
  if (typeof value === "bigint") {
    n = value;
  } else if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw TransactionError.encoding(`${value} is not a safe integer for ${kind}; pass a bigint`);
    }
    n = BigInt(value);
  } else if (typeof value === "string" && DECIMAL.test(value)) {
    n = BigInt(value);
  } else {
    throw TransactionError.encoding(`Cannot encode ${describe(value)} as ${kind}`);
  }
  const bits = UINT_BITS[kind];
  if (n < 0n || n >= 1n << BigInt(bits)) {
    throw TransactionError.encoding(`${n} is out of range for ${kind}`);
  }
  return n;
}

function writeUint(n: bigint, kind: UintKind, writer: BcsWriter): void {
  switch (kind) {
    case "u8":
      writer.write8(n);
      break;
    case "u16":
      writer.write16(n);
      break;
    case "u32":
      writer.write32(n);
      break;
    case "u64":
      writer.write64(n);
      break;
    case "u128":
      writer.write128(n);
      break;
    case "u256":
      writer.write256(n);
      break;
  }
}

function toAddress(value: EntryArgument, typeName: string): AccountAddress {
  if (typeof value === "string" || value instanceof AccountAddress || value instanceof Uint8Array) {
    try {
      return AccountAddress.from(value);
    } catch (e) {
      throw TransactionError.encoding(`Invalid ${typeName}: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  throw TransactionError.encoding(`Cannot encode ${describe(value)} as ${typeName}`);
}

function toByteVector(value: EntryArgument): Uint8Array {
  if (value instanceof Uint8Array) {
    return value;
  }
  if (typeof value === "string") {
    if (!HEX.test(value)) {
      throw TransactionError.encoding(`Invalid hex string for vector<u8>: ${value}`);
    }
    return Uint8Array.from(Buffer.from(value.replace(/^0x/, ""), "hex"));
  }
  if (Array.isArray(value)) {
    return Uint8Array.from(value.map((item: EntryArgument) => Number(toUint(item, "u8"))));
  }
  throw TransactionError.encoding(`Cannot encode ${describe(value)} as vector<u8>`);
}

function writeValue(value: EntryArgument, tag: TypeTag, writer: BcsWriter): void {
  switch (tag.kind) {
    case "bool":
      if (typeof value !== "boolean") {
        throw TransactionError.encoding(`Cannot encode ${describe(value)} as bool`);
      }
      writer.write8(value ? 1 : 0);
      return;
    case "u8":
    case "u16":
    case "u32":
    case "u64":
    case "u128":
    case "u256":
      writeUint(toUint(value, tag.kind), tag.kind, writer);
      return;
    case "address":
      writeAddress(toAddress(value, "address"), writer);
      return;
    case "signer":
      throw TransactionError.encoding("signer arguments are supplied by the transaction sender");
    case "vector":
      writeVector(value, tag.inner, writer);
      return;
    case "struct":
      writeStruct(value, tag, writer);
      return;
  }
}

function writeAddress(address: AccountAddress, writer: BcsWriter): void {
  for (const byte of address.toUint8Array()) {
    writer.write8(byte);
  }
}

function writeVector(value: EntryArgument, inner: TypeTag, writer: BcsWriter): void {
  if (inner.kind === "u8") {
    const bytes = toByteVector(value);
    writer.writeULEB(bytes.length);
    for (const byte of bytes) {
      writer.write8(byte);
    }
    return;
  }
  if (!Array.isArray(value)) {
    throw TransactionError.encoding(`Cannot encode ${describe(value)} as vector<${typeTagToString(inner)}>`);
  }
  const items: readonly EntryArgument[] = value;
  writer.writeULEB(items.length);
  for (const item of items) {
    writeValue(item, inner, writer);
  }
}

function writeStruct(value: EntryArgument, tag: TypeTag, writer: BcsWriter): void {
  if (isStringTag(tag)) {
    if (typeof value !== "string") {
      throw TransactionError.encoding(`Cannot encode ${describe(value)} as String`);
    }
    bcs.string().write(value, writer);
    return;
  }
  const inner = optionInner(tag);
  if (inner !== undefined) {
    if (value === null || value === undefined) {
      writer.write8(0);
    } else {
      writer.write8(1);
      writeValue(value, inner, writer);
    }
    return;
  }
  if (isObjectTag(tag)) {
    writeAddress(toAddress(value, "object address"), writer);
    return;
  }
  throw TransactionError.encoding(`Unsupported parameter type: ${typeTagToString(tag)}`);
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Strip reference markers: `&signer` and `&mut T` become `signer` and `T`.
 */
export function normalizeParamType(param: string): string {
  return param.replace(/&/g, "").replace(/^\s*mut\s+/, "").trim();
}

export function isSignerParam(param: string): boolean {
  return normalizeParamType(param) === "signer";
}

/**
 * Parameters the caller supplies: the declared list minus its leading
 * signer parameters.
 */
export function entryParams(params: readonly string[]): string[] {
  let first = 0;
  while (first < params.length && isSignerParam(params[first])) {
    first++;
  }
  return params.slice(first);
}

/**
 * Encode one argument against its declared type.
 */
export function encodeArgument(value: EntryArgument, type: string | TypeTag): Uint8Array {
  const tag = typeof type === "string" ? parseTypeTag(normalizeParamType(type)) : type;
  const writer = new BcsWriter(BCS_WRITER_OPTIONS);
  writeValue(value, tag, writer);
  return writer.toBytes();
}

/**
 * Encode a full argument list against a function's declared parameters.
 * Leading signer parameters are dropped before the lists are matched.
 */
export function encodeFunctionArguments(
  args: readonly EntryArgument[],
  params: readonly string[]
): Uint8Array[] {
  const expected = entryParams(params);
  if (args.length !== expected.length) {
    throw TransactionError.encoding(
      `Argument count mismatch: expected ${expected.length}, got ${args.length}`
    );
  }
  return args.map((arg, i) => encodeArgument(arg, expected[i]));
}
