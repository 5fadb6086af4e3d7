/**
 * Move type tags: parsing from type strings and their BCS layout.
 */

import { bcs, BcsType, type BcsReader, type BcsWriter } from "@mysten/bcs";
import { AccountAddress } from "../shared/address";
import { TransactionError } from "./error";

// ============================================================================
// TYPES
// ============================================================================

export type PrimitiveTypeTag =
  | { kind: "bool" }
  | { kind: "u8" }
  | { kind: "u16" }
  | { kind: "u32" }
  | { kind: "u64" }
  | { kind: "u128" }
  | { kind: "u256" }
  | { kind: "address" }
  | { kind: "signer" };

export interface VectorTypeTag {
  kind: "vector";
  inner: TypeTag;
}

export interface StructTypeTag {
  kind: "struct";
  address: AccountAddress;
  module: string;
  name: string;
  typeArgs: TypeTag[];
}

export type TypeTag = PrimitiveTypeTag | VectorTypeTag | StructTypeTag;

export type PrimitiveKind = PrimitiveTypeTag["kind"];

const PRIMITIVES: readonly PrimitiveKind[] = [
  "bool",
  "u8",
  "u16",
  "u32",
  "u64",
  "u128",
  "u256",
  "address",
  "signer",
];

function isPrimitive(value: string): value is PrimitiveKind {
  return PRIMITIVES.some((kind) => kind === value);
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

// ============================================================================
// PARSING
// ============================================================================

/**
 * Split `A, B<C, D>, E` on top-level commas.
 */
export function splitTypeArgs(input: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < input.length; i++) {
    const ch = input[i];
    if (ch === "<") {
      depth++;
    } else if (ch === ">") {
      depth--;
      if (depth < 0) {
        throw TransactionError.encoding(`Unbalanced '>' in type arguments: ${input}`);
      }
    } else if (ch === "," && depth === 0) {
      parts.push(input.slice(start, i).trim());
      start = i + 1;
    }
  }
  if (depth !== 0) {
    throw TransactionError.encoding(`Unbalanced '<' in type arguments: ${input}`);
  }
  parts.push(input.slice(start).trim());
  if (parts.some((p) => p.length === 0)) {
    throw TransactionError.encoding(`Empty type argument in: ${input}`);
  }
  return parts;
}

/**
 * Parse a Move type string such as `u64`, `vector<vector<u8>>` or
 * `0x1::option::Option<0x1::string::String>`.
 */
export function parseTypeTag(input: string): TypeTag {
  const str = input.trim();

  if (isPrimitive(str)) {
    return { kind: str };
  }

  const open = str.indexOf("<");
  let head = str;
  let typeArgs: TypeTag[] = [];
  if (open !== -1) {
    if (!str.endsWith(">")) {
      throw TransactionError.encoding(`Malformed generic type: ${input}`);
    }
    head = str.slice(0, open).trim();
    typeArgs = splitTypeArgs(str.slice(open + 1, -1)).map(parseTypeTag);
  } else if (str.includes(">")) {
    throw TransactionError.encoding(`Malformed generic type: ${input}`);
  }

  if (head === "vector") {
    if (typeArgs.length !== 1) {
      throw TransactionError.encoding(`vector takes exactly one type argument: ${input}`);
    }
    return { kind: "vector", inner: typeArgs[0] };
  }

  const segments = head.split("::");
  if (segments.length !== 3) {
    throw TransactionError.encoding(`Unsupported type: ${input}`);
  }
  const [addressPart, module, name] = segments;
  if (!IDENTIFIER.test(module) || !IDENTIFIER.test(name)) {
    throw TransactionError.encoding(`Invalid struct tag: ${input}`);
  }
  let address: AccountAddress;
  try {
    address = AccountAddress.fromString(addressPart);
  } catch (e) {
    throw TransactionError.encoding(`Invalid address in struct tag ${input}: ${String(e)}`);
  }
  return { kind: "struct", address, module, name, typeArgs };
}

/**
 * Canonical string form of a type tag.
 */
export function typeTagToString(tag: TypeTag): string {
  switch (tag.kind) {
    case "vector":
      return `vector<${typeTagToString(tag.inner)}>`;
    case "struct": {
      const base = `${tag.address.toString()}::${tag.module}::${tag.name}`;
      return tag.typeArgs.length === 0 ? base : `${base}<${tag.typeArgs.map(typeTagToString).join(", ")}>`;
    }
    default:
      return tag.kind;
  }
}

// ============================================================================
// FRAMEWORK STRUCTS
// ============================================================================

function isFrameworkStruct(tag: TypeTag, module: string, name: string): tag is StructTypeTag {
  return (
    tag.kind === "struct" &&
    tag.module === module &&
    tag.name === name &&
    tag.address.equals(AccountAddress.fromString("0x1"))
  );
}

/** `0x1::string::String` */
export function isStringTag(tag: TypeTag): boolean {
  return isFrameworkStruct(tag, "string", "String");
}

/** Inner type of `<addr>::option::Option<T>`, or undefined. Any address matches. */
export function optionInner(tag: TypeTag): TypeTag | undefined {
  if (tag.kind === "struct" && tag.module === "option" && tag.name === "Option" && tag.typeArgs.length === 1) {
    return tag.typeArgs[0];
  }
  return undefined;
}

/**
 * Types passed as an object address: `<addr>::object::Object<T>` at any
 * address, and any struct named `Object` without type arguments.
 */
export function isObjectTag(tag: TypeTag): boolean {
  return (
    tag.kind === "struct" &&
    tag.name === "Object" &&
    ((tag.module === "object" && tag.typeArgs.length === 1) || tag.typeArgs.length === 0)
  );
}

// ============================================================================
// BCS
// ============================================================================

const VARIANT_INDEX: Record<TypeTag["kind"], number> = {
  bool: 0,
  u8: 1,
  u64: 2,
  u128: 3,
  address: 4,
  signer: 5,
  vector: 6,
  struct: 7,
  u16: 8,
  u32: 9,
  u256: 10,
};

const VARIANT_BY_INDEX: PrimitiveKind[] = [];
for (const kind of PRIMITIVES) {
  VARIANT_BY_INDEX[VARIANT_INDEX[kind]] = kind;
}

const identifierBcs = bcs.string();

function writeTypeTag(tag: TypeTag, writer: BcsWriter): void {
  writer.writeULEB(VARIANT_INDEX[tag.kind]);
  if (tag.kind === "vector") {
    writeTypeTag(tag.inner, writer);
  } else if (tag.kind === "struct") {
    for (const byte of tag.address.toUint8Array()) {
      writer.write8(byte);
    }
    identifierBcs.write(tag.module, writer);
    identifierBcs.write(tag.name, writer);
    writer.writeULEB(tag.typeArgs.length);
    for (const arg of tag.typeArgs) {
      writeTypeTag(arg, writer);
    }
  }
}

function readTypeTag(reader: BcsReader): TypeTag {
  const index = reader.readULEB();
  if (index === VARIANT_INDEX.vector) {
    return { kind: "vector", inner: readTypeTag(reader) };
  }
  if (index === VARIANT_INDEX.struct) {
    const address = AccountAddress.fromBytes(reader.readBytes(32));
    const module = identifierBcs.read(reader);
    const name = identifierBcs.read(reader);
    const count = reader.readULEB();
    const typeArgs: TypeTag[] = [];
    for (let i = 0; i < count; i++) {
      typeArgs.push(readTypeTag(reader));
    }
    return { kind: "struct", address, module, name, typeArgs };
  }
  const kind = VARIANT_BY_INDEX[index];
  if (kind === undefined) {
    throw new TypeError(`Unknown TypeTag variant: ${index}`);
  }
  return { kind };
}

export const TypeTagBcs = new BcsType<TypeTag>({
  name: "TypeTag",
  read: readTypeTag,
  write: writeTypeTag,
});
