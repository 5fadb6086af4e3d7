import { sha3_256 } from "js-sha3";

// ============================================================================
// ACCOUNT ADDRESS
// ============================================================================

/** Length of an account address in bytes */
export const ADDRESS_LENGTH = 32;

/** Domain-separation byte appended when deriving a named object address */
export const OBJECT_FROM_SEED_SCHEME = 0xfe;

/** Domain-separation byte appended when deriving an Ed25519 account address */
export const ED25519_SCHEME = 0x00;

const HEX_PATTERN = /^[0-9a-fA-F]*$/;

/**
 * A 32-byte on-chain account address.
 *
 * String form follows the chain's convention: special addresses
 * (`0x0` through `0xf`) print in short form, every other address prints
 * as 64 hex digits.
 */
export class AccountAddress {
  static readonly ZERO = new AccountAddress(new Uint8Array(ADDRESS_LENGTH));

  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Parse from a hex string. The `0x` prefix is optional and short
   * forms are left-padded with zeros.
   */
  static fromString(input: string): AccountAddress {
    const hex = input.startsWith("0x") || input.startsWith("0X") ? input.slice(2) : input;
    if (hex.length === 0 || hex.length > ADDRESS_LENGTH * 2 || !HEX_PATTERN.test(hex)) {
      throw new TypeError(`Invalid account address: ${input}`);
    }
    const padded = hex.padStart(ADDRESS_LENGTH * 2, "0");
    const bytes = new Uint8Array(ADDRESS_LENGTH);
    for (let i = 0; i < ADDRESS_LENGTH; i++) {
      bytes[i] = parseInt(padded.slice(i * 2, i * 2 + 2), 16);
    }
    return new AccountAddress(bytes);
  }

  static fromBytes(bytes: Uint8Array | number[]): AccountAddress {
    if (bytes.length !== ADDRESS_LENGTH) {
      throw new TypeError(`Account address must be ${ADDRESS_LENGTH} bytes, got ${bytes.length}`);
    }
    return new AccountAddress(Uint8Array.from(bytes));
  }

  static from(input: AccountAddressInput): AccountAddress {
    if (input instanceof AccountAddress) {
      return input;
    }
    if (typeof input === "string") {
      return AccountAddress.fromString(input);
    }
    return AccountAddress.fromBytes(input);
  }

  /** True for `0x0`..`0xf` */
  isSpecial(): boolean {
    for (let i = 0; i < ADDRESS_LENGTH - 1; i++) {
      if (this.bytes[i] !== 0) return false;
    }
    return this.bytes[ADDRESS_LENGTH - 1] < 0x10;
  }

  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  /** Full 64-digit form, regardless of whether the address is special */
  toStringLong(): string {
    return `0x${Buffer.from(this.bytes).toString("hex")}`;
  }

  toString(): string {
    if (this.isSpecial()) {
      return `0x${this.bytes[ADDRESS_LENGTH - 1].toString(16)}`;
    }
    return this.toStringLong();
  }

  toJSON(): string {
    return this.toString();
  }

  equals(other: AccountAddressInput): boolean {
    const that = AccountAddress.from(other).bytes;
    return this.bytes.every((b, i) => b === that[i]);
  }
}

/** Anything accepted where an address is expected */
export type AccountAddressInput = AccountAddress | string | Uint8Array;

// ============================================================================
// DERIVED ADDRESSES
// ============================================================================

/**
 * Derive the address of a named object: sha3-256(creator || seed || 0xFE).
 */
export function createObjectAddress(
  creator: AccountAddressInput,
  seed: string | Uint8Array
): AccountAddress {
  const seedBytes = typeof seed === "string" ? new TextEncoder().encode(seed) : seed;
  const digest = sha3_256
    .create()
    .update(AccountAddress.from(creator).toUint8Array())
    .update(seedBytes)
    .update([OBJECT_FROM_SEED_SCHEME])
    .array();
  return AccountAddress.fromBytes(digest);
}

/**
 * Derive the account address of an Ed25519 public key: sha3-256(pubkey || 0x00).
 */
export function authKeyAddress(publicKey: Uint8Array): AccountAddress {
  const digest = sha3_256.create().update(publicKey).update([ED25519_SCHEME]).array();
  return AccountAddress.fromBytes(digest);
}

/**
 * BCS encoding of a short string: ULEB128 length prefix then UTF-8 bytes.
 * Seeds for protocol objects are BCS strings.
 */
export function bcsStringSeed(value: string): Uint8Array {
  const utf8 = new TextEncoder().encode(value);
  const prefix: number[] = [];
  let len = utf8.length;
  do {
    let byte = len & 0x7f;
    len >>>= 7;
    if (len !== 0) byte |= 0x80;
    prefix.push(byte);
  } while (len !== 0);
  const out = new Uint8Array(prefix.length + utf8.length);
  out.set(prefix, 0);
  out.set(utf8, prefix.length);
  return out;
}

/**
 * Market object address: named object under the perp engine global,
 * seeded with the BCS-encoded market name.
 */
export function getMarketAddress(
  marketName: string,
  perpEngineGlobal: AccountAddressInput
): AccountAddress {
  return createObjectAddress(perpEngineGlobal, bcsStringSeed(marketName));
}

/**
 * The primary subaccount of `owner`.
 */
export function getPrimarySubaccountAddress(
  owner: AccountAddressInput,
  packageAddress: AccountAddressInput
): AccountAddress {
  const manager = createObjectAddress(packageAddress, "GlobalSubaccountManager");
  const ownerBytes = AccountAddress.from(owner).toUint8Array();
  const suffix = bcsStringSeed("primary_subaccount");
  const seed = new Uint8Array(ownerBytes.length + suffix.length);
  seed.set(ownerBytes, 0);
  seed.set(suffix, ownerBytes.length);
  return createObjectAddress(manager, seed);
}

/**
 * Address of the share token for a vault.
 */
export function getVaultShareAddress(vault: AccountAddressInput): AccountAddress {
  return createObjectAddress(vault, "vault_share_asset");
}

/** Subaccount used for trading-competition entries */
export function getTradingCompetitionSubaccountAddress(owner: AccountAddressInput): AccountAddress {
  return createObjectAddress(owner, "trading_competition");
}
