/**
 * Ed25519 accounts and transaction signing.
 */

import nacl from "tweetnacl";
import { sha3_256 } from "js-sha3";
import { AccountAddress, authKeyAddress } from "../shared/address";
import {
  BCS_WRITER_OPTIONS,
  RawTransactionWithData,
  rawTransactionInput,
  serializeAccountAuthenticator,
  serializeRawTransaction,
  type Ed25519AuthenticatorData,
} from "./bcs";
import type { SimpleTransaction } from "./builder";

const RAW_TRANSACTION_SALT = "APTOS::RawTransaction";
const RAW_TRANSACTION_WITH_DATA_SALT = "APTOS::RawTransactionWithData";

function domainPrefix(salt: string): Uint8Array {
  return Uint8Array.from(sha3_256.array(salt));
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}

function hexToBytes(hex: string): Uint8Array {
  const clean = hex.trim().replace(/^ed25519-priv-/, "").replace(/^0x/, "");
  if (!/^([0-9a-fA-F]{2})*$/.test(clean)) {
    throw new TypeError("Private key must be a hex string");
  }
  return Uint8Array.from(Buffer.from(clean, "hex"));
}

// ============================================================================
// SIGNING MESSAGES
// ============================================================================

/**
 * Bytes signed by the sender. With a fee payer attached the message is
 * the `MultiAgentWithFeePayer` form, otherwise the plain raw transaction.
 */
export function signingMessage(transaction: SimpleTransaction): Uint8Array {
  if (transaction.feePayerAddress !== undefined) {
    const body = RawTransactionWithData.serialize(
      {
        MultiAgentWithFeePayer: {
          rawTxn: rawTransactionInput(transaction.rawTransaction),
          secondarySignerAddresses: [],
          feePayerAddress: transaction.feePayerAddress,
        },
      },
      BCS_WRITER_OPTIONS
    ).toBytes();
    return concat(domainPrefix(RAW_TRANSACTION_WITH_DATA_SALT), body);
  }
  return concat(domainPrefix(RAW_TRANSACTION_SALT), serializeRawTransaction(transaction.rawTransaction));
}

// ============================================================================
// ACCOUNT
// ============================================================================

/**
 * Anything that can sign a transaction as its sender.
 */
export interface TransactionSigner {
  readonly address: AccountAddress;
  readonly publicKey: Uint8Array;
  signTransaction(transaction: SimpleTransaction): Ed25519AuthenticatorData;
}

/**
 * A signing account backed by an Ed25519 key pair.
 *
 * @example
 * ```typescript
 * const account = Ed25519Account.fromPrivateKey(process.env.DEX_PRIVATE_KEY ?? "");
 * console.log(account.address.toString());
 * ```
 */
export class Ed25519Account implements TransactionSigner {
  readonly publicKey: Uint8Array;
  readonly address: AccountAddress;
  private readonly secretKey: Uint8Array;

  private constructor(keyPair: nacl.SignKeyPair) {
    this.publicKey = keyPair.publicKey;
    this.secretKey = keyPair.secretKey;
    this.address = authKeyAddress(keyPair.publicKey);
  }

  /**
   * From a 32-byte seed, as bytes or hex (an `ed25519-priv-` prefix is
   * accepted).
   */
  static fromPrivateKey(privateKey: string | Uint8Array): Ed25519Account {
    const seed = typeof privateKey === "string" ? hexToBytes(privateKey) : privateKey;
    if (seed.length !== nacl.sign.seedLength) {
      throw new TypeError(`Private key must be ${nacl.sign.seedLength} bytes, got ${seed.length}`);
    }
    return new Ed25519Account(nacl.sign.keyPair.fromSeed(seed));
  }

  static generate(): Ed25519Account {
    return new Ed25519Account(nacl.sign.keyPair());
  }

  sign(message: Uint8Array): Uint8Array {
    return nacl.sign.detached(message, this.secretKey);
  }

  signTransaction(transaction: SimpleTransaction): Ed25519AuthenticatorData {
    return {
      publicKey: this.publicKey,
      signature: this.sign(signingMessage(transaction)),
    };
  }

  /** Serialized `AccountAuthenticator` for a transaction */
  signTransactionBytes(transaction: SimpleTransaction): Uint8Array {
    return serializeAccountAuthenticator(this.signTransaction(transaction));
  }
}

/**
 * Check a signature against the signing message of a transaction.
 */
export function verifyTransactionSignature(
  transaction: SimpleTransaction,
  auth: Ed25519AuthenticatorData
): boolean {
  return nacl.sign.detached.verify(signingMessage(transaction), auth.signature, auth.publicKey);
}
