/**
 * BCS layouts of the transaction envelope, authenticators and signing
 * messages.
 *
 * Variant order inside each enum is wire-significant: the position of a
 * variant is its tag.
 */

import { bcs, type BcsWriterOptions } from "@mysten/bcs";
import { AccountAddress, type AccountAddressInput } from "../shared/address";
import { TypeTagBcs, type TypeTag } from "./type_tag";

/** Largest transaction the node accepts */
export const MAX_TRANSACTION_BYTES = 64 * 1024;

export const BCS_WRITER_OPTIONS: BcsWriterOptions = {
  initialSize: 1024,
  maxSize: MAX_TRANSACTION_BYTES,
};

// ============================================================================
// PRIMITIVES
// ============================================================================

export const Address = bcs.bytes(32).transform({
  name: "address",
  input: (value: AccountAddressInput) => AccountAddress.from(value).toUint8Array(),
  output: (bytes) => AccountAddress.fromBytes(bytes),
});

const Bytes = bcs.vector(bcs.u8());

// ============================================================================
// PAYLOAD
// ============================================================================

export const ModuleId = bcs.struct("ModuleId", {
  address: Address,
  name: bcs.string(),
});

export const EntryFunction = bcs.struct("EntryFunction", {
  module: ModuleId,
  function: bcs.string(),
  tyArgs: bcs.vector(TypeTagBcs),
  args: bcs.vector(Bytes),
});

export const TransactionExecutable = bcs.enum("TransactionExecutable", {
  Script: null,
  EntryFunction,
  Empty: null,
});

export const TransactionExtraConfig = bcs.enum("TransactionExtraConfig", {
  V1: bcs.struct("TransactionExtraConfigV1", {
    multisigAddress: bcs.option(Address),
    replayProtectionNonce: bcs.option(bcs.u64()),
  }),
});

export const TransactionInnerPayload = bcs.enum("TransactionInnerPayload", {
  V1: bcs.struct("TransactionInnerPayloadV1", {
    executable: TransactionExecutable,
    extraConfig: TransactionExtraConfig,
  }),
});

/**
 * Only `EntryFunction` and the orderless `Payload` variants are ever
 * written; the others keep their tag positions.
 */
export const TransactionPayload = bcs.enum("TransactionPayload", {
  Script: null,
  ModuleBundle: null,
  EntryFunction,
  Multisig: null,
  Payload: TransactionInnerPayload,
});

export const RawTransaction = bcs.struct("RawTransaction", {
  sender: Address,
  sequenceNumber: bcs.u64(),
  payload: TransactionPayload,
  maxGasAmount: bcs.u64(),
  gasUnitPrice: bcs.u64(),
  expirationTimestampSecs: bcs.u64(),
  chainId: bcs.u8(),
});

// ============================================================================
// AUTHENTICATORS
// ============================================================================

const Ed25519Signature = bcs.struct("Ed25519Authenticator", {
  publicKey: Bytes,
  signature: Bytes,
});

export const AccountAuthenticator = bcs.enum("AccountAuthenticator", {
  Ed25519: Ed25519Signature,
  MultiEd25519: null,
  SingleKey: null,
  MultiKey: null,
  NoAccountAuthenticator: null,
});

export const TransactionAuthenticator = bcs.enum("TransactionAuthenticator", {
  Ed25519: Ed25519Signature,
  MultiEd25519: null,
  MultiAgent: null,
  FeePayer: bcs.struct("FeePayerAuthenticator", {
    sender: AccountAuthenticator,
    secondarySignerAddresses: bcs.vector(Address),
    secondarySigners: bcs.vector(AccountAuthenticator),
    feePayerAddress: Address,
    feePayerAuthenticator: AccountAuthenticator,
  }),
});

export const SignedTransaction = bcs.struct("SignedTransaction", {
  rawTxn: RawTransaction,
  authenticator: TransactionAuthenticator,
});

/** Message signed when a fee payer is attached */
export const RawTransactionWithData = bcs.enum("RawTransactionWithData", {
  MultiAgent: null,
  MultiAgentWithFeePayer: bcs.struct("MultiAgentWithFeePayer", {
    rawTxn: RawTransaction,
    secondarySignerAddresses: bcs.vector(Address),
    feePayerAddress: Address,
  }),
});

/** Raw transaction followed by an optional fee-payer address */
export const SimpleTransactionBcs = bcs.struct("SimpleTransaction", {
  rawTxn: RawTransaction,
  feePayerAddress: bcs.option(Address),
});

// ============================================================================
// DOMAIN TYPES
// ============================================================================

export interface EntryFunctionPayload {
  moduleAddress: AccountAddress;
  moduleName: string;
  functionName: string;
  typeArgs: TypeTag[];
  args: Uint8Array[];
}

/**
 * Unsigned transaction body. The payload is always the orderless form,
 * carrying the replay-protection nonce.
 */
export interface RawTransactionData {
  sender: AccountAddress;
  sequenceNumber: bigint;
  entryFunction: EntryFunctionPayload;
  replayProtectionNonce: bigint;
  maxGasAmount: bigint;
  gasUnitPrice: bigint;
  expirationTimestampSecs: bigint;
  chainId: number;
}

/** Ed25519 sender signature */
export interface Ed25519AuthenticatorData {
  publicKey: Uint8Array;
  signature: Uint8Array;
}

export type RawTransactionInput = typeof RawTransaction.$inferInput;

/**
 * Orderless payload: variant 4, inner V1, entry-function executable,
 * extra config V1 with no multisig address and the nonce.
 */
export function orderlessPayloadInput(
  entryFunction: EntryFunctionPayload,
  nonce: bigint
): typeof TransactionPayload.$inferInput {
  return {
    Payload: {
      V1: {
        executable: {
          EntryFunction: {
            module: { address: entryFunction.moduleAddress, name: entryFunction.moduleName },
            function: entryFunction.functionName,
            tyArgs: entryFunction.typeArgs,
            args: entryFunction.args,
          },
        },
        extraConfig: {
          V1: {
            multisigAddress: null,
            replayProtectionNonce: nonce,
          },
        },
      },
    },
  };
}

export function rawTransactionInput(raw: RawTransactionData): RawTransactionInput {
  return {
    sender: raw.sender,
    sequenceNumber: raw.sequenceNumber,
    payload: orderlessPayloadInput(raw.entryFunction, raw.replayProtectionNonce),
    maxGasAmount: raw.maxGasAmount,
    gasUnitPrice: raw.gasUnitPrice,
    expirationTimestampSecs: raw.expirationTimestampSecs,
    chainId: raw.chainId,
  };
}

export function serializeRawTransaction(raw: RawTransactionData): Uint8Array {
  return RawTransaction.serialize(rawTransactionInput(raw), BCS_WRITER_OPTIONS).toBytes();
}

export function serializeAccountAuthenticator(auth: Ed25519AuthenticatorData): Uint8Array {
  return AccountAuthenticator.serialize({ Ed25519: auth }).toBytes();
}
