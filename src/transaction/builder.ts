/**
 * Transaction builder: assembles orderless raw transactions.
 */

import { AccountAddress, type AccountAddressInput } from "../shared/address";
import type { MoveFunction } from "../abi/types";
import {
  DEFAULT_MAX_GAS_AMOUNT,
  DEFAULT_TXN_EXPIRY_SECS,
  ORDERLESS_SEQUENCE_NUMBER,
} from "./constants";
import { encodeFunctionArguments, type EntryArgument } from "./encoder";
import { TransactionError } from "./error";
import { parseTypeTag } from "./type_tag";
import { serializeRawTransaction, type EntryFunctionPayload, type RawTransactionData } from "./bcs";

// ============================================================================
// TYPES
// ============================================================================

/**
 * One entry-function call, before encoding.
 */
export interface InputEntryFunctionData {
  /** `address::module::function` */
  function: string;
  functionArguments?: readonly EntryArgument[];
  typeArguments?: readonly string[];
}

/**
 * A raw transaction plus the fee-payer slot. A zero address in the slot
 * means "a relay will fill this in".
 */
export interface SimpleTransaction {
  rawTransaction: RawTransactionData;
  feePayerAddress?: AccountAddress;
}

export interface BuildTransactionParams {
  sender: AccountAddressInput;
  data: InputEntryFunctionData;
  chainId: number;
  gasUnitPrice: number | bigint;
  abi: MoveFunction;
  withFeePayer: boolean;
  replayProtectionNonce: bigint;
  /** Local clock adjustment, added to `Date.now()` */
  timeDeltaMs?: number;
  maxGasAmount?: number | bigint;
  expirySecs?: number;
}

export interface FunctionId {
  moduleAddress: AccountAddress;
  moduleName: string;
  functionName: string;
}

// ============================================================================
// BUILDING
// ============================================================================

/**
 * Split `address::module::function`.
 */
export function parseFunctionId(functionId: string): FunctionId {
  const parts = functionId.split("::");
  if (parts.length !== 3) {
    throw TransactionError.validation(
      `Invalid function format: ${functionId}, expected 'address::module::function'`
    );
  }
  const [address, moduleName, functionName] = parts;
  let moduleAddress: AccountAddress;
  try {
    moduleAddress = AccountAddress.fromString(address);
  } catch (e) {
    throw TransactionError.validation(`Invalid module address in ${functionId}: ${String(e)}`);
  }
  return { moduleAddress, moduleName, functionName };
}

/**
 * Expiration in whole seconds: `floor((now + delta) / 1000) + expiry`.
 */
export function generateExpireTimestamp(
  timeDeltaMs: number = 0,
  expirySecs: number = DEFAULT_TXN_EXPIRY_SECS,
  now: number = Date.now()
): number {
  return Math.floor((now + timeDeltaMs) / 1000) + expirySecs;
}

export function buildEntryFunction(data: InputEntryFunctionData, abi: MoveFunction): EntryFunctionPayload {
  const { moduleAddress, moduleName, functionName } = parseFunctionId(data.function);
  return {
    moduleAddress,
    moduleName,
    functionName,
    typeArgs: (data.typeArguments ?? []).map(parseTypeTag),
    args: encodeFunctionArguments(data.functionArguments ?? [], abi.params),
  };
}

/**
 * Build an orderless transaction for one entry-function call.
 *
 * The sequence number is always the orderless sentinel; replay protection
 * comes from the nonce inside the payload.
 */
export function buildSimpleTransaction(params: BuildTransactionParams): SimpleTransaction {
  const entryFunction = buildEntryFunction(params.data, params.abi);

  const rawTransaction: RawTransactionData = {
    sender: AccountAddress.from(params.sender),
    sequenceNumber: ORDERLESS_SEQUENCE_NUMBER,
    entryFunction,
    replayProtectionNonce: params.replayProtectionNonce,
    maxGasAmount: BigInt(params.maxGasAmount ?? DEFAULT_MAX_GAS_AMOUNT),
    gasUnitPrice: BigInt(params.gasUnitPrice),
    expirationTimestampSecs: BigInt(generateExpireTimestamp(params.timeDeltaMs, params.expirySecs)),
    chainId: params.chainId,
  };

  return {
    rawTransaction,
    feePayerAddress: params.withFeePayer ? AccountAddress.ZERO : undefined,
  };
}

/** BCS bytes of the raw transaction alone */
export function rawTransactionBytes(transaction: SimpleTransaction): Uint8Array {
  return serializeRawTransaction(transaction.rawTransaction);
}
