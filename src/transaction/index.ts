/**
 * Orderless transaction building, signing and submission.
 */

export { Ed25519Account, signingMessage, verifyTransactionSignature } from "./account";
export type { TransactionSigner } from "./account";

export {
  AccountAuthenticator,
  BCS_WRITER_OPTIONS,
  MAX_TRANSACTION_BYTES,
  RawTransaction,
  RawTransactionWithData,
  SignedTransaction,
  TransactionAuthenticator,
  TransactionPayload,
  serializeAccountAuthenticator,
  serializeRawTransaction,
} from "./bcs";
export type { Ed25519AuthenticatorData, EntryFunctionPayload, RawTransactionData } from "./bcs";

export {
  buildEntryFunction,
  buildSimpleTransaction,
  generateExpireTimestamp,
  parseFunctionId,
  rawTransactionBytes,
} from "./builder";
export type { BuildTransactionParams, FunctionId, InputEntryFunctionData, SimpleTransaction } from "./builder";

export {
  TransactionClient,
  committedTransactionSchema,
  computeGasBounds,
  serializeForSimulation,
  serializeSignedTransaction,
} from "./client";
export type {
  BuildTxOverrides,
  CommittedTransaction,
  GasPriceSource,
  SendTxOptions,
  SimulatedGas,
  TransactionClientOptions,
  TransactionEvent,
  WaitOptions,
} from "./client";

export * from "./constants";

export { encodeArgument, encodeFunctionArguments, entryParams, isSignerParam, normalizeParamType } from "./encoder";
export type { EntryArgument } from "./encoder";

export { TransactionError } from "./error";
export type { TransactionErrorDetails, TransactionErrorVariant } from "./error";

export {
  NETNA_GAS_STATION_URL,
  TESTNET_GAS_STATION_URL,
  resolveGasStationUrl,
  serializeTransactionWithFeePayer,
  submitFeePaidTransaction,
} from "./fee_payer";
export type { PendingTransactionResponse } from "./fee_payer";

export { GasPriceManager } from "./gas_price";
export type { GasPriceInfo, GasPriceManagerOptions } from "./gas_price";

export { generateReplayProtectionNonce, nextReplayProtectionNonce } from "./nonce";
export type { RandomBytes } from "./nonce";

export { parseTypeTag, typeTagToString } from "./type_tag";
export type { TypeTag } from "./type_tag";
