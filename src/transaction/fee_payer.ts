/**
 * Submission through a fee-payer relay.
 *
 * Two relays are supported:
 * - the bearer-token relay (`gasStationApiKey`), which signs as fee payer
 *   and submits in one call;
 * - the legacy open relay (`gasStationUrl` only).
 */

import { bcs } from "@mysten/bcs";
import type { DexConfig } from "../shared/config";
import { isRecord } from "../shared/json";
import { Address, BCS_WRITER_OPTIONS, serializeAccountAuthenticator, serializeRawTransaction } from "./bcs";
import type { Ed25519AuthenticatorData } from "./bcs";
import type { SimpleTransaction } from "./builder";
import { TransactionError } from "./error";
import { responseJson, responseText } from "./http";

/** Relay endpoints with built-in defaults */
export const TESTNET_GAS_STATION_URL = "https://api.testnet.aptoslabs.com/gs/v1";
export const NETNA_GAS_STATION_URL = "https://api.netna.aptoslabs.com/gs/v1";

const NETNA_CHAIN_ID = 208;

/**
 * Node-style pending record. All numeric fields are decimal strings.
 */
export interface PendingTransactionResponse {
  hash: string;
  sender: string;
  sequence_number: string;
  max_gas_amount: string;
  gas_unit_price: string;
  expiration_timestamp_secs: string;
}

/**
 * Base URL of the bearer-token relay for a config.
 *
 * @throws {TransactionError} `Configuration` when no default applies and no
 * URL is configured
 */
export function resolveGasStationUrl(config: DexConfig): string {
  if (config.network === "testnet") {
    return TESTNET_GAS_STATION_URL;
  }
  if (config.chainId === NETNA_CHAIN_ID) {
    return NETNA_GAS_STATION_URL;
  }
  if (config.gasStationUrl) {
    return config.gasStationUrl;
  }
  throw TransactionError.configuration(
    "gasStationUrl must be provided for custom networks when using gasStationApiKey"
  );
}

/** Pending record echoed from the transaction we built */
export function pendingFromTransaction(hash: string, transaction: SimpleTransaction): PendingTransactionResponse {
  const raw = transaction.rawTransaction;
  return {
    hash,
    sender: raw.sender.toString(),
    sequence_number: raw.sequenceNumber.toString(),
    max_gas_amount: raw.maxGasAmount.toString(),
    gas_unit_price: raw.gasUnitPrice.toString(),
    expiration_timestamp_secs: raw.expirationTimestampSecs.toString(),
  };
}

/**
 * Raw transaction BCS followed by an optional fee-payer address
 * (`0x00`, or `0x01` and 32 bytes).
 */
export function serializeTransactionWithFeePayer(transaction: SimpleTransaction): Uint8Array {
  const raw = serializeRawTransaction(transaction.rawTransaction);
  const tail = bcs
    .option(Address)
    .serialize(transaction.feePayerAddress ?? null, BCS_WRITER_OPTIONS)
    .toBytes();
  const out = new Uint8Array(raw.length + tail.length);
  out.set(raw, 0);
  out.set(tail, raw.length);
  return out;
}

function field(data: Record<string, unknown>, key: string): string {
  const value = data[key];
  return value === undefined || value === null ? "" : String(value);
}

// ============================================================================
// RELAYS
// ============================================================================

async function submitViaGasStationApi(
  config: DexConfig,
  apiKey: string,
  transaction: SimpleTransaction,
  senderAuth: Ed25519AuthenticatorData
): Promise<PendingTransactionResponse> {
  const url = `${resolveGasStationUrl(config)}/api/transaction/signAndSubmit`;
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
      Authorization: `Bearer ${apiKey}`,
    },
    body: JSON.stringify({
      transactionBytes: Array.from(serializeTransactionWithFeePayer(transaction)),
      senderAuth: Array.from(serializeAccountAuthenticator(senderAuth)),
    }),
  });

  if (!response.ok) {
    throw TransactionError.feePayer(response.status, await responseText(response));
  }

  const data = await responseJson(response);
  // Older relay deployments answer with `hash` instead of `transactionHash`
  let hash = "";
  if (isRecord(data)) {
    hash = field(data, "transactionHash") || field(data, "hash");
  }
  return pendingFromTransaction(hash, transaction);
}

async function submitViaLegacyFeePayer(
  gasStationUrl: string,
  transaction: SimpleTransaction,
  senderAuth: Ed25519AuthenticatorData
): Promise<PendingTransactionResponse> {
  const response = await fetch(`${gasStationUrl}/transactions`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({
      signature: Array.from(serializeAccountAuthenticator(senderAuth)),
      transaction: Array.from(serializeRawTransaction(transaction.rawTransaction)),
    }),
  });

  if (!response.ok) {
    throw TransactionError.feePayer(response.status, await responseText(response));
  }

  const data = await responseJson(response);
  const record = isRecord(data) ? data : {};
  return {
    hash: field(record, "hash"),
    sender: field(record, "sender"),
    sequence_number: field(record, "sequence_number"),
    max_gas_amount: field(record, "max_gas_amount"),
    gas_unit_price: field(record, "gas_unit_price"),
    expiration_timestamp_secs: field(record, "expiration_timestamp_secs"),
  };
}

/**
 * Submit a signed transaction through whichever relay the config allows.
 * The bearer relay wins when an API key is set.
 */
export async function submitFeePaidTransaction(
  config: DexConfig,
  transaction: SimpleTransaction,
  senderAuth: Ed25519AuthenticatorData
): Promise<PendingTransactionResponse> {
  if (config.gasStationApiKey) {
    return submitViaGasStationApi(config, config.gasStationApiKey, transaction, senderAuth);
  }
  if (config.gasStationUrl) {
    return submitViaLegacyFeePayer(config.gasStationUrl, transaction, senderAuth);
  }
  throw TransactionError.configuration("Either gasStationApiKey or gasStationUrl must be provided");
}
