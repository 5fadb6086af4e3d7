/**
 * JSON helpers for payloads that carry tagged big integers.
 *
 * Integers beyond the safe-integer range are wire-encoded as
 * `{"$bigint": "<decimal string>"}`.
 */

const BIGINT_TAG = "$bigint";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * `JSON.parse` reviver turning `{"$bigint": "123"}` into `123n`.
 */
export function bigintReviver(_key: string, value: unknown): unknown {
  if (isRecord(value) && typeof value[BIGINT_TAG] === "string") {
    return BigInt(value[BIGINT_TAG]);
  }
  return value;
}

/**
 * Parse JSON text, reviving tagged big integers.
 */
export function parseJson(text: string): unknown {
  return JSON.parse(text, bigintReviver);
}
