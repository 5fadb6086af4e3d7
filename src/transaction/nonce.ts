import nacl from "tweetnacl";
import { TransactionError } from "./error";

/** Source of random bytes */
export type RandomBytes = (length: number) => Uint8Array;

/**
 * Draw a 64-bit replay-protection nonce from two random 32-bit halves.
 * Returns null when either half is zero; such draws are rejected.
 */
export function generateReplayProtectionNonce(random: RandomBytes = nacl.randomBytes): bigint | null {
  const bytes = random(8);
  const view = new DataView(bytes.buffer, bytes.byteOffset, 8);
  const high = view.getUint32(0);
  const low = view.getUint32(4);
  if (high === 0 || low === 0) {
    return null;
  }
  return (BigInt(high) << 32n) | BigInt(low);
}

/**
 * A valid nonce, redrawing once after a degenerate draw.
 */
export function nextReplayProtectionNonce(random: RandomBytes = nacl.randomBytes): bigint {
  const nonce = generateReplayProtectionNonce(random) ?? generateReplayProtectionNonce(random);
  if (nonce === null) {
    throw TransactionError.internal("Unable to generate replay protection nonce");
  }
  return nonce;
}
