/**
 * Input validation for trading API requests.
 */

import { AccountAddress } from "../shared/address";
import { ApiError } from "./error";

/** Maximum allowed pagination limit */
export const MAX_PAGINATION_LIMIT = 1000;

/** Default request timeout in milliseconds */
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Validate a hex account or object address and return its canonical form.
 * @throws {ApiError} If the value is not an address
 */
export function validateAddress(value: string, fieldName: string): string {
  if (!value || value.length === 0) {
    throw ApiError.invalidParameter(`${fieldName} cannot be empty`);
  }
  try {
    return AccountAddress.fromString(value).toString();
  } catch {
    throw ApiError.invalidParameter(`${fieldName} is not a valid account address`);
  }
}

/**
 * Validate pagination limit (1-1000).
 * @throws {ApiError} If the limit is out of bounds
 */
export function validateLimit(limit: number | undefined): void {
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGINATION_LIMIT)) {
    throw ApiError.invalidParameter(`Limit must be 1-${MAX_PAGINATION_LIMIT}`);
  }
}
