/**
 * Error types for transaction building and submission.
 */

/**
 * Transaction error variants.
 *
 * - `Configuration` / `Encoding` / `Validation` are raised before any
 *   network call and are never worth retrying.
 * - `Simulation` / `Submission` / `FeePayer` carry the HTTP status and body.
 * - `ExecutionFailed` means the transaction committed with `success=false`.
 * - `Timeout` means the client stopped waiting; the transaction may
 *   still land.
 */
export type TransactionErrorVariant =
  | "Configuration"
  | "Encoding"
  | "Validation"
  | "Simulation"
  | "Submission"
  | "FeePayer"
  | "Http"
  | "ExecutionFailed"
  | "Timeout"
  | "Aborted"
  | "Internal";

export interface TransactionErrorDetails {
  statusCode?: number;
  body?: string;
  hash?: string;
  vmStatus?: string;
  timeoutMs?: number;
  cause?: unknown;
}

export class TransactionError extends Error {
  readonly variant: TransactionErrorVariant;
  readonly statusCode?: number;
  readonly body?: string;
  readonly hash?: string;
  readonly vmStatus?: string;
  readonly timeoutMs?: number;

  constructor(variant: TransactionErrorVariant, message: string, details: TransactionErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "TransactionError";
    this.variant = variant;
    this.statusCode = details.statusCode;
    this.body = details.body;
    this.hash = details.hash;
    this.vmStatus = details.vmStatus;
    this.timeoutMs = details.timeoutMs;
  }

  /** Missing chain id, ABI entry or relay credentials */
  static configuration(message: string): TransactionError {
    return new TransactionError("Configuration", `Configuration error: ${message}`);
  }

  /** Value cannot be encoded as its declared type */
  static encoding(message: string): TransactionError {
    return new TransactionError("Encoding", `Encoding error: ${message}`);
  }

  /** Malformed request, such as a bad function id */
  static validation(message: string): TransactionError {
    return new TransactionError("Validation", `Validation error: ${message}`);
  }

  static simulation(statusCode: number, body: string): TransactionError {
    return new TransactionError("Simulation", `Transaction simulation failed: ${statusCode} - ${body}`, {
      statusCode,
      body,
    });
  }

  /** Simulation answered 2xx but without usable gas figures */
  static emptySimulation(message: string): TransactionError {
    return new TransactionError("Simulation", `Transaction simulation failed: ${message}`);
  }

  static submission(statusCode: number, body: string): TransactionError {
    return new TransactionError("Submission", `Transaction submission failed: ${statusCode} - ${body}`, {
      statusCode,
      body,
    });
  }

  static feePayer(statusCode: number, body: string): TransactionError {
    return new TransactionError("FeePayer", `Fee payer relay error: ${statusCode} - ${body}`, {
      statusCode,
      body,
    });
  }

  /** Non-2xx from a node GET endpoint */
  static http(statusCode: number, body: string): TransactionError {
    return new TransactionError("Http", `HTTP error: ${statusCode} - ${body}`, { statusCode, body });
  }

  static executionFailed(hash: string, vmStatus: string): TransactionError {
    return new TransactionError("ExecutionFailed", `Transaction failed: ${vmStatus}`, { hash, vmStatus });
  }

  static timeout(hash: string, timeoutMs: number): TransactionError {
    return new TransactionError(
      "Timeout",
      `Transaction ${hash} did not complete within ${timeoutMs / 1000}s`,
      { hash, timeoutMs }
    );
  }

  static aborted(hash?: string): TransactionError {
    return new TransactionError(
      "Aborted",
      hash ? `Stopped waiting for transaction ${hash}` : "Transaction aborted",
      { hash }
    );
  }

  static internal(message: string): TransactionError {
    return new TransactionError("Internal", `Internal error: ${message}`);
  }

  /** True for errors raised before anything reached the network */
  isPreflight(): boolean {
    return (
      this.variant === "Configuration" || this.variant === "Encoding" || this.variant === "Validation"
    );
  }
}
