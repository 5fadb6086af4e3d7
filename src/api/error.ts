/**
 * Errors raised by the read client for trading API and node requests.
 */

export type ApiErrorVariant =
  | "Http"
  | "Timeout"
  | "NotFound"
  | "BadRequest"
  | "Forbidden"
  | "ServerError"
  | "Deserialize"
  | "InvalidParameter"
  | "UnexpectedStatus"
  | "RateLimited"
  | "Unauthorized";

interface ApiErrorInit {
  statusCode?: number;
  /** Raw body or other context for debugging */
  details?: string;
  /** Request URL, when the failure came from a request */
  url?: string;
}

/** Variants worth another attempt */
const RETRYABLE: ReadonlySet<ApiErrorVariant> = new Set(["Http", "Timeout", "ServerError", "RateLimited"]);

export class ApiError extends Error {
  readonly variant: ApiErrorVariant;
  readonly statusCode?: number;
  readonly details?: string;
  readonly url?: string;

  constructor(variant: ApiErrorVariant, message: string, init: ApiErrorInit = {}) {
    super(message);
    this.name = "ApiError";
    this.variant = variant;
    this.statusCode = init.statusCode;
    this.details = init.details;
    this.url = init.url;
  }

  /** Transient failures: network errors, timeouts, 5xx and 429 */
  get retryable(): boolean {
    return RETRYABLE.has(this.variant);
  }

  /** Network failure before any response */
  static http(message: string, url?: string): ApiError {
    return new ApiError("Http", `HTTP error: ${message}`, { url });
  }

  static timeout(timeoutMs: number, url?: string): ApiError {
    return new ApiError("Timeout", `Request timed out after ${timeoutMs}ms`, { url });
  }

  static notFound(message: string, url?: string): ApiError {
    return new ApiError("NotFound", `Not found: ${message}`, { statusCode: 404, url });
  }

  static badRequest(message: string, url?: string): ApiError {
    return new ApiError("BadRequest", `Bad request: ${message}`, { statusCode: 400, url });
  }

  /** The API key is valid but not allowed this call */
  static forbidden(message: string, url?: string): ApiError {
    return new ApiError("Forbidden", `Permission denied: ${message}`, { statusCode: 403, url });
  }

  static serverError(message: string, statusCode: number = 500, url?: string): ApiError {
    return new ApiError("ServerError", `Server error: ${message}`, { statusCode, url });
  }

  /** Body is not JSON or does not match the expected shape */
  static deserialize(message: string, details?: string, url?: string): ApiError {
    return new ApiError("Deserialize", `Deserialization error: ${message}`, { details, url });
  }

  /** Rejected locally, before any request */
  static invalidParameter(message: string): ApiError {
    return new ApiError("InvalidParameter", `Invalid parameter: ${message}`);
  }

  static unexpectedStatus(statusCode: number, message: string, url?: string): ApiError {
    return new ApiError("UnexpectedStatus", `Unexpected status ${statusCode}: ${message}`, { statusCode, url });
  }

  static rateLimited(message: string, url?: string): ApiError {
    return new ApiError("RateLimited", `Rate limited: ${message}`, { statusCode: 429, url });
  }

  /** Missing or invalid API key */
  static unauthorized(message: string, url?: string): ApiError {
    return new ApiError("Unauthorized", `Unauthorized: ${message}`, { statusCode: 401, url });
  }

  /**
   * Map a non-2xx status to its variant. Any 5xx is a server error.
   */
  static fromStatus(statusCode: number, message: string, url?: string): ApiError {
    const factory = STATUS_FACTORIES[statusCode];
    if (factory !== undefined) return factory(message, url);
    if (statusCode >= 500 && statusCode < 600) return ApiError.serverError(message, statusCode, url);
    return ApiError.unexpectedStatus(statusCode, message, url);
  }
}

const STATUS_FACTORIES: Record<number, (message: string, url?: string) => ApiError> = {
  400: ApiError.badRequest,
  401: ApiError.unauthorized,
  403: ApiError.forbidden,
  404: ApiError.notFound,
  429: ApiError.rateLimited,
};

/**
 * Error body shapes the trading API and the node return.
 */
export interface ErrorResponse {
  status?: string;
  message?: string;
  error?: string;
  details?: string;
  /** Node error code, e.g. `resource_not_found` */
  error_code?: string;
}

/** Pick the known string fields out of a parsed error body */
export function toErrorResponse(body: unknown): ErrorResponse {
  if (typeof body !== "object" || body === null || Array.isArray(body)) return {};
  const out: ErrorResponse = {};
  for (const key of ["status", "message", "error", "details", "error_code"] as const) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value === "string") out[key] = value;
  }
  return out;
}

/**
 * Best human-readable text of an error body.
 */
export function getErrorMessage(response: ErrorResponse): string {
  return response.message || response.error || response.details || response.error_code || "Unknown error";
}
