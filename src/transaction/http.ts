import { TransactionError } from "./error";

/** Node request headers; `x-api-key` only when a key is set */
export function nodeHeaders(apiKey?: string, extra: Record<string, string> = {}): Record<string, string> {
  return apiKey ? { "x-api-key": apiKey, ...extra } : { ...extra };
}

/**
 * Response body as text, for error messages. A body that cannot be read
 * is reported in its place.
 */
export async function responseText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (e) {
    return `<unreadable body: ${e instanceof Error ? e.message : String(e)}>`;
  }
}

/**
 * Parse a JSON body, turning a malformed one into an `Http` error.
 */
export async function responseJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch (e) {
    throw new TransactionError("Http", `Invalid JSON response from ${response.url || "node"}`, {
      statusCode: response.status,
      cause: e,
    });
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(TransactionError.aborted());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(TransactionError.aborted());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
