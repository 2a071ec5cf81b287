/**
 * Classification of failures the transfer engine may retry.
 */

/**
 * A network-level failure expected to succeed on an immediate retry:
 * idle timeouts and bodies that ended before their announced length.
 */
export class TransientNetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientNetworkError";
  }
}

/** The connection delivered no data within the idle timeout */
export class IdleTimeoutError extends TransientNetworkError {
  constructor(readonly timeoutMs: number, options?: { cause?: unknown }) {
    super(`No data received for ${timeoutMs}ms`, options);
    this.name = "IdleTimeoutError";
  }
}

/** Socket and stream error codes that mean "the connection broke" */
const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ENETUNREACH",
  "EHOSTUNREACH",
  "ENETDOWN",
  "ERR_STREAM_PREMATURE_CLOSE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

function readStringField(error: object, field: "code" | "type"): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  return readStringField(error, "code");
}

/**
 * Whether an error belongs to the retryable class: connection errors,
 * timeouts and truncated or prematurely closed bodies. HTTP error statuses and
 * local filesystem errors are never transient.
 */
export function isTransientNetworkError(error: unknown, depth = 0): boolean {
  if (error instanceof TransientNetworkError) return true;
  if (typeof error !== "object" || error === null) return false;

  const code = errorCode(error);
  if (code && TRANSIENT_CODES.has(code)) return true;

  // node-fetch wraps socket errors as FetchError { type: "system" }
  if (error instanceof Error && error.name === "FetchError") {
    const type = readStringField(error, "type");
    if (type === "system" || type === "request-timeout" || type === "body-timeout") {
      return true;
    }
  }

  if (depth < 3 && error instanceof Error && error.cause !== undefined) {
    return isTransientNetworkError(error.cause, depth + 1);
  }
  return false;
}

/**
 * Short human-readable description of an error.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const code = errorCode(error);
    return code && !error.message.includes(code) ? `${error.message} (${code})` : error.message;
  }
  return String(error);
}
