import type { HttpTransport } from "./ports/http.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { describeError } from "./network-errors.js";

export interface ProbeOptions {
  transport: HttpTransport;
  timeoutMs?: number;
  logger?: Logger;
}

export type ProbeSize = (url: string) => Promise<number>;

export const DEFAULT_PROBE_TIMEOUT_MS = 10_000;

function parseLength(value: string | null): number | undefined {
  if (value === null || !/^\d+$/.test(value.trim())) return undefined;
  return Number(value.trim());
}

/**
 * Create a size probe. The probe issues a HEAD request and returns the
 * remote size in bytes, or 0 when the size cannot be learned. It never throws.
 *
 * Large-file storage objects on the canonical host answer with the size of a
 * pointer in Content-Length but carry the real size in X-Linked-Size, which is
 * used when Content-Length is absent.
 */
export function createProbe({
  transport,
  timeoutMs = DEFAULT_PROBE_TIMEOUT_MS,
  logger = createNoopLogger(),
}: ProbeOptions): ProbeSize {
  return async (url) => {
    try {
      const response = await transport.head(url, { timeoutMs });
      response.discard();

      if (response.status < 200 || response.status >= 300) {
        logger.debug("Size probe got a non-success status", { url, status: response.status });
        return 0;
      }

      const size =
        parseLength(response.headers.get("content-length")) ??
        parseLength(response.headers.get("x-linked-size"));
      if (size === undefined) {
        logger.debug("Size probe found no length header", { url });
        return 0;
      }
      return size;
    } catch (error) {
      logger.debug("Size probe failed", { url, error: describeError(error) });
      return 0;
    }
  };
}
