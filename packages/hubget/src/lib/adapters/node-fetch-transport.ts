import fetch from "node-fetch";
import type { HttpRequestOptions, HttpResponse, HttpTransport } from "../ports/http.js";
import { IdleTimeoutError } from "../network-errors.js";
import { createNoopLogger, type Logger } from "../logger.js";

export interface NodeFetchTransportOptions {
  /** Sent with every request */
  userAgent: string;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

/**
 * HTTP transport backed by node-fetch.
 *
 * Redirects are followed. The timeout is an idle timeout re-armed on every
 * body chunk, so a long transfer only fails when the connection stalls.
 */
export function createNodeFetchTransport({
  userAgent,
  fetchImpl = fetch,
  logger = createNoopLogger(),
}: NodeFetchTransportOptions): HttpTransport {
  async function send(
    method: "GET" | "HEAD",
    url: string,
    options: HttpRequestOptions
  ): Promise<HttpResponse> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let timedOut = false;

    const disarm = () => clearTimeout(timer);
    const arm = () => {
      disarm();
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, options.timeoutMs);
    };
    const translate = (error: unknown): unknown =>
      timedOut
        ? new IdleTimeoutError(options.timeoutMs, { cause: error })
        : error;

    logger.debug("HTTP request", { method, url, range: options.headers?.Range });

    arm();
    let response: Awaited<ReturnType<typeof fetchImpl>>;
    try {
      response = await fetchImpl(url, {
        method,
        headers: { "User-Agent": userAgent, ...options.headers },
        redirect: "follow",
        signal: controller.signal,
      });
    } catch (error) {
      disarm();
      throw translate(error);
    }

    logger.debug("HTTP response", { method, url, status: response.status });

    const source = response.body;
    if (method === "HEAD" || !source) {
      disarm();
    }

    async function* readBody(): AsyncGenerator<Uint8Array> {
      if (!source) return;
      arm();
      try {
        for await (const chunk of source) {
          arm();
          yield typeof chunk === "string" ? Buffer.from(chunk) : chunk;
        }
      } catch (error) {
        throw translate(error);
      } finally {
        disarm();
      }
    }

    return {
      status: response.status,
      headers: response.headers,
      body: readBody(),
      discard() {
        disarm();
        controller.abort();
      },
    };
  }

  return {
    head: (url, options) => send("HEAD", url, options),
    get: (url, options) => send("GET", url, options),
  };
}
