/**
 * Abstraction over the HTTP client used for probing, listing and transfers.
 * Lets the engine run against scripted responses in tests.
 */

export interface HttpRequestOptions {
  /** Extra request headers (User-Agent is set by the transport) */
  headers?: Record<string, string>;
  /**
   * Idle timeout in milliseconds: the request fails when no response or no
   * body chunk arrives within this window.
   */
  timeoutMs: number;
}

export interface HttpResponse {
  status: number;
  headers: { get(name: string): string | null };
  /** Response body; errors while iterating are network failures */
  body: AsyncIterable<Uint8Array>;
  /** Release the connection without reading the rest of the body */
  discard(): void;
}

export interface HttpTransport {
  head(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
  get(url: string, options: HttpRequestOptions): Promise<HttpResponse>;
}
