/**
 * In-memory HttpTransport for tests: scripted responses, request recording
 * and connections that drop mid-body.
 */

import type { HttpRequestOptions, HttpResponse, HttpTransport } from "../ports/http.js";

export interface RecordedRequest {
  method: "GET" | "HEAD";
  url: string;
  headers: Record<string, string>;
  timeoutMs: number;
}

export interface ScriptedResponse {
  status: number;
  headers?: Record<string, string>;
  chunks?: Uint8Array[];
  /** Thrown from the body iterator after every chunk was yielded */
  failAfter?: Error;
  /** Runs ahead of yielding chunk `index` */
  beforeChunk?: (index: number) => void;
}

/** Returns the response for a request, or an error to reject with */
export type RequestHandler = (request: RecordedRequest) => ScriptedResponse | Error;

export class FakeHttpTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  discarded = 0;

  constructor(private readonly handler: RequestHandler) {}

  head(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    return this.respond("HEAD", url, options);
  }

  get(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    return this.respond("GET", url, options);
  }

  /** Requests of one method, in order */
  calls(method: "GET" | "HEAD"): RecordedRequest[] {
    return this.requests.filter((request) => request.method === method);
  }

  private async respond(
    method: "GET" | "HEAD",
    url: string,
    options: HttpRequestOptions
  ): Promise<HttpResponse> {
    const request: RecordedRequest = {
      method,
      url,
      headers: { ...options.headers },
      timeoutMs: options.timeoutMs,
    };
    this.requests.push(request);

    const scripted = this.handler(request);
    if (scripted instanceof Error) throw scripted;

    const headers = new Map(
      Object.entries(scripted.headers ?? {}).map(([name, value]) => [name.toLowerCase(), value])
    );
    const chunks = method === "HEAD" ? [] : (scripted.chunks ?? []);

    const body = async function* (): AsyncGenerator<Uint8Array> {
      for (const [index, chunk] of chunks.entries()) {
        scripted.beforeChunk?.(index);
        yield chunk;
      }
      if (scripted.failAfter) throw scripted.failAfter;
    };

    return {
      status: scripted.status,
      headers: { get: (name) => headers.get(name.toLowerCase()) ?? null },
      body: body(),
      discard: () => {
        this.discarded++;
      },
    };
  }
}

/** Error shaped like a socket reset */
export function connectionReset(): Error {
  return Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
}

/** Split a buffer into chunks of at most `size` bytes */
export function chunk(content: Buffer, size: number): Buffer[] {
  const chunks: Buffer[] = [];
  for (let offset = 0; offset < content.length; offset += size) {
    chunks.push(content.subarray(offset, offset + size));
  }
  return chunks;
}

export interface ContentServerOptions {
  /** Answer ranged GETs with a full 200 */
  ignoreRange?: boolean;
  /** Leave Content-Length out of HEAD replies */
  hideLength?: boolean;
  /**
   * Bytes to send before dropping the connection, by 0-based GET index.
   * GETs without an entry complete normally.
   */
  dropAfter?: (getIndex: number) => number | undefined;
  /** Body chunk size, 1024 by default */
  chunkSize?: number;
}

/**
 * Handler serving one fixed body with HEAD, Range and 206 support.
 */
export function serveContent(content: Buffer, options: ContentServerOptions = {}): RequestHandler {
  const chunkSize = options.chunkSize ?? 1024;
  let getIndex = 0;

  return (request): ScriptedResponse | Error => {
    if (request.method === "HEAD") {
      return {
        status: 200,
        headers: options.hideLength ? {} : { "Content-Length": String(content.length) },
      };
    }

    const range = /^bytes=(\d+)-$/.exec(request.headers.Range ?? "");
    const start = range && !options.ignoreRange ? Number(range[1]) : 0;
    const slice = content.subarray(start);
    const headers: Record<string, string> = { "Content-Length": String(slice.length) };
    if (start > 0) {
      headers["Content-Range"] = `bytes ${start}-${content.length - 1}/${content.length}`;
    }

    const dropAt = options.dropAfter?.(getIndex);
    getIndex++;

    if (dropAt === undefined) {
      return { status: start > 0 ? 206 : 200, headers, chunks: chunk(slice, chunkSize) };
    }
    return {
      status: start > 0 ? 206 : 200,
      headers,
      chunks: chunk(slice.subarray(0, dropAt), chunkSize),
      failAfter: connectionReset(),
    };
  };
}

/** Deterministic test payload of `length` bytes */
export function makeContent(length: number): Buffer {
  const content = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    content[i] = (i * 31 + 7) % 251;
  }
  return content;
}
