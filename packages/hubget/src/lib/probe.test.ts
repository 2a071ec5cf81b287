import { describe, it, expect, vi } from "vitest";
import { createProbe } from "./probe.js";
import { FakeHttpTransport, connectionReset, type ScriptedResponse } from "./testing/fake-http.js";
import type { Logger } from "./logger.js";

const FILE_URL = "https://mirror.test/o/n/resolve/main/model.bin";

describe("createProbe", () => {
  it("returns Content-Length of a successful HEAD", async () => {
    const transport = new FakeHttpTransport(() => ({
      status: 200,
      headers: { "Content-Length": "4096" },
    }));
    const probe = createProbe({ transport });

    await expect(probe(FILE_URL)).resolves.toBe(4096);
    expect(transport.requests).toEqual([
      { method: "HEAD", url: FILE_URL, headers: {}, timeoutMs: 10_000 },
    ]);
    expect(transport.discarded).toBe(1);
  });

  it("falls back to X-Linked-Size", async () => {
    const transport = new FakeHttpTransport(() => ({
      status: 200,
      headers: { "X-Linked-Size": "123456789" },
    }));
    await expect(createProbe({ transport })(FILE_URL)).resolves.toBe(123456789);
  });

  it("passes the configured timeout", async () => {
    const transport = new FakeHttpTransport(() => ({ status: 200 }));
    await createProbe({ transport, timeoutMs: 500 })(FILE_URL);
    expect(transport.requests[0].timeoutMs).toBe(500);
  });

  const unusable: Array<[string, ScriptedResponse]> = [
    ["a missing length", { status: 200 }],
    ["a non-numeric length", { status: 200, headers: { "Content-Length": "lots" } }],
    ["a 404", { status: 404, headers: { "Content-Length": "12" } }],
    ["a 500", { status: 500 }],
  ];

  it.each(unusable)("returns 0 for %s", async (_label, scripted) => {
    const transport = new FakeHttpTransport(() => scripted);
    await expect(createProbe({ transport })(FILE_URL)).resolves.toBe(0);
  });

  it("returns 0 and logs when the request fails", async () => {
    const debug = vi.fn();
    const logger: Logger = {
      debug,
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
      child: () => logger,
    };
    const transport = new FakeHttpTransport(() => connectionReset());

    await expect(createProbe({ transport, logger })(FILE_URL)).resolves.toBe(0);
    expect(debug).toHaveBeenCalledWith("Size probe failed", {
      url: FILE_URL,
      error: "socket hang up (ECONNRESET)",
    });
  });
});
