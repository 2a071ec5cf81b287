import { describe, it, expect } from "vitest";
import { buildListingUrl, createDirectoryLister } from "./directory-lister.js";
import { FakeHttpTransport, connectionReset } from "./testing/fake-http.js";
import type { RepoCoordinates } from "./url-resolver.js";

const repo: RepoCoordinates = { owner: "org", name: "model", branch: "main", subpath: "" };

function jsonBody(value: unknown) {
  return { status: 200, chunks: [Buffer.from(JSON.stringify(value))] };
}

describe("buildListingUrl", () => {
  it("builds the root listing URL", () => {
    expect(buildListingUrl("mirror.test", repo)).toBe(
      "https://mirror.test/api/models/org/model/tree/main"
    );
  });

  it("appends the subpath", () => {
    expect(buildListingUrl("mirror.test", { ...repo, branch: "dev", subpath: "onnx/fp16" })).toBe(
      "https://mirror.test/api/models/org/model/tree/dev/onnx/fp16"
    );
  });
});

describe("createDirectoryLister", () => {
  it("keeps only files, in listing order", async () => {
    const transport = new FakeHttpTransport(() =>
      jsonBody([
        { type: "file", path: "config.json", size: 512 },
        { type: "directory", path: "onnx" },
        { type: "file", path: "model.safetensors", size: 1048576, oid: "abc" },
        { type: "file", path: "README.md" },
      ])
    );
    const list = createDirectoryLister({ transport, mirrorHost: "mirror.test" });

    await expect(list(repo)).resolves.toEqual({
      ok: true,
      files: [
        {
          relativePath: "config.json",
          downloadURL: "https://mirror.test/org/model/resolve/main/config.json",
          declaredSize: 512,
        },
        {
          relativePath: "model.safetensors",
          downloadURL: "https://mirror.test/org/model/resolve/main/model.safetensors",
          declaredSize: 1048576,
        },
        {
          relativePath: "README.md",
          downloadURL: "https://mirror.test/org/model/resolve/main/README.md",
          declaredSize: 0,
        },
      ],
    });
    expect(transport.requests).toEqual([
      {
        method: "GET",
        url: "https://mirror.test/api/models/org/model/tree/main",
        headers: {},
        timeoutMs: 30_000,
      },
    ]);
  });

  it("builds download URLs from the full entry path", async () => {
    const transport = new FakeHttpTransport(() =>
      jsonBody([{ type: "file", path: "onnx/model.onnx", size: 10 }])
    );
    const list = createDirectoryLister({ transport, mirrorHost: "mirror.test" });

    const result = await list({ ...repo, subpath: "onnx" });
    expect(result).toEqual({
      ok: true,
      files: [
        {
          relativePath: "onnx/model.onnx",
          downloadURL: "https://mirror.test/org/model/resolve/main/onnx/model.onnx",
          declaredSize: 10,
        },
      ],
    });
  });

  it("returns an empty list for an empty directory", async () => {
    const transport = new FakeHttpTransport(() => jsonBody([]));
    const list = createDirectoryLister({ transport, mirrorHost: "mirror.test" });
    await expect(list(repo)).resolves.toEqual({ ok: true, files: [] });
  });

  it("fails on a non-success status", async () => {
    const transport = new FakeHttpTransport(() => ({ status: 404 }));
    const list = createDirectoryLister({ transport, mirrorHost: "mirror.test" });

    await expect(list(repo)).resolves.toEqual({ ok: false, reason: "HTTP 404" });
    expect(transport.discarded).toBe(1);
  });

  it("fails on a network error", async () => {
    const transport = new FakeHttpTransport(() => connectionReset());
    const list = createDirectoryLister({ transport, mirrorHost: "mirror.test" });
    await expect(list(repo)).resolves.toEqual({
      ok: false,
      reason: "socket hang up (ECONNRESET)",
    });
  });

  it("fails on invalid JSON", async () => {
    const transport = new FakeHttpTransport(() => ({
      status: 200,
      chunks: [Buffer.from("<html>")],
    }));
    const list = createDirectoryLister({ transport, mirrorHost: "mirror.test" });
    await expect(list(repo)).resolves.toEqual({
      ok: false,
      reason: "Listing response is not valid JSON",
    });
  });

  it("fails on an unexpected shape instead of returning part of it", async () => {
    const transport = new FakeHttpTransport(() =>
      jsonBody([
        { type: "file", path: "ok.txt", size: 1 },
        { type: "file", path: "bad.txt", size: -5 },
      ])
    );
    const list = createDirectoryLister({ transport, mirrorHost: "mirror.test" });

    const result = await list(repo);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toMatch(/^Unexpected listing format: .* at 1\.size$/);
    }
  });

  it("fails when the body is not an array", async () => {
    const transport = new FakeHttpTransport(() => jsonBody({ error: "Repository not found" }));
    const list = createDirectoryLister({ transport, mirrorHost: "mirror.test" });

    const result = await list(repo);
    expect(result.ok).toBe(false);
  });

  it("fails when the body drops mid-read", async () => {
    const transport = new FakeHttpTransport(() => ({
      status: 200,
      chunks: [Buffer.from('[{"type":')],
      failAfter: connectionReset(),
    }));
    const list = createDirectoryLister({ transport, mirrorHost: "mirror.test" });
    await expect(list(repo)).resolves.toEqual({
      ok: false,
      reason: "socket hang up (ECONNRESET)",
    });
  });
});
