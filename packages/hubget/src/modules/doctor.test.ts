import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => ({
  default: {
    green: (s: string) => s,
    yellow: (s: string) => s,
    red: (s: string) => s,
    dim: (s: string) => s,
    gray: (s: string) => s,
    bold: Object.assign((s: string) => s, { cyan: (s: string) => s }),
  },
}));

import { runDoctor, type DoctorDeps } from "./doctor.js";
import { ConfigFileError, resolveConfig } from "../lib/config.js";
import { initContext, resetContext } from "../lib/cli-context.js";
import { FakeHttpTransport, connectionReset, type RequestHandler } from "../lib/testing/fake-http.js";
import type { Clock } from "../lib/ports/clock.js";

function steppingClock(...times: number[]): Clock {
  let index = 0;
  return { now: () => times[Math.min(index++, times.length - 1)] };
}

function deps(handler: RequestHandler, overrides: Partial<DoctorDeps> = {}) {
  const transport = new FakeHttpTransport(handler);
  const merged: DoctorDeps = {
    load: () => ({ config: resolveConfig(), sources: [] }),
    transport,
    clock: steppingClock(100, 142),
    env: {},
    nodeVersion: "v20.11.0",
    ...overrides,
  };
  return { transport, deps: merged };
}

describe("doctor", () => {
  let consoleLogSpy: MockInstance;

  beforeEach(() => {
    initContext(["--json"], {});
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    resetContext();
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  function jsonResult() {
    return JSON.parse(String(consoleLogSpy.mock.calls[0][0])).data;
  }

  it("passes every check against a reachable mirror", async () => {
    const { transport, deps: d } = deps(() => ({ status: 200 }));

    await runDoctor({}, d);

    const result = jsonResult();
    expect(result.checks).toEqual([
      { name: "Node.js version", status: "pass", message: "Node.js v20.11.0" },
      { name: "Configuration", status: "pass", message: "Defaults only" },
      { name: "Network connectivity", status: "pass", message: "Connected to hf-mirror.com (42ms)" },
    ]);
    expect(result.network).toEqual({ mirrorHost: "hf-mirror.com", reachable: true, latencyMs: 42 });
    expect(transport.calls("HEAD").map((request) => request.url)).toEqual([
      "https://hf-mirror.com/",
    ]);
    expect(transport.discarded).toBe(1);
    expect(process.exitCode).toBeUndefined();
  });

  it("fails on an old Node.js", async () => {
    const { deps: d } = deps(() => ({ status: 200 }), { nodeVersion: "v18.19.0" });

    await runDoctor({}, d);

    expect(jsonResult().checks[0]).toEqual({
      name: "Node.js version",
      status: "fail",
      message: "Node.js v18.19.0 (requires >= 20)",
      details: "Upgrade Node.js to version 20 or higher",
    });
    expect(process.exitCode).toBe(1);
  });

  it("falls back to defaults when the config file is invalid", async () => {
    const { transport, deps: d } = deps(() => ({ status: 200 }), {
      load: () => {
        throw new ConfigFileError("/tmp/bad.yaml", ["retry.attempts: too big"]);
      },
      env: { HF_ENDPOINT: "https://env.mirror.test" },
    });

    await runDoctor({ config: "/tmp/bad.yaml" }, d);

    const result = jsonResult();
    expect(result.checks[1]).toEqual({
      name: "Configuration",
      status: "fail",
      message: "Config file is invalid, using defaults",
      details: "Invalid config file /tmp/bad.yaml:\n  - retry.attempts: too big",
    });
    expect(result.checks[2]).toEqual({
      name: "Environment",
      status: "pass",
      message: "HF_ENDPOINT is set (https://env.mirror.test)",
    });
    expect(transport.requests[0].url).toBe("https://env.mirror.test/");
    expect(process.exitCode).toBe(1);
  });

  it("reports a mirror that cannot be reached", async () => {
    const { deps: d } = deps(() => connectionReset());

    await runDoctor({}, d);

    const result = jsonResult();
    expect(result.checks[2]).toEqual({
      name: "Network connectivity",
      status: "fail",
      message: "Cannot connect to hf-mirror.com",
      details: "socket hang up (ECONNRESET)",
    });
    expect(result.network).toEqual({ mirrorHost: "hf-mirror.com", reachable: false });
    expect(process.exitCode).toBe(1);
  });

  it("warns about a slow mirror", async () => {
    const { deps: d } = deps(() => ({ status: 200 }), { clock: steppingClock(0, 4500) });

    await runDoctor({}, d);

    expect(jsonResult().checks[2].status).toBe("warn");
    expect(process.exitCode).toBeUndefined();
  });

  it("prints a readable report", async () => {
    initContext([], {});
    const { deps: d } = deps(() => ({ status: 503 }));

    await runDoctor({ verbose: true }, d);

    const lines = consoleLogSpy.mock.calls.map(([line]) => line);
    expect(lines).toContain("✓ Node.js version: Node.js v20.11.0");
    expect(lines).toContain("✗ Network connectivity: Server returned 503");
    expect(lines).toContain(
      "    The mirror may be temporarily unavailable; try another with --mirror"
    );
    expect(lines).toContain("✗ 1 check(s) failed");
  });
});
