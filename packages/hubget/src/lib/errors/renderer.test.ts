import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => {
  const identity = (s: string) => s;
  const chain = Object.assign((s: string) => s, { bold: identity });
  return {
    default: {
      red: chain,
      yellow: identity,
      cyan: identity,
      dim: identity,
      gray: identity,
      green: identity,
      bold: identity,
    },
  };
});

import { formatStaticError, toErrorJson, renderError, reportError } from "./renderer.js";
import { downloadCancelled, listingFailed, urlUnresolved, invalidConfig } from "./catalog.js";
import { CLIError } from "./types.js";

describe("error renderer", () => {
  let consoleErrorSpy: MockInstance;
  const originalExitCode = process.exitCode;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = originalExitCode;
  });

  describe("formatStaticError", () => {
    it("renders message, details and suggestion", () => {
      const lines = formatStaticError(listingFailed("org/model", "HTTP 404"));

      expect(lines).toEqual([
        "",
        "✗ Couldn't list files of org/model",
        "",
        "  HTTP 404",
        "",
        "  → Check the repository, branch and path, or try another mirror with --mirror",
        "",
      ]);
    });

    it("renders a single example as a Try line", () => {
      const lines = formatStaticError(downloadCancelled("model.bin"));

      expect(lines).toContain("  → The partial file was kept; run the same command again to resume");
      expect(lines).not.toContain("  Examples:");
    });

    it("lists several examples with a prompt symbol", () => {
      const lines = formatStaticError(urlUnresolved("ftp://x"));

      expect(lines).toContain("  Examples:");
      expect(lines).toContain(
        "    $ hubget get https://hf-mirror.com/org/model/tree/main -o ./model"
      );
    });

    it("splits multi-line details into separate lines", () => {
      const lines = formatStaticError(invalidConfig("/tmp/c.yaml", ["a: bad", "b: worse"]));

      expect(lines).toContain("  • a: bad");
      expect(lines).toContain("  • b: worse");
    });
  });

  describe("toErrorJson", () => {
    it("drops undefined fields", () => {
      const json = toErrorJson(new CLIError("UNKNOWN_ERROR", "boom"));

      expect(json).toEqual({
        success: false,
        error: { code: "UNKNOWN_ERROR", message: "boom" },
      });
    });

    it("normalises a single example into an array", () => {
      const json = toErrorJson(new CLIError("BATCH_INCOMPLETE", "x", { example: "hubget resume ." }));

      expect(json).toEqual({
        success: false,
        error: { code: "BATCH_INCOMPLETE", message: "x", examples: ["hubget resume ."] },
      });
    });
  });

  describe("renderError", () => {
    it("prints JSON in json mode", () => {
      renderError(new CLIError("LISTING_EMPTY", "empty"), "json");

      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
      const printed = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
      expect(printed.error.code).toBe("LISTING_EMPTY");
    });
  });

  describe("reportError", () => {
    it("uses the CLIError exit code", () => {
      reportError(downloadCancelled("model.bin"), "static");
      expect(process.exitCode).toBe(130);
    });

    it("wraps plain errors as UNKNOWN_ERROR", () => {
      reportError(new Error("socket hang up"), "json");

      const printed = JSON.parse(String(consoleErrorSpy.mock.calls[0][0]));
      expect(printed.error).toEqual({ code: "UNKNOWN_ERROR", message: "socket hang up" });
      expect(process.exitCode).toBe(1);
    });
  });
});
