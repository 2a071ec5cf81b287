import { describe, it, expect } from "vitest";
import {
  IdleTimeoutError,
  TransientNetworkError,
  isTransientNetworkError,
  errorCode,
  describeError,
} from "./network-errors.js";

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("network errors", () => {
  it("treats TransientNetworkError as transient", () => {
    expect(isTransientNetworkError(new TransientNetworkError("idle"))).toBe(true);
  });

  it("treats an idle timeout as transient", () => {
    const error = new IdleTimeoutError(60000);
    expect(isTransientNetworkError(error)).toBe(true);
    expect(error.message).toBe("No data received for 60000ms");
  });

  it("recognises socket error codes", () => {
    expect(isTransientNetworkError(withCode("aborted", "ECONNRESET"))).toBe(true);
    expect(isTransientNetworkError(withCode("Premature close", "ERR_STREAM_PREMATURE_CLOSE"))).toBe(true);
  });

  it("recognises node-fetch system errors without a known code", () => {
    const error = Object.assign(new Error("request failed"), { type: "system" });
    error.name = "FetchError";
    expect(isTransientNetworkError(error)).toBe(true);
  });

  it("follows the cause chain", () => {
    const error = new Error("wrapped", { cause: withCode("refused", "ECONNREFUSED") });
    expect(isTransientNetworkError(error)).toBe(true);
  });

  it("does not retry filesystem errors", () => {
    expect(isTransientNetworkError(withCode("no space left", "ENOSPC"))).toBe(false);
    expect(isTransientNetworkError(withCode("permission denied", "EACCES"))).toBe(false);
  });

  it("does not retry plain errors or non-errors", () => {
    expect(isTransientNetworkError(new Error("bad"))).toBe(false);
    expect(isTransientNetworkError("ECONNRESET")).toBe(false);
    expect(isTransientNetworkError(null)).toBe(false);
  });

  it("reads error codes", () => {
    expect(errorCode(withCode("x", "EPIPE"))).toBe("EPIPE");
    expect(errorCode(new Error("x"))).toBeUndefined();
    expect(errorCode(42)).toBeUndefined();
  });

  it("describes errors with their code", () => {
    expect(describeError(withCode("socket hang up", "ECONNRESET"))).toBe("socket hang up (ECONNRESET)");
    expect(describeError(withCode("connect ECONNREFUSED 127.0.0.1:1", "ECONNREFUSED"))).toBe(
      "connect ECONNREFUSED 127.0.0.1:1"
    );
    expect(describeError("plain")).toBe("plain");
  });
});
