import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { realDelay } from "./real-timers.js";

describe("realDelay", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the delay", async () => {
    let done = false;
    const waiting = realDelay(2000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(1999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await waiting;
    expect(done).toBe(true);
  });

  it("clears its timer when aborted", async () => {
    const abort = new AbortController();
    const waiting = realDelay(2000, abort.signal);
    expect(vi.getTimerCount()).toBe(1);

    abort.abort();
    await waiting;
    expect(vi.getTimerCount()).toBe(0);
  });

  it("does not start a timer for an aborted signal", async () => {
    const abort = new AbortController();
    abort.abort();

    await realDelay(2000, abort.signal);
    expect(vi.getTimerCount()).toBe(0);
  });
});
