import type { DelayFn } from "../ports/timer.js";

/**
 * Pause and cancel flags for one transfer.
 *
 * A control is created by the engine for every call and handed to the caller,
 * so two transfers can never share flags.
 */
export class TransferControl {
  private paused = false;
  private cancelled = false;
  private resumeWaiters: Array<() => void> = [];
  private cancelWaiters: Array<() => void> = [];

  get pauseRequested(): boolean {
    return this.paused;
  }

  get cancelRequested(): boolean {
    return this.cancelled;
  }

  pause(): void {
    if (this.cancelled) return;
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    this.resumeWaiters = flush(this.resumeWaiters);
  }

  /** Cancel the transfer; also releases a paused transfer */
  cancel(): void {
    this.cancelled = true;
    this.resumeWaiters = flush(this.resumeWaiters);
    this.cancelWaiters = flush(this.cancelWaiters);
  }

  /**
   * Resolve once the transfer may continue: immediately when not paused,
   * otherwise on the next resume or cancel.
   */
  waitWhilePaused(): Promise<void> {
    if (!this.paused || this.cancelled) return Promise.resolve();
    return new Promise((resolve) => {
      this.resumeWaiters.push(resolve);
    });
  }

  /**
   * Wait `ms` through `delay`, returning early on cancel. A cancel aborts the
   * signal passed to `delay`.
   * Resolves true when the transfer was cancelled before or during the wait.
   */
  sleep(ms: number, delay: DelayFn): Promise<boolean> {
    if (this.cancelled) return Promise.resolve(true);
    return new Promise((resolve, reject) => {
      const abort = new AbortController();
      const onCancel = () => {
        abort.abort();
        resolve(true);
      };
      this.cancelWaiters.push(onCancel);
      delay(ms, abort.signal).then(() => {
        this.cancelWaiters = this.cancelWaiters.filter((waiter) => waiter !== onCancel);
        resolve(this.cancelled);
      }, reject);
    });
  }
}

function flush(waiters: Array<() => void>): Array<() => void> {
  for (const waiter of waiters) {
    waiter();
  }
  return [];
}
