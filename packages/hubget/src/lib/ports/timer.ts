/**
 * Promise-based delay function type.
 * Injected wherever the code waits (retry backoff) so tests can skip the wait.
 * Aborting `signal` ends the wait early and releases its timer.
 */
export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;
