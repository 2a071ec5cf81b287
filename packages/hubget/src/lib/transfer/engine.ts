import { mkdir, open, stat } from "fs/promises";
import { dirname } from "path";
import type { HttpResponse, HttpTransport } from "../ports/http.js";
import type { DelayFn } from "../ports/timer.js";
import type { Clock } from "../ports/clock.js";
import { realDelay } from "../adapters/real-timers.js";
import { systemClock } from "../adapters/system-clock.js";
import { createNoopLogger, type Logger } from "../logger.js";
import { createProbe, type ProbeSize } from "../probe.js";
import { formatSize } from "../format.js";
import {
  IdleTimeoutError,
  TransientNetworkError,
  describeError,
  errorCode,
  isTransientNetworkError,
} from "../network-errors.js";
import { TransferControl } from "./control.js";
import { DEFAULT_CHANNEL_CAPACITY, EventChannel } from "./event-channel.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type StatusKind =
  | "exists"
  | "resuming"
  | "retrying"
  | "done"
  | "cancelled"
  | "failed"
  | "path-error";

export interface TransferObserver {
  onProgress?(percent: number, bytesDownloaded: number, totalBytes: number): void | Promise<void>;
  onStatus?(message: string, kind: StatusKind): void | Promise<void>;
}

export type TransferEvent =
  | { type: "progress"; percent: number; bytesDownloaded: number; totalBytes: number }
  | { type: "status"; message: string; kind: StatusKind };

export interface TransferHandle {
  /** Pause, resume or cancel this transfer */
  control: TransferControl;
  /**
   * true when the file is complete on disk. Resolves after the observer has
   * received every event.
   */
  result: Promise<boolean>;
}

export interface RetryPolicy {
  /** Total attempts, including the first */
  attempts: number;
  delayMs: number;
}

export interface TransferEngineOptions {
  transport: HttpTransport;
  /** Defaults to a HEAD probe over the same transport */
  probe?: ProbeSize;
  probeTimeoutMs?: number;
  /** Idle timeout of the GET request */
  requestTimeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  delay?: DelayFn;
  /** Measures pauses */
  clock?: Clock;
  logger?: Logger;
  chunkSize?: number;
  channelCapacity?: number;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
export const DEFAULT_RETRY: RetryPolicy = { attempts: 3, delayMs: 2000 };
export const CHUNK_SIZE = 8192;

type Emit = (event: TransferEvent) => Promise<void>;

interface TransferState {
  bytesDownloaded: number;
  totalBytes: number;
  /** Highest byte count reported so far; progress never goes backwards */
  reportedBytes: number;
}

/** How one GET attempt ended without throwing */
type AttemptOutcome =
  | { kind: "done" }
  | { kind: "cancelled" }
  | { kind: "http-error"; status: number };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Size of a regular file, 0 when it does not exist */
export async function localFileSize(path: string): Promise<number> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : 0;
  } catch (error) {
    if (errorCode(error) === "ENOENT") return 0;
    throw error;
  }
}

function parseCount(value: string | null): number | undefined {
  if (value === null || !/^\d+$/.test(value.trim())) return undefined;
  return Number(value.trim());
}

/** Total size from `Content-Range: bytes 100-199/200` */
function contentRangeTotal(value: string | null): number | undefined {
  const match = value ? /\/(\d+)\s*$/.exec(value) : null;
  return match ? Number(match[1]) : undefined;
}

function* slices(chunk: Uint8Array, size: number): Generator<Uint8Array> {
  for (let offset = 0; offset < chunk.length; offset += size) {
    yield chunk.subarray(offset, offset + size);
  }
}

function dispatch(observer: TransferObserver, event: TransferEvent): void | Promise<void> {
  if (event.type === "progress") {
    return observer.onProgress?.(event.percent, event.bytesDownloaded, event.totalBytes);
  }
  return observer.onStatus?.(event.message, event.kind);
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

/**
 * Downloads one URL to one file with resume, retry, pause and cancel.
 *
 * The engine keeps no per-transfer state: every `start` creates its own
 * control and event channel, so one engine can serve a whole batch.
 */
export class TransferEngine {
  private readonly transport: HttpTransport;
  private readonly probe: ProbeSize;
  private readonly requestTimeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly delay: DelayFn;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly chunkSize: number;
  private readonly channelCapacity: number;

  constructor(options: TransferEngineOptions) {
    this.transport = options.transport;
    this.logger = options.logger ?? createNoopLogger();
    this.probe =
      options.probe ??
      createProbe({
        transport: options.transport,
        timeoutMs: options.probeTimeoutMs,
        logger: this.logger,
      });
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.delay = options.delay ?? realDelay;
    this.clock = options.clock ?? systemClock;
    this.chunkSize = options.chunkSize ?? CHUNK_SIZE;
    this.channelCapacity = options.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY;
  }

  /**
   * Begin a transfer and return its control right away.
   */
  start(url: string, destinationPath: string, observer: TransferObserver = {}): TransferHandle {
    const control = new TransferControl();
    const channel = new EventChannel<TransferEvent>(
      (event) => dispatch(observer, event),
      this.channelCapacity
    );

    const result = (async () => {
      try {
        return await this.run(url, destinationPath, control, (event) => channel.send(event));
      } finally {
        await channel.close();
      }
    })();

    return { control, result };
  }

  /**
   * Transfer and wait for the outcome.
   */
  transfer(url: string, destinationPath: string, observer?: TransferObserver): Promise<boolean> {
    return this.start(url, destinationPath, observer).result;
  }

  private async run(
    url: string,
    destinationPath: string,
    control: TransferControl,
    emit: Emit
  ): Promise<boolean> {
    const status = (message: string, kind: StatusKind) =>
      emit({ type: "status", message, kind });
    const log = this.logger.child("transfer", { file: destinationPath });

    const directory = dirname(destinationPath);
    let existing: number;
    try {
      await mkdir(directory, { recursive: true });
      existing = await localFileSize(destinationPath);
    } catch (error) {
      await status(`Cannot write to ${directory}: ${describeError(error)}`, "path-error");
      return false;
    }

    const state: TransferState = {
      bytesDownloaded: existing,
      totalBytes: await this.probe(url),
      reportedBytes: 0,
    };
    log.debug("Probed remote size", { local: existing, remote: state.totalBytes });

    if (state.bytesDownloaded > 0 && state.bytesDownloaded === state.totalBytes) {
      await emit({
        type: "progress",
        percent: 100,
        bytesDownloaded: state.totalBytes,
        totalBytes: state.totalBytes,
      });
      await status(`File already exists (${formatSize(state.totalBytes)})`, "exists");
      return true;
    }

    if (state.bytesDownloaded > 0) {
      await status(`Resuming from ${formatSize(state.bytesDownloaded)}`, "resuming");
    }

    let failures = 0;
    for (;;) {
      let longestPauseMs = 0;
      try {
        const outcome = await this.attempt(url, destinationPath, state, control, emit, (ms) => {
          longestPauseMs = Math.max(longestPauseMs, ms);
        });

        switch (outcome.kind) {
          case "done":
            await status(`Download complete (${formatSize(state.bytesDownloaded)})`, "done");
            return true;
          case "cancelled":
            await status("Download cancelled", "cancelled");
            return false;
          case "http-error":
            await status(`Download failed: HTTP ${outcome.status}`, "failed");
            return false;
        }
      } catch (error) {
        if (!isTransientNetworkError(error)) {
          log.debug("Transfer failed", { error: describeError(error) });
          await status(`Download failed: ${describeError(error)}`, "failed");
          return false;
        }

        // A pause at least as long as the idle timeout lets the timer fire
        const causedByPause =
          error instanceof IdleTimeoutError && longestPauseMs >= error.timeoutMs;
        if (causedByPause) {
          log.debug("Idle timeout during pause, not counted", { pausedMs: longestPauseMs });
        } else {
          failures++;
        }
        if (failures >= this.retry.attempts) {
          await status(
            `Download failed after ${failures} attempts: ${describeError(error)}`,
            "failed"
          );
          return false;
        }

        log.debug("Transient failure", { attempt: failures, error: describeError(error) });
        await status(
          `Connection lost (${describeError(error)}), retrying (${failures + 1}/${this.retry.attempts})...`,
          "retrying"
        );
        if (await control.sleep(this.retry.delayMs, this.delay)) {
          await status("Download cancelled", "cancelled");
          return false;
        }
        state.bytesDownloaded = await localFileSize(destinationPath);
      }
    }
  }

  private async attempt(
    url: string,
    destinationPath: string,
    state: TransferState,
    control: TransferControl,
    emit: Emit,
    onPaused: (ms: number) => void
  ): Promise<AttemptOutcome> {
    const timeoutMs = this.requestTimeoutMs;
    let response: HttpResponse;

    if (state.bytesDownloaded > 0) {
      response = await this.transport.get(url, {
        headers: { Range: `bytes=${state.bytesDownloaded}-` },
        timeoutMs,
      });
      if (response.status !== 206) {
        this.logger.debug("Range not honoured, restarting from zero", {
          url,
          status: response.status,
        });
        response.discard();
        state.bytesDownloaded = 0;
        response = await this.transport.get(url, { timeoutMs });
      }
    } else {
      response = await this.transport.get(url, { timeoutMs });
    }

    if (response.status !== 200 && response.status !== 206) {
      response.discard();
      return { kind: "http-error", status: response.status };
    }

    const offset = state.bytesDownloaded;
    const announced = parseCount(response.headers.get("content-length"));
    if (state.totalBytes === 0) {
      state.totalBytes =
        contentRangeTotal(response.headers.get("content-range")) ??
        (announced !== undefined ? offset + announced : 0);
    }

    const file = await open(destinationPath, offset > 0 ? "a" : "w");
    try {
      for await (const chunk of response.body) {
        for (const piece of slices(chunk, this.chunkSize)) {
          if (control.pauseRequested) {
            const pausedAt = this.clock.now();
            await control.waitWhilePaused();
            onPaused(this.clock.now() - pausedAt);
          }
          if (control.cancelRequested) {
            response.discard();
            return { kind: "cancelled" };
          }

          await file.write(piece);
          state.bytesDownloaded += piece.length;

          if (state.totalBytes > 0 && state.bytesDownloaded >= state.reportedBytes) {
            state.reportedBytes = state.bytesDownloaded;
            await emit({
              type: "progress",
              percent: (state.bytesDownloaded / state.totalBytes) * 100,
              bytesDownloaded: state.bytesDownloaded,
              totalBytes: state.totalBytes,
            });
          }
        }
      }
    } finally {
      await file.close();
    }

    const expected = announced !== undefined ? offset + announced : state.totalBytes;
    if (expected > 0 && state.bytesDownloaded < expected) {
      throw new TransientNetworkError(
        `Connection closed after ${state.bytesDownloaded - offset} of ${expected - offset} bytes`
      );
    }
    return { kind: "done" };
  }
}
