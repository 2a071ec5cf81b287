import chalk from "chalk";
import type { Clock } from "./ports/clock.js";
import { systemClock } from "./adapters/system-clock.js";
import type { Spinner } from "./spinner.js";
import type { BatchObserver, BatchStatusKind } from "./batch.js";
import type { FileEntry } from "./directory-lister.js";
import { formatSize } from "./format.js";
import { outputNdjson } from "./json-output.js";

/** Minimum time between two redraws of the progress line */
export const PROGRESS_INTERVAL_MS = 100;

export interface ProgressRendererOptions {
  spinner: Spinner;
  /** Write NDJSON events to stdout instead of drawing */
  json?: boolean;
  clock?: Clock;
  intervalMs?: number;
}

/**
 * `<file> <done>/<total> (<pct>%) <speed>/s`
 */
export function formatProgressLine(
  file: string,
  percent: number,
  bytesDownloaded: number,
  totalBytes: number,
  bytesPerSecond: number
): string {
  return `${file} ${formatSize(bytesDownloaded)}/${formatSize(totalBytes)} (${percent.toFixed(1)}%) ${formatSize(bytesPerSecond)}/s`;
}

function colorize(message: string, kind: BatchStatusKind): string {
  switch (kind) {
    case "done":
    case "exists":
      return chalk.green(message);
    case "failed":
    case "path-error":
      return chalk.red(message);
    case "retrying":
    case "cancelled":
      return chalk.yellow(message);
    case "summary":
      return chalk.bold(message);
    default:
      return message;
  }
}

/**
 * Observer that draws transfer progress on a spinner, or streams it as
 * NDJSON in --json mode. Progress is throttled; status lines never are.
 */
export class ProgressRenderer implements BatchObserver {
  private readonly spinner: Spinner;
  private readonly json: boolean;
  private readonly clock: Clock;
  private readonly intervalMs: number;
  private file: string;
  private lastDraw = Number.NEGATIVE_INFINITY;
  private rateStart: { at: number; bytes: number } | undefined;

  constructor(file: string, options: ProgressRendererOptions) {
    this.file = file;
    this.spinner = options.spinner;
    this.json = options.json ?? false;
    this.clock = options.clock ?? systemClock;
    this.intervalMs = options.intervalMs ?? PROGRESS_INTERVAL_MS;
  }

  get currentFile(): string {
    return this.file;
  }

  /** Switch to a new file and restart the speed measurement */
  beginFile(file: string): void {
    this.file = file;
    this.lastDraw = Number.NEGATIVE_INFINITY;
    this.rateStart = undefined;
  }

  readonly onProgress = (
    percent: number,
    bytesDownloaded: number,
    totalBytes: number,
    entry?: FileEntry
  ): void => {
    if (entry && entry.relativePath !== this.file) {
      this.beginFile(entry.relativePath);
    }

    const now = this.clock.now();
    const start = this.rateStart ?? { at: now, bytes: bytesDownloaded };
    this.rateStart = start;

    const finished = bytesDownloaded >= totalBytes;
    if (!finished && now - this.lastDraw < this.intervalMs) return;
    this.lastDraw = now;

    const elapsedSeconds = (now - start.at) / 1000;
    const speed = elapsedSeconds > 0 ? (bytesDownloaded - start.bytes) / elapsedSeconds : 0;

    if (this.json) {
      outputNdjson({
        type: "progress",
        timestamp: new Date(now).toISOString(),
        file: this.file,
        bytesDownloaded,
        totalBytes,
        percent: Math.round(percent * 10) / 10,
      });
      return;
    }

    this.spinner.text = formatProgressLine(this.file, percent, bytesDownloaded, totalBytes, speed);
  };

  readonly onStatus = (message: string, kind: BatchStatusKind): void => {
    if (this.json) {
      const perFile = kind !== "file" && kind !== "summary";
      outputNdjson({
        type: "status",
        timestamp: new Date(this.clock.now()).toISOString(),
        ...(perFile && { file: this.file }),
        kind,
        message,
      });
      return;
    }

    this.spinner.log(colorize(message, kind));
  };
}
