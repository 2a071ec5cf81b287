import { isAbsolute, join, relative, resolve, sep } from "path";
import type { FileEntry } from "./directory-lister.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { formatSize } from "./format.js";
import { describeError } from "./network-errors.js";
import { localFileSize, type StatusKind, type TransferEngine } from "./transfer/engine.js";
import type { TransferControl } from "./transfer/control.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Local state of one batch entry before its transfer */
export type FileClassification = "complete" | "partial" | "absent";

/** Engine statuses plus the batch's own per-file and summary lines */
export type BatchStatusKind = StatusKind | "file" | "summary";

export interface BatchObserver {
  onProgress?(
    percent: number,
    bytesDownloaded: number,
    totalBytes: number,
    entry: FileEntry
  ): void | Promise<void>;
  onStatus?(message: string, kind: BatchStatusKind): void | Promise<void>;
}

export interface FileOutcome {
  classification: FileClassification;
  /** false when the file failed or was cancelled */
  ok: boolean;
  skipped: boolean;
}

export interface BatchOptions {
  /** Receives the control of each transfer as it begins */
  onTransferStart?(entry: FileEntry, control: TransferControl): void;
  onFileDone?(entry: FileEntry, outcome: FileOutcome): void;
}

export interface BatchSummary {
  downloaded: number;
  skipped: number;
  failed: number;
  cancelled: boolean;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function classifyFile(localSize: number, declaredSize: number): FileClassification {
  if (declaredSize > 0 && localSize === declaredSize) return "complete";
  if (localSize > 0) return "partial";
  return "absent";
}

/**
 * Destination of an entry under the save directory, or undefined when its
 * relative path would leave that directory.
 */
export function destinationFor(saveDirectory: string, relativePath: string): string | undefined {
  const root = resolve(saveDirectory);
  const rel = relative(root, resolve(root, relativePath));
  if (rel === "" || rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return undefined;
  }
  return join(saveDirectory, relativePath);
}

function describeClassification(
  classification: FileClassification,
  localSize: number,
  declaredSize: number
): string {
  const of = declaredSize > 0 ? ` of ${formatSize(declaredSize)}` : "";
  switch (classification) {
    case "complete":
      return `already complete (${formatSize(localSize)}), skipping`;
    case "partial":
      return `resuming from ${formatSize(localSize)}${of}`;
    case "absent":
      return declaredSize > 0 ? `downloading (${formatSize(declaredSize)})` : "downloading";
  }
}

export function formatSummary(summary: BatchSummary): string {
  const counts = `${summary.downloaded} downloaded, ${summary.skipped} skipped, ${summary.failed} failed`;
  return summary.cancelled ? `Batch cancelled (${counts})` : `Batch finished: ${counts}`;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export interface BatchRunnerOptions {
  engine: TransferEngine;
  logger?: Logger;
}

/**
 * Runs a list of files through the transfer engine one at a time.
 */
export class BatchRunner {
  private readonly engine: TransferEngine;
  private readonly logger: Logger;

  constructor(options: BatchRunnerOptions) {
    this.engine = options.engine;
    this.logger = (options.logger ?? createNoopLogger()).child("batch");
  }

  /**
   * Download `files` under `saveDirectory` in listing order. Complete files
   * are skipped and partial ones resumed. Resolves true when no file failed
   * and the batch was not cancelled.
   */
  async runBatch(
    files: readonly FileEntry[],
    saveDirectory: string,
    observer: BatchObserver = {},
    isCancelled: () => boolean = () => false,
    options: BatchOptions = {}
  ): Promise<boolean> {
    const summary: BatchSummary = { downloaded: 0, skipped: 0, failed: 0, cancelled: false };
    const total = files.length;

    for (const [index, entry] of files.entries()) {
      if (isCancelled()) {
        summary.cancelled = true;
        break;
      }

      const label = `[${index + 1}/${total}] ${entry.relativePath}`;
      const destination = destinationFor(saveDirectory, entry.relativePath);
      if (!destination) {
        await observer.onStatus?.(`${label}: path escapes the save directory, skipped`, "file");
        summary.failed++;
        options.onFileDone?.(entry, { classification: "absent", ok: false, skipped: true });
        continue;
      }

      let localSize: number;
      try {
        localSize = await localFileSize(destination);
      } catch (error) {
        await observer.onStatus?.(
          `${label}: cannot read the local file: ${describeError(error)}`,
          "path-error"
        );
        summary.failed++;
        options.onFileDone?.(entry, { classification: "absent", ok: false, skipped: false });
        continue;
      }
      const classification = classifyFile(localSize, entry.declaredSize);
      this.logger.debug("Classified file", {
        path: entry.relativePath,
        classification,
        local: localSize,
        declared: entry.declaredSize,
      });
      await observer.onStatus?.(
        `${label}: ${describeClassification(classification, localSize, entry.declaredSize)}`,
        "file"
      );

      if (classification === "complete") {
        summary.skipped++;
        options.onFileDone?.(entry, { classification, ok: true, skipped: true });
        continue;
      }

      const handle = this.engine.start(entry.downloadURL, destination, {
        onProgress: (percent, bytes, totalBytes) =>
          observer.onProgress?.(percent, bytes, totalBytes, entry),
        onStatus: (message, kind) => observer.onStatus?.(message, kind),
      });
      options.onTransferStart?.(entry, handle.control);
      const ok = await handle.result;
      options.onFileDone?.(entry, { classification, ok, skipped: false });

      if (ok) {
        summary.downloaded++;
      } else if (handle.control.cancelRequested || isCancelled()) {
        summary.cancelled = true;
        break;
      } else {
        summary.failed++;
      }
    }

    await observer.onStatus?.(formatSummary(summary), "summary");
    return summary.failed === 0 && !summary.cancelled;
  }
}

/**
 * Pause, resume and cancel handle for a running batch. Cancelling stops the
 * active transfer and every file after it.
 */
export class BatchController {
  private cancelled = false;
  private paused = false;
  private active: TransferControl | undefined;

  readonly isCancelled = (): boolean => this.cancelled;

  get isPaused(): boolean {
    return this.paused;
  }

  /** Follow a transfer that just started; call from `onTransferStart` */
  attach(control: TransferControl): void {
    this.active = control;
    if (this.cancelled) control.cancel();
    else if (this.paused) control.pause();
  }

  pause(): void {
    this.paused = true;
    this.active?.pause();
  }

  resume(): void {
    this.paused = false;
    this.active?.resume();
  }

  cancel(): void {
    this.cancelled = true;
    this.active?.cancel();
  }
}
