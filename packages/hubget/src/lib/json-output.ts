/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";
import type { BatchStatusKind } from "./batch.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface FileResultJson {
  path: string;
  url: string;
  status: "downloaded" | "skipped" | "failed" | "cancelled" | "pending";
}

export interface GetResultJson {
  url: string;
  kind: "file" | "directory";
  saveDirectory: string;
  files: FileResultJson[];
  summary: {
    downloaded: number;
    skipped: number;
    failed: number;
    cancelled: boolean;
  };
}

export interface ListResultJson {
  url: string;
  repo: string;
  files: Array<{
    path: string;
    size: number;
    url: string;
  }>;
  totalBytes: number;
}

export interface DoctorResultJson {
  checks: Array<{
    name: string;
    status: "pass" | "fail" | "warn";
    message: string;
    details?: string;
  }>;
  system: {
    os: string;
    nodeVersion: string;
    cliVersion: string;
  };
  network: {
    mirrorHost: string;
    reachable: boolean;
    latencyMs?: number;
  };
}

export interface ConfigShowJson {
  effective: Record<string, unknown>;
  sources: string[];
}

/**
 * One line of the NDJSON stream written while files transfer.
 */
export type TransferEventJson =
  | {
      type: "progress";
      timestamp: string;
      file: string;
      bytesDownloaded: number;
      totalBytes: number;
      percent: number;
    }
  | {
      type: "status";
      timestamp: string;
      file?: string;
      kind: BatchStatusKind;
      message: string;
    };

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Output an NDJSON event (one line per progress or status update).
 */
export function outputNdjson(event: TransferEventJson): void {
  console.log(JSON.stringify(event));
}

/**
 * Conditionally output JSON or return false for human output.
 * Use this to check if JSON mode is enabled before outputting.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
