/**
 * Error codes for every failure the CLI reports to the user.
 */
export type ErrorCode =
  // Input errors
  | "URL_UNRESOLVED"
  | "URL_NOT_DIRECTORY"
  // Listing errors
  | "LISTING_FAILED"
  | "LISTING_EMPTY"
  // Manifest errors
  | "MANIFEST_NOT_FOUND"
  | "MANIFEST_COMPLETE"
  // Transfer errors
  | "DOWNLOAD_FAILED"
  | "DOWNLOAD_CANCELLED"
  | "BATCH_INCOMPLETE"
  // Validation errors
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_CONFIG_INVALID"
  // Generic
  | "UNKNOWN_ERROR";

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  examples?: string[];
  details?: string;
  /** Process exit code, 1 unless stated */
  exitCode?: number;
  cause?: Error;
}

/**
 * Error carrying the context the renderer shows: what failed, what to do next.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly details?: string;
  readonly exitCode: number;

  constructor(code: ErrorCode, message: string, options: CLIErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options.suggestion;
    this.example = options.example;
    this.examples = options.examples;
    this.details = options.details;
    this.exitCode = options.exitCode ?? 1;
  }
}

export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
