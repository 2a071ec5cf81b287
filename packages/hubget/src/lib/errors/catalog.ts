import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for the CLIErrors the commands raise.
 */

/** Exit code used when the user interrupts a download */
export const EXIT_CANCELLED = 130;

// ============================================================================
// Input Errors
// ============================================================================

export function urlUnresolved(url: string): CLIError {
  return new CLIError("URL_UNRESOLVED", `Can't make sense of "${url}"`, {
    suggestion: "Pass a file, tree or plain http(s) URL",
    examples: [
      "hubget get https://huggingface.co/org/model/resolve/main/config.json",
      "hubget get https://hf-mirror.com/org/model/tree/main -o ./model",
    ],
  });
}

export function urlNotDirectory(url: string): CLIError {
  return new CLIError("URL_NOT_DIRECTORY", `"${url}" is not a directory URL`, {
    suggestion: "Listing needs a /tree/ URL",
    example: "hubget list https://huggingface.co/org/model/tree/main",
  });
}

// ============================================================================
// Listing Errors
// ============================================================================

export function listingFailed(repo: string, reason: string): CLIError {
  return new CLIError("LISTING_FAILED", `Couldn't list files of ${repo}`, {
    suggestion: "Check the repository, branch and path, or try another mirror with --mirror",
    details: reason,
  });
}

export function listingEmpty(repo: string): CLIError {
  return new CLIError("LISTING_EMPTY", `No files found in ${repo}`, {
    suggestion: "Subdirectories are not traversed; point the URL at the folder that holds the files",
  });
}

// ============================================================================
// Manifest Errors
// ============================================================================

export function manifestNotFound(directory: string): CLIError {
  return new CLIError("MANIFEST_NOT_FOUND", `No interrupted download in ${directory}`, {
    suggestion: "Start a directory download with 'hubget get <tree-url> -o <dir>'",
  });
}

export function manifestComplete(directory: string): CLIError {
  return new CLIError("MANIFEST_COMPLETE", `Everything in ${directory} is already downloaded`, {
    suggestion: "Nothing left to resume",
    exitCode: 0,
  });
}

// ============================================================================
// Transfer Errors
// ============================================================================

export function downloadFailed(target: string, details?: string): CLIError {
  return new CLIError("DOWNLOAD_FAILED", `Download of ${target} failed`, {
    suggestion: "Run the same command again to resume from what is already on disk",
    details,
  });
}

export function downloadCancelled(target: string): CLIError {
  return new CLIError("DOWNLOAD_CANCELLED", `Download of ${target} cancelled`, {
    suggestion: "The partial file was kept; run the same command again to resume",
    exitCode: EXIT_CANCELLED,
  });
}

export function batchIncomplete(directory: string, failed: number): CLIError {
  return new CLIError(
    "BATCH_INCOMPLETE",
    `${failed} file${failed === 1 ? "" : "s"} could not be downloaded`,
    {
      suggestion: "Resume the remaining files later",
      example: `hubget resume ${directory}`,
    }
  );
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOption(optionName: string, reason: string, validValues?: string[]): CLIError {
  return new CLIError("VALIDATION_INVALID_OPTION", `Invalid --${optionName}: ${reason}`, {
    suggestion: validValues?.length
      ? `Choose from: ${validValues.join(", ")}`
      : undefined,
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    example: "hubget config validate",
    details,
  });
}
