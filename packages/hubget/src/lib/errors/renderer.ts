import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

/**
 * Build the human-readable lines for an error.
 */
export function formatStaticError(error: CLIError, width = 80): string[] {
  const termWidth = Math.min(width, 80);
  const output: string[] = [""];

  const [first, ...rest] = wrapText(error.message, termWidth - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(first)}`);
  for (const line of rest) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error.details) {
    output.push("");
    for (const detail of error.details.split("\n")) {
      for (const line of wrapText(detail, termWidth - 4, "  ")) {
        output.push(`  ${chalk.dim(line)}`);
      }
    }
  }

  const examples = error.examples?.length
    ? error.examples
    : error.example
      ? [error.example]
      : [];

  if (error.suggestion) {
    output.push("");
    const [head, ...tail] = wrapText(error.suggestion, termWidth - 4, "  ");
    output.push(`  ${chalk.yellow(SYM.arrow)} ${head}`);
    for (const line of tail) {
      output.push(`    ${line}`);
    }
  }

  if (examples.length === 1) {
    output.push("");
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
  } else if (examples.length > 1) {
    output.push("");
    output.push(`  ${chalk.dim("Examples:")}`);
    for (const ex of examples.slice(0, 3)) {
      output.push(`    ${chalk.cyan(`${SYM.prompt} ${ex}`)}`);
    }
  }

  output.push("");
  return output;
}

/**
 * The JSON document printed for an error in --json mode.
 */
export function toErrorJson(error: CLIError): Record<string, unknown> {
  const output = {
    success: false,
    error: {
      code: error.code,
      message: error.message,
      suggestion: error.suggestion,
      examples: error.examples ?? (error.example ? [error.example] : undefined),
      details: error.details,
    },
  };

  return {
    ...output,
    error: Object.fromEntries(
      Object.entries(output.error).filter(([, v]) => v !== undefined)
    ),
  };
}

/**
 * Render an error to stderr based on the current output mode.
 */
export function renderError(error: CLIError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  if (outputMode === "json") {
    console.error(JSON.stringify(toErrorJson(error), null, 2));
    return;
  }

  for (const line of formatStaticError(error, process.stderr.columns || 80)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError, render it and set the exit code.
 */
export function reportError(error: unknown, mode?: OutputMode): void {
  const cliError = isCLIError(error)
    ? error
    : new CLIError("UNKNOWN_ERROR", error instanceof Error ? error.message : String(error), {
        cause: error instanceof Error ? error : undefined,
      });
  renderError(cliError, mode);
  process.exitCode = cliError.exitCode;
}

export { CLIError, isCLIError };
