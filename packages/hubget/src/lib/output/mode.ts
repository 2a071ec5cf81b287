/**
 * Output mode detection for deciding how results and errors are rendered.
 */

export type OutputMode = "interactive" | "static" | "json";

/**
 * Detect the output mode from flags and environment.
 *
 * - `interactive`: TTY with spinners and colour
 * - `static`: plain lines (CI, pipes, dumb terminals)
 * - `json`: machine-readable output on stdout
 */
export function getOutputMode(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
  isTTY: boolean = Boolean(process.stdout.isTTY)
): OutputMode {
  if (argv.includes("--json") || env.HUBGET_JSON === "1" || env.HUBGET_JSON === "true") {
    return "json";
  }

  if (argv.includes("--no-input") || env.CI || !isTTY || env.TERM === "dumb") {
    return "static";
  }

  return "interactive";
}
