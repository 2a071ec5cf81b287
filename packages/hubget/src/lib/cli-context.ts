/**
 * Global CLI context for the flags every command shares.
 */

export interface CLIContext {
  /** Print results as JSON and progress as NDJSON */
  json: boolean;
  /** Suppress spinners and progress lines */
  quiet: boolean;
  /** Skip confirmation prompts (auto-yes) */
  yes: boolean;
  /** Never prompt; fail or take the default instead */
  noInput: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
  yes: false,
  noInput: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthyEnv(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json") || isTruthyEnv(env.HUBGET_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q") || isTruthyEnv(env.HUBGET_QUIET)) {
    currentContext.quiet = true;
  }

  if (argv.includes("--yes") || argv.includes("-y") || isTruthyEnv(env.HUBGET_YES)) {
    currentContext.yes = true;
  }

  if (argv.includes("--no-input") || env.CI) {
    currentContext.noInput = true;
  }

  return currentContext;
}

export function getContext(): CLIContext {
  return currentContext;
}

export function isJsonMode(): boolean {
  return currentContext.json;
}

export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Whether a confirmation prompt may be shown at all.
 */
export function canPrompt(isTTY: boolean = Boolean(process.stdin.isTTY)): boolean {
  return !currentContext.noInput && !currentContext.json && isTTY;
}

export function shouldAutoConfirm(): boolean {
  return currentContext.yes;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
