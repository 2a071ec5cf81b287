/**
 * Doctor command - diagnostics and health check.
 * Verifies the Node.js runtime, the configuration and the mirror connection.
 */

import { Command } from "commander";
import chalk from "chalk";
import os from "os";
import { loadConfig, resolveConfig, type ResolvedConfig } from "../lib/config.js";
import { VERSION } from "../lib/version.js";
import type { HttpTransport } from "../lib/ports/http.js";
import type { Clock } from "../lib/ports/clock.js";
import { createNodeFetchTransport, systemClock } from "../lib/adapters/index.js";
import { describeError } from "../lib/network-errors.js";
import { createSpinner } from "../lib/spinner.js";
import { isJsonMode } from "../lib/cli-context.js";
import { outputSuccess, type DoctorResultJson } from "../lib/json-output.js";

/** Oldest Node.js major the CLI runs on */
const MIN_NODE_MAJOR = 20;

/** Round trips above this are reported as a warning */
const SLOW_LATENCY_MS = 3000;

interface CheckResult {
  name: string;
  status: "pass" | "fail" | "warn";
  message: string;
  details?: string;
}

export interface DoctorOptions {
  verbose?: boolean;
  config?: string;
}

export interface DoctorDeps {
  load?: (configPath?: string) => { config: ResolvedConfig; sources: string[] };
  /** Built from the loaded config when absent */
  transport?: HttpTransport;
  clock?: Clock;
  env?: NodeJS.ProcessEnv;
  nodeVersion?: string;
}

export function registerDoctorCommand(program: Command): void {
  program
    .command("doctor")
    .description("Check the runtime, the configuration and the mirror connection")
    .option("--verbose", "Show detailed diagnostic information")
    .option("-c, --config <path>", "Config file to check")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("What it checks:")}
  ${chalk.yellow("•")} Node.js version compatibility
  ${chalk.yellow("•")} Configuration file validity
  ${chalk.yellow("•")} Network connectivity to the mirror host

${chalk.bold.cyan("Examples:")}
  hubget doctor              ${chalk.gray("Run all diagnostic checks")}
  hubget doctor --verbose    ${chalk.gray("Show detailed information")}
  hubget doctor --json       ${chalk.gray("Output as JSON for scripting")}
`
    )
    .action(async (options: DoctorOptions) => {
      await runDoctor(options);
    });
}

export async function runDoctor(options: DoctorOptions, deps: DoctorDeps = {}): Promise<void> {
  const spinner = createSpinner("Running diagnostics...").start();
  const checks: CheckResult[] = [];
  const env = deps.env ?? process.env;
  const clock = deps.clock ?? systemClock;

  // System checks
  const nodeVersion = deps.nodeVersion ?? process.version;
  const nodeVersionNum = parseInt(nodeVersion.slice(1).split(".")[0], 10);

  if (nodeVersionNum >= MIN_NODE_MAJOR) {
    checks.push({
      name: "Node.js version",
      status: "pass",
      message: `Node.js ${nodeVersion}`,
    });
  } else {
    checks.push({
      name: "Node.js version",
      status: "fail",
      message: `Node.js ${nodeVersion} (requires >= ${MIN_NODE_MAJOR})`,
      details: `Upgrade Node.js to version ${MIN_NODE_MAJOR} or higher`,
    });
  }

  // Config check
  let config: ResolvedConfig;
  try {
    const loaded = (deps.load ?? loadConfig)(options.config);
    config = loaded.config;
    checks.push({
      name: "Configuration",
      status: "pass",
      message: loaded.sources.length > 0 ? `Loaded ${loaded.sources.join(", ")}` : "Defaults only",
    });
  } catch (error) {
    config = resolveConfig({}, undefined, undefined, env);
    checks.push({
      name: "Configuration",
      status: "fail",
      message: "Config file is invalid, using defaults",
      details: describeError(error),
    });
  }

  if (env.HF_ENDPOINT) {
    checks.push({
      name: "Environment",
      status: "pass",
      message: `HF_ENDPOINT is set (${env.HF_ENDPOINT})`,
    });
  }

  // Network check
  const baseUrl = `https://${config.mirrorHost}/`;
  const transport = deps.transport ?? createNodeFetchTransport({ userAgent: config.userAgent });
  let networkReachable = false;
  let networkLatency: number | undefined;

  spinner.text = `Contacting ${config.mirrorHost}...`;
  try {
    const startTime = clock.now();
    const response = await transport.head(baseUrl, { timeoutMs: config.probeTimeoutMs });
    response.discard();
    networkLatency = clock.now() - startTime;
    networkReachable = response.status < 500;

    if (networkReachable && networkLatency > SLOW_LATENCY_MS) {
      checks.push({
        name: "Network connectivity",
        status: "warn",
        message: `Connected to ${config.mirrorHost}, slowly (${networkLatency}ms)`,
        details: "Downloads may time out; consider another mirror or a larger network.requestTimeoutMs",
      });
    } else if (networkReachable) {
      checks.push({
        name: "Network connectivity",
        status: "pass",
        message: `Connected to ${config.mirrorHost} (${networkLatency}ms)`,
      });
    } else {
      checks.push({
        name: "Network connectivity",
        status: "fail",
        message: `Server returned ${response.status}`,
        details: "The mirror may be temporarily unavailable; try another with --mirror",
      });
    }
  } catch (error) {
    checks.push({
      name: "Network connectivity",
      status: "fail",
      message: `Cannot connect to ${config.mirrorHost}`,
      details: describeError(error),
    });
  }

  spinner.stop();

  const failCount = checks.filter((c) => c.status === "fail").length;
  if (failCount > 0) {
    process.exitCode = 1;
  }

  // Output results
  const result: DoctorResultJson = {
    checks: checks.map((c) => ({
      name: c.name,
      status: c.status,
      message: c.message,
      ...(c.details && { details: c.details }),
    })),
    system: {
      os: `${os.platform()} ${os.release()}`,
      nodeVersion,
      cliVersion: VERSION,
    },
    network: {
      mirrorHost: config.mirrorHost,
      reachable: networkReachable,
      ...(networkLatency !== undefined && { latencyMs: networkLatency }),
    },
  };

  if (isJsonMode()) {
    outputSuccess(result);
    return;
  }

  // Human-readable output
  console.log("");
  console.log(chalk.bold.cyan("Diagnostics Report"));
  console.log(chalk.dim("─".repeat(50)));

  for (const check of checks) {
    const icon = check.status === "pass" ? chalk.green("✓") :
                 check.status === "warn" ? chalk.yellow("⚠") :
                 chalk.red("✗");
    console.log(`${icon} ${chalk.bold(check.name)}: ${check.message}`);
    if (options.verbose && check.details) {
      console.log(chalk.dim(`    ${check.details}`));
    }
  }

  console.log("");
  console.log(chalk.dim("─".repeat(50)));
  console.log(chalk.bold("System Information:"));
  console.log(`  OS: ${os.platform()} ${os.release()}`);
  console.log(`  Node.js: ${nodeVersion}`);
  console.log(`  CLI: v${VERSION}`);
  console.log(`  Mirror: ${config.mirrorHost}`);

  // Summary
  const passCount = checks.filter((c) => c.status === "pass").length;
  const warnCount = checks.filter((c) => c.status === "warn").length;

  console.log("");
  if (failCount > 0) {
    console.log(chalk.red(`✗ ${failCount} check(s) failed`));
  } else if (warnCount > 0) {
    console.log(chalk.yellow(`⚠ ${passCount} passed, ${warnCount} warning(s)`));
  } else {
    console.log(chalk.green(`✓ All ${passCount} checks passed`));
  }

  // Show details for failures/warnings if not verbose
  if (!options.verbose && (failCount > 0 || warnCount > 0)) {
    console.log(chalk.dim("\nRun with --verbose for more details"));
  }
}
