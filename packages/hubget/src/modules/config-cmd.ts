import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
} from "../lib/config.js";
import { describeError } from "../lib/network-errors.js";
import { maybeOutputJson, type ConfigShowJson } from "../lib/json-output.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# hubget configuration
# Place at ~/.config/hubget/config.yaml (user) or /etc/hubget/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags (--mirror)
# 2. HF_ENDPOINT environment variable (mirror host only)
# 3. User config (~/.config/hubget/config.yaml)
# 4. System config (/etc/hubget/config.yaml)
# 5. Built-in defaults

mirror:
  # Host that downloads and folder listings go to
  host: hf-mirror.com

  # Upstream host whose URLs are accepted and rewritten to the mirror
  canonicalHost: huggingface.co

network:
  # Sent with every request
  # userAgent: "hubget/1.0.0"

  # Size probe (HEAD) timeout
  probeTimeoutMs: 10000

  # Folder listing timeout
  listTimeoutMs: 30000

  # Idle timeout while a download is receiving data
  requestTimeoutMs: 60000

retry:
  # Attempts per file, including the first (1-10)
  attempts: 3

  # Fixed delay between attempts
  delayMs: 2000

logging:
  # Log level: debug, info, warn, error
  level: warn

  # Output JSON log lines on stderr
  json: false
`;

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage hubget configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/hubget/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${describeError(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config
        ? [options.config]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          console.error(chalk.red(`  ✗ ${describeError(error)}`));
          hasErrors = true;
        }
      }

      if (!foundAny && !options.config) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'hubget config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      let loaded: ReturnType<typeof loadConfig>;
      try {
        loaded = loadConfig(options.config);
      } catch (error) {
        console.error(chalk.red(`Failed to load config: ${describeError(error)}`));
        process.exitCode = 1;
        return;
      }

      const { config: resolved, sources } = loaded;
      const result: ConfigShowJson = { effective: { ...resolved }, sources };
      if (maybeOutputJson(result)) return;

      console.log(chalk.cyan("Effective Configuration:"));
      console.log(chalk.gray("─".repeat(40)));

      if (sources.length > 0) {
        console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
      } else {
        console.log(chalk.gray("Sources: (defaults only)"));
      }

      console.log();
      console.log(chalk.bold("Mirror:"));
      console.log(`  host:             ${resolved.mirrorHost}`);
      console.log(`  canonicalHost:    ${resolved.canonicalHost}`);

      console.log();
      console.log(chalk.bold("Network:"));
      console.log(`  userAgent:        ${resolved.userAgent}`);
      console.log(`  probeTimeoutMs:   ${resolved.probeTimeoutMs}`);
      console.log(`  listTimeoutMs:    ${resolved.listTimeoutMs}`);
      console.log(`  requestTimeoutMs: ${resolved.requestTimeoutMs}`);

      console.log();
      console.log(chalk.bold("Retry:"));
      console.log(`  attempts:         ${resolved.retryAttempts}`);
      console.log(`  delayMs:          ${resolved.retryDelayMs}`);

      console.log();
      console.log(chalk.bold("Logging:"));
      console.log(`  level:            ${resolved.logLevel}`);
      console.log(`  json:             ${resolved.logJson}`);
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
