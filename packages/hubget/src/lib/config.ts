import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import type { LogLevel } from "./logger.js";
import { DEFAULT_USER_AGENT } from "./version.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/hubget/config.yaml";

/** User-level configuration path (XDG base directory) */
export const USER_CONFIG_PATH = join(homedir(), ".config", "hubget", "config.yaml");

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  mirrorHost: "hf-mirror.com",
  canonicalHost: "huggingface.co",
  userAgent: DEFAULT_USER_AGENT,
  probeTimeoutMs: 10_000,
  listTimeoutMs: 30_000,
  requestTimeoutMs: 60_000,
  retryAttempts: 3,
  retryDelayMs: 2000,
  logLevel: "warn",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

/** Bare host name with optional port, no scheme or path */
const HostSchema = z
  .string()
  .regex(/^[A-Za-z0-9.-]+(:\d+)?$/, "Expected a host name such as hf-mirror.com");

const TimeoutSchema = z.number().int().min(1000).max(600_000);

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    mirror: z
      .object({
        host: HostSchema.optional(),
        canonicalHost: HostSchema.optional(),
      })
      .strict()
      .optional(),
    network: z
      .object({
        userAgent: z.string().min(1).optional(),
        probeTimeoutMs: TimeoutSchema.optional(),
        listTimeoutMs: TimeoutSchema.optional(),
        requestTimeoutMs: TimeoutSchema.optional(),
      })
      .strict()
      .optional(),
    retry: z
      .object({
        attempts: z.number().int().min(1).max(10).optional(),
        delayMs: z.number().int().min(0).max(60_000).optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        level: z.enum(["debug", "info", "warn", "error"]).optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  mirrorHost: string;
  canonicalHost: string;
  userAgent: string;
  probeTimeoutMs: number;
  listTimeoutMs: number;
  requestTimeoutMs: number;
  retryAttempts: number;
  retryDelayMs: number;
  logLevel: LogLevel;
  logJson: boolean;
}

/** A config file that exists but cannot be used */
export class ConfigFileError extends Error {
  constructor(
    readonly path: string,
    readonly issues: string[]
  ) {
    super(`Invalid config file ${path}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`);
    this.name = "ConfigFileError";
  }
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 * Throws ConfigFileError if the file exists but is invalid.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw new ConfigFileError(path, [`cannot read file: ${messageOf(err)}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw new ConfigFileError(path, [`invalid YAML: ${messageOf(err)}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigFileError(
      path,
      result.error.issues.map((i) =>
        i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
      )
    );
  }

  return result.data;
}

/**
 * Host of an HF_ENDPOINT value such as "https://hf-mirror.com".
 * Bare host names are accepted too.
 */
export function hostFromEndpoint(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  if (!trimmed) return undefined;
  try {
    return new URL(trimmed).host || undefined;
  } catch {
    return HostSchema.safeParse(trimmed).success ? trimmed : undefined;
  }
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  if (source.mirror?.host !== undefined) {
    target.mirrorHost = source.mirror.host;
  }
  if (source.mirror?.canonicalHost !== undefined) {
    target.canonicalHost = source.mirror.canonicalHost;
  }
  if (source.network?.userAgent !== undefined) {
    target.userAgent = source.network.userAgent;
  }
  if (source.network?.probeTimeoutMs !== undefined) {
    target.probeTimeoutMs = source.network.probeTimeoutMs;
  }
  if (source.network?.listTimeoutMs !== undefined) {
    target.listTimeoutMs = source.network.listTimeoutMs;
  }
  if (source.network?.requestTimeoutMs !== undefined) {
    target.requestTimeoutMs = source.network.requestTimeoutMs;
  }
  if (source.retry?.attempts !== undefined) {
    target.retryAttempts = source.retry.attempts;
  }
  if (source.retry?.delayMs !== undefined) {
    target.retryDelayMs = source.retry.delayMs;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > HF_ENDPOINT > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined,
  env: NodeJS.ProcessEnv = {}
): ResolvedConfig {
  // Start with defaults
  const config: ResolvedConfig = { ...CONFIG_DEFAULTS };

  // Apply system config (lowest precedence after defaults)
  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  // Apply user config (higher precedence)
  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  const endpointHost = hostFromEndpoint(env.HF_ENDPOINT);
  if (endpointHost) {
    config.mirrorHost = endpointHost;
  }

  // Apply CLI options (highest precedence)
  for (const [key, value] of Object.entries(cliOptions)) {
    if (value !== undefined) Object.assign(config, { [key]: value });
  }

  return config;
}

/**
 * Load configuration from all sources.
 * Optionally accepts explicit config path from CLI.
 *
 * @param explicitPath - Optional path to a specific config file
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    // Explicit path takes precedence, used as "user config"
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    // Normal precedence: system, then user
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  if (hostFromEndpoint(env.HF_ENDPOINT)) sources.push("HF_ENDPOINT");

  const config = resolveConfig(cliOptions, userConfig, systemConfig, env);

  return { config, sources };
}
