import { ConfigFileError, hostFromEndpoint, loadConfig, type ResolvedConfig } from "./config.js";
import { invalidConfig, invalidOption } from "./errors/catalog.js";
import { createLogger, type Logger } from "./logger.js";
import type { HostConfig } from "./url-resolver.js";
import type { HttpTransport } from "./ports/http.js";
import type { PromptService } from "./ports/prompt.js";
import type { SignalHandler } from "./ports/signal-handler.js";
import type { DelayFn } from "./ports/timer.js";
import {
  createNodeFetchTransport,
  createProcessSignalHandler,
  interactivePrompts,
} from "./adapters/index.js";
import { createProbe, type ProbeSize } from "./probe.js";
import { createDirectoryLister, type ListFiles } from "./directory-lister.js";
import { TransferEngine } from "./transfer/engine.js";
import { BatchRunner } from "./batch.js";

/**
 * Everything a command needs, wired from one resolved config.
 */
export interface Services {
  config: ResolvedConfig;
  logger: Logger;
  hosts: HostConfig;
  probe: ProbeSize;
  listFiles: ListFiles;
  engine: TransferEngine;
  batch: BatchRunner;
  prompts: PromptService;
  signals: SignalHandler;
}

export interface ServiceOverrides {
  transport?: HttpTransport;
  logger?: Logger;
  prompts?: PromptService;
  signals?: SignalHandler;
  delay?: DelayFn;
}

export function createServices(config: ResolvedConfig, overrides: ServiceOverrides = {}): Services {
  const logger =
    overrides.logger ?? createLogger({ level: config.logLevel, json: config.logJson });
  const transport =
    overrides.transport ??
    createNodeFetchTransport({ userAgent: config.userAgent, logger: logger.child("http") });

  const probe = createProbe({
    transport,
    timeoutMs: config.probeTimeoutMs,
    logger: logger.child("probe"),
  });
  const engine = new TransferEngine({
    transport,
    probe,
    requestTimeoutMs: config.requestTimeoutMs,
    retry: { attempts: config.retryAttempts, delayMs: config.retryDelayMs },
    delay: overrides.delay,
    logger: logger.child("engine"),
  });

  return {
    config,
    logger,
    hosts: { mirrorHost: config.mirrorHost, canonicalHost: config.canonicalHost },
    probe,
    listFiles: createDirectoryLister({
      transport,
      mirrorHost: config.mirrorHost,
      timeoutMs: config.listTimeoutMs,
      logger: logger.child("lister"),
    }),
    engine,
    batch: new BatchRunner({ engine, logger }),
    prompts: overrides.prompts ?? interactivePrompts,
    signals: overrides.signals ?? createProcessSignalHandler(),
  };
}

/** Options every networked command accepts */
export interface ConnectionOptions {
  config?: string;
  mirror?: string;
}

/**
 * Load the config for a command invocation and build its services.
 * Config file problems become CLIErrors.
 */
export function loadServices(
  options: ConnectionOptions,
  overrides: ServiceOverrides = {}
): Services {
  let mirrorHost: string | undefined;
  if (options.mirror !== undefined) {
    mirrorHost = hostFromEndpoint(options.mirror);
    if (!mirrorHost) {
      throw invalidOption("mirror", `"${options.mirror}" is not a host name such as hf-mirror.com`);
    }
  }

  try {
    const { config } = loadConfig(options.config, { mirrorHost });
    return createServices(config, overrides);
  } catch (error) {
    if (error instanceof ConfigFileError) {
      throw invalidConfig(error.path, error.issues);
    }
    throw error;
  }
}
