import { Command } from "commander";
import chalk from "chalk";
import type { ConnectionOptions, Services } from "../lib/services.js";
import { finishBatch, runManifest, type LoadServices } from "./get.js";
import { clearManifest, loadManifest, remainingFiles, type Manifest } from "../lib/manifest.js";
import { canPrompt, isJsonMode, shouldAutoConfirm } from "../lib/cli-context.js";
import { createSpinner } from "../lib/spinner.js";
import { manifestComplete, manifestNotFound } from "../lib/errors/catalog.js";

/** Remaining files listed before the prompt */
const PREVIEW_LIMIT = 10;

export function registerResumeCommand(program: Command, load: LoadServices): void {
  program
    .command("resume")
    .description("Continue an interrupted folder download")
    .argument("[dir]", "Directory holding the interrupted download", ".")
    .option("-c, --config <path>", "Config file to use")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  hubget resume               ${chalk.gray("Resume in the current directory")}
  hubget resume ./model -y    ${chalk.gray("Resume without asking")}
`
    )
    .action((dir: string, options: Pick<ConnectionOptions, "config">) =>
      resumeDirectory(load(options), dir)
    );
}

export interface ResumeOptions {
  /** Whether a confirmation prompt may be shown; detected from the terminal by default */
  interactive?: boolean;
}

export async function resumeDirectory(
  services: Services,
  directory: string,
  options: ResumeOptions = {}
): Promise<void> {
  const stored = await loadManifest(directory, services.logger);
  if (!stored) throw manifestNotFound(directory);

  // The directory may have moved since the manifest was written
  const manifest: Manifest = { ...stored, saveDirectory: directory };
  const remaining = await remainingFiles(manifest);
  if (remaining.length === 0) {
    await clearManifest(directory);
    throw manifestComplete(directory);
  }

  if (!isJsonMode()) {
    console.log(
      chalk.bold(
        `${remaining.length} of ${manifest.files.length} files left from ${manifest.originalURL}`
      )
    );
    for (const entry of remaining.slice(0, PREVIEW_LIMIT)) {
      console.log(`  ${entry.relativePath}`);
    }
    if (remaining.length > PREVIEW_LIMIT) {
      console.log(chalk.gray(`  ...and ${remaining.length - PREVIEW_LIMIT} more`));
    }
  }

  const interactive = options.interactive ?? canPrompt();
  if (interactive && !shouldAutoConfirm()) {
    const proceed = await services.prompts.confirm("Resume the download?", true);
    if (!proceed) {
      console.log(chalk.gray("Nothing downloaded"));
      return;
    }
  }

  const spinner = createSpinner(`Resuming ${manifest.originalURL}`).start();
  const result = await runManifest(services, manifest, spinner);
  finishBatch(result, spinner);
}
