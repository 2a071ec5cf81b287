import { Command } from "commander";
import chalk from "chalk";
import { join } from "path";
import type { Services, ConnectionOptions } from "../lib/services.js";
import { describeRepo, resolveUrl, type RepoCoordinates } from "../lib/url-resolver.js";
import type { FileEntry } from "../lib/directory-lister.js";
import { BatchController, type FileOutcome } from "../lib/batch.js";
import type { TransferObserver } from "../lib/transfer/engine.js";
import {
  clearManifest,
  loadManifest,
  remainingFiles,
  saveManifest,
  type Manifest,
} from "../lib/manifest.js";
import { createSpinner, type Spinner } from "../lib/spinner.js";
import { isJsonMode } from "../lib/cli-context.js";
import { ProgressRenderer } from "../lib/progress.js";
import { maybeOutputJson, type FileResultJson, type GetResultJson } from "../lib/json-output.js";
import {
  batchIncomplete,
  downloadCancelled,
  downloadFailed,
  listingEmpty,
  listingFailed,
  urlUnresolved,
} from "../lib/errors/catalog.js";

export interface GetOptions extends ConnectionOptions {
  output?: string;
}

export type LoadServices = (options: ConnectionOptions) => Services;

export function registerGetCommand(program: Command, load: LoadServices): void {
  program
    .command("get")
    .description("Download a file or a repository folder, resuming what is already on disk")
    .argument("<url>", "File (resolve/blob), folder (tree) or plain http(s) URL")
    .option("-o, --output <dir>", "Directory to save into", ".")
    .option("--mirror <host>", "Mirror host to download from")
    .option("-c, --config <path>", "Config file to use")
    .addHelpText(
      "after",
      `
${chalk.bold.cyan("Examples:")}
  hubget get https://huggingface.co/org/model/resolve/main/config.json
  hubget get https://hf-mirror.com/org/model/tree/main -o ./model
  hubget get https://example.com/data.tar.gz --json

${chalk.bold.cyan("Interrupting:")}
  Ctrl+C stops after the current chunk and keeps partial files.
  Run the same command again, or 'hubget resume <dir>', to continue.
`
    )
    .action((url: string, options: GetOptions) => getUrl(load(options), url, options));
}

export async function getUrl(services: Services, url: string, options: GetOptions): Promise<void> {
  const resolved = resolveUrl(url, services.hosts);
  const saveDirectory = options.output ?? ".";
  services.logger.debug("Resolved URL", { url, kind: resolved.kind });

  switch (resolved.kind) {
    case "unresolved":
      throw urlUnresolved(url);
    case "file":
      return getFile(services, url, resolved.downloadURL, join(saveDirectory, resolved.filename), {
        saveDirectory,
        filename: resolved.filename,
      });
    case "directory":
      return getDirectory(services, url, resolved.repo, saveDirectory);
  }
}

async function getFile(
  services: Services,
  url: string,
  downloadURL: string,
  destination: string,
  target: { saveDirectory: string; filename: string }
): Promise<void> {
  const spinner = createSpinner(`Downloading ${target.filename}`).start();
  const renderer = new ProgressRenderer(target.filename, { spinner, json: isJsonMode() });

  let failure: string | undefined;
  let skipped = false;
  const observer: TransferObserver = {
    onProgress: renderer.onProgress,
    onStatus: (message, kind) => {
      if (kind === "failed" || kind === "path-error") failure = message;
      if (kind === "exists") skipped = true;
      renderer.onStatus(message, kind);
    },
  };

  const handle = services.engine.start(downloadURL, destination, observer);
  services.signals.onInterrupt(() => {
    spinner.log(chalk.yellow("Stopping, press Ctrl+C again to exit now"));
    handle.control.cancel();
  });

  let ok: boolean;
  try {
    ok = await handle.result;
  } finally {
    services.signals.removeAll();
  }

  if (!ok) {
    spinner.stop();
    throw handle.control.cancelRequested
      ? downloadCancelled(target.filename)
      : downloadFailed(target.filename, failure);
  }

  spinner.succeed(`Saved ${destination}`);
  const result: GetResultJson = {
    url,
    kind: "file",
    saveDirectory: target.saveDirectory,
    files: [{ path: target.filename, url: downloadURL, status: skipped ? "skipped" : "downloaded" }],
    summary: { downloaded: skipped ? 0 : 1, skipped: skipped ? 1 : 0, failed: 0, cancelled: false },
  };
  maybeOutputJson(result);
}

async function getDirectory(
  services: Services,
  url: string,
  repo: RepoCoordinates,
  saveDirectory: string
): Promise<void> {
  const label = describeRepo(repo);
  const spinner = createSpinner(`Listing ${label}`).start();

  const listing = await services.listFiles(repo);
  if (!listing.ok) {
    spinner.fail();
    throw listingFailed(label, listing.reason);
  }
  if (listing.files.length === 0) {
    spinner.fail();
    throw listingEmpty(label);
  }

  const previous = await loadManifest(saveDirectory, services.logger);
  if (previous && previous.originalURL !== url) {
    const left = await remainingFiles(previous);
    if (left.length > 0) {
      spinner.log(
        chalk.yellow(
          `Replacing the unfinished download of ${previous.originalURL} in ${saveDirectory} (${left.length} file${left.length === 1 ? "" : "s"} left)`
        )
      );
    }
  }

  const manifest: Manifest = { files: listing.files, saveDirectory, originalURL: url };
  const path = await saveManifest(manifest);
  services.logger.debug("Saved manifest", { path, files: listing.files.length });

  spinner.text = `Downloading ${listing.files.length} files from ${label}`;
  const result = await runManifest(services, manifest, spinner);
  finishBatch(result, spinner);
}

function statusOf(outcome: FileOutcome, cancelled: boolean): FileResultJson["status"] {
  if (outcome.ok) return outcome.skipped ? "skipped" : "downloaded";
  return cancelled && !outcome.skipped ? "cancelled" : "failed";
}

/**
 * Run every file of a manifest under its save directory. Ctrl+C cancels the
 * batch; the manifest is removed once all files are complete.
 */
export async function runManifest(
  services: Services,
  manifest: Manifest,
  spinner: Spinner
): Promise<GetResultJson> {
  const renderer = new ProgressRenderer("", { spinner, json: isJsonMode() });
  const controller = new BatchController();
  const files = new Map<FileEntry, FileResultJson>(
    manifest.files.map((entry) => [
      entry,
      { path: entry.relativePath, url: entry.downloadURL, status: "pending" },
    ])
  );

  services.signals.onInterrupt(() => {
    spinner.log(chalk.yellow("Stopping, press Ctrl+C again to exit now"));
    controller.cancel();
  });

  let ok: boolean;
  try {
    ok = await services.batch.runBatch(
      manifest.files,
      manifest.saveDirectory,
      renderer,
      controller.isCancelled,
      {
        onTransferStart: (entry, control) => {
          renderer.beginFile(entry.relativePath);
          controller.attach(control);
        },
        onFileDone: (entry, outcome) => {
          const file = files.get(entry);
          if (file) file.status = statusOf(outcome, controller.isCancelled());
        },
      }
    );
  } finally {
    services.signals.removeAll();
  }

  if (ok) {
    await clearManifest(manifest.saveDirectory);
  }

  const results = [...files.values()];
  const count = (status: FileResultJson["status"]) =>
    results.filter((file) => file.status === status).length;

  return {
    url: manifest.originalURL,
    kind: "directory",
    saveDirectory: manifest.saveDirectory,
    files: results,
    summary: {
      downloaded: count("downloaded"),
      skipped: count("skipped"),
      failed: count("failed"),
      cancelled: controller.isCancelled(),
    },
  };
}

/**
 * Report the outcome of a batch: the JSON result on success, a CLIError
 * otherwise.
 */
export function finishBatch(result: GetResultJson, spinner: Spinner): void {
  if (result.summary.cancelled) {
    spinner.stop();
    throw downloadCancelled(result.saveDirectory);
  }
  if (result.summary.failed > 0) {
    spinner.stop();
    throw batchIncomplete(result.saveDirectory, result.summary.failed);
  }

  spinner.succeed(`Saved ${result.files.length} files to ${result.saveDirectory}`);
  maybeOutputJson(result);
}
