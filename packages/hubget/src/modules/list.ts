import { Command } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import type { ConnectionOptions, Services } from "../lib/services.js";
import type { LoadServices } from "./get.js";
import { describeRepo, resolveUrl } from "../lib/url-resolver.js";
import { formatSize } from "../lib/format.js";
import { createSpinner } from "../lib/spinner.js";
import { maybeOutputJson, type ListResultJson } from "../lib/json-output.js";
import {
  listingFailed,
  urlNotDirectory,
  urlUnresolved,
} from "../lib/errors/catalog.js";

export function registerListCommand(program: Command, load: LoadServices): void {
  program
    .command("list")
    .description("Show the files of a repository folder without downloading")
    .argument("<url>", "Folder (tree) URL")
    .option("--mirror <host>", "Mirror host to list from")
    .option("-c, --config <path>", "Config file to use")
    .action((url: string, options: ConnectionOptions) => listUrl(load(options), url));
}

export async function listUrl(services: Services, url: string): Promise<void> {
  const resolved = resolveUrl(url, services.hosts);
  if (resolved.kind === "unresolved") throw urlUnresolved(url);
  if (resolved.kind !== "directory") throw urlNotDirectory(url);

  const label = describeRepo(resolved.repo);
  const spinner = createSpinner(`Listing ${label}`).start();
  const listing = await services.listFiles(resolved.repo);
  if (!listing.ok) {
    spinner.fail();
    throw listingFailed(label, listing.reason);
  }
  spinner.stop();

  const totalBytes = listing.files.reduce((sum, file) => sum + file.declaredSize, 0);
  const result: ListResultJson = {
    url,
    repo: label,
    files: listing.files.map((file) => ({
      path: file.relativePath,
      size: file.declaredSize,
      url: file.downloadURL,
    })),
    totalBytes,
  };
  if (maybeOutputJson(result)) return;

  if (listing.files.length === 0) {
    console.log(chalk.yellow(`No files in ${label}`));
    return;
  }

  const table = new CliTable3({
    head: [chalk.cyan("Path"), chalk.cyan("Size")],
    colAligns: ["left", "right"],
    style: { head: [], border: [] },
  });
  for (const file of listing.files) {
    table.push([file.relativePath, chalk.dim(formatSize(file.declaredSize))]);
  }

  console.log(table.toString());
  console.log(
    chalk.bold(
      `${listing.files.length} file${listing.files.length === 1 ? "" : "s"}, ${formatSize(totalBytes)}`
    )
  );
}
