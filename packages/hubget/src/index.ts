#!/usr/bin/env node
import { Command } from "commander";
import { VERSION } from "./lib/version.js";
import { initContext } from "./lib/cli-context.js";
import { loadServices, type ConnectionOptions } from "./lib/services.js";
import { reportError } from "./lib/errors/renderer.js";
import { registerGetCommand } from "./modules/get.js";
import { registerListCommand } from "./modules/list.js";
import { registerResumeCommand } from "./modules/resume.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDoctorCommand } from "./modules/doctor.js";

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("hubget")
    .description("Resumable downloads from model-hosting sites and plain HTTP URLs")
    .version(VERSION)
    .option("--json", "Print results as JSON and progress as NDJSON on stdout")
    .option("-q, --quiet", "Hide spinners and progress")
    .option("-y, --yes", "Answer yes to confirmation prompts")
    .option("--no-input", "Never prompt");

  const load = (options: ConnectionOptions) => loadServices(options);

  registerGetCommand(program, load);
  registerListCommand(program, load);
  registerResumeCommand(program, load);
  registerConfigCommands(program);
  registerDoctorCommand(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    reportError(error);
  }
}

void main();
