#!/usr/bin/env node
import { Command } from "commander";
import { ConfKeyStore } from "./lib/api-client.js";
import { initContext } from "./lib/cli-context.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { CLI_VERSION } from "./lib/version.js";
import { registerMirrorCommand } from "./modules/mirror.js";
import { registerListCommand } from "./modules/list.js";
import { registerAuthCommands } from "./modules/auth.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDoctorCommand } from "./modules/doctor.js";

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("zenodo-mirror")
    .description("Mirror a Zenodo community's records and files to a local directory")
    .version(CLI_VERSION)
    .option("--json", "Print machine-readable JSON")
    .option("-q, --quiet", "Hide spinners and progress indicators");

  const keyStore = new ConfKeyStore();

  registerMirrorCommand(program, { keyStore });
  registerListCommand(program, { keyStore });
  registerAuthCommands(program, keyStore);
  registerConfigCommands(program);
  registerDoctorCommand(program, { keyStore });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error);
    process.exitCode = 1;
  }
}

void main();
