#!/usr/bin/env node
import { Command } from "commander";
import { buildProvisionCommand } from "./commands/provision.js";
import { buildRunsCommand } from "./commands/runs.js";
import { ErrorPresenter } from "./errors/ErrorPresenter.js";
import { createCliUx, getCliUx, parseOutputLevel, setDefaultCliUx } from "./ux/CliUx.js";
import { CLI_VERSION } from "./version.js";

async function main(): Promise<void> {
  const program = new Command()
    .name("tapforge")
    .description("tapforge - provision a Homebrew tap on GitHub, resumably")
    .version(CLI_VERSION)
    .option("--verbose", "Show additional context and details", false)
    .option("--debug", "Show all output including debug traces", false)
    .option("--silent", "Suppress all output except errors", false);

  program.hook("preAction", (thisCommand) => {
    const opts = thisCommand.optsWithGlobals<{ verbose?: boolean; debug?: boolean; silent?: boolean }>();
    const level = parseOutputLevel({
      verbose: opts.verbose ?? false,
      debug: opts.debug ?? false,
      silent: opts.silent ?? false,
    });
    setDefaultCliUx(createCliUx({ level }));
  });

  program.addCommand(buildProvisionCommand());
  program.addCommand(buildRunsCommand());

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const ux = getCliUx();
    const presenter = new ErrorPresenter({
      debug: program.opts<{ debug?: boolean }>().debug ?? false,
      output: (line) => ux.errorLines([line]),
    });
    process.exitCode = presenter.present(err);
  }
}

void main();
