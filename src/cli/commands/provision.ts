/**
 * Provision CLI command.
 *
 * Usage:
 *   tapforge provision --owner <owner> --tap <tap> [options]
 *   tapforge provision --resume <runId>
 *
 * Examples:
 *   tapforge provision --owner alice --tap tools
 *   tapforge provision --owner alice --tap tools --formula-mode brew-create \
 *     --formula-url https://example.com/mytool-1.2.3.tar.gz
 *   tapforge provision --owner alice --tap tools --dry-run
 *
 * @module
 */

import { Command } from "commander";
import { resolveAppPaths } from "../../core/utils/paths.js";
import { getExitCode } from "../../core/errors/ErrorCode.js";
import type { RunnerReporter } from "../../core/pipeline/Runner.js";
import { createToolbox } from "../../core/tools/Toolbox.js";
import { handleProvision, type ProvisionFlags } from "../handlers/provisionHandler.js";
import { ErrorPresenter } from "../errors/ErrorPresenter.js";
import { formatHalt, formatSummary } from "../printers/SummaryPrinter.js";
import { getCliUx, type CliUx } from "../ux/CliUx.js";
import { createCliSpinner } from "../ux/CliSpinner.js";

function createSpinnerReporter(ux: CliUx): RunnerReporter {
  const spinner = createCliSpinner({ ux });

  return {
    stepStarted: (step) => spinner.start(`${step.name}: ${step.description}`),
    stepSucceeded: (step) => spinner.succeed(step.name),
    stepSkipped: (step, reason) => {
      if (reason === "already-done") {
        spinner.succeed(`${step.name} (already done)`);
      } else {
        ux.verbose(`${step.name}: complete in a previous attempt`);
      }
    },
    stepFailed: (step) => spinner.fail(`${step.name} failed`),
  };
}

export function buildProvisionCommand(): Command {
  return new Command("provision")
    .description("Create a Homebrew tap, publish it on GitHub and add a formula")
    .option("--owner <owner>", "GitHub owner (user or organisation)")
    .option("--tap <tap>", "Tap short name, e.g. tools for homebrew-tools")
    .option("--repo-name <name>", "Repository name (default: homebrew-<tap>)")
    .option("--visibility <visibility>", "public or private (default: public)")
    .option("--branch <branch>", "Branch to push (default: main)")
    .option("--formula-mode <mode>", "stub or brew-create (default: stub)")
    .option("--formula-url <url>", "Source tarball URL (required for brew-create)")
    .option("--formula-name <name>", "Formula name (default: derived)")
    .option("--dry-run", "Plan every step without changing anything")
    .option("--resume <runId>", "Resume a halted or interrupted run")
    .option("--editor <policy>", "brew create editor: suppress or interactive")
    .option("--config <file>", "Configuration file")
    .action(async (options: ProvisionFlags, command: Command) => {
      const ux = getCliUx();
      const debug = command.optsWithGlobals<{ debug?: boolean }>().debug ?? false;
      const presenter = new ErrorPresenter({ debug, output: (line) => ux.errorLines([line]) });

      try {
        const paths = resolveAppPaths();
        const result = await handleProvision(options, {
          runsDir: paths.runsDir,
          defaultConfigFile: paths.configFile,
          tools: createToolbox(),
          reporter: createSpinnerReporter(ux),
          debug,
        });

        for (const warning of result.warnings) {
          ux.warn(warning);
        }

        const { outcome, summary } = result;
        if (outcome.status === "halted") {
          ux.errorLines(formatHalt(summary.runId, outcome.step, outcome.error));
          process.exitCode = getExitCode(outcome.error.code);
          return;
        }

        const [title = "", ...rest] = formatSummary(summary);
        ux.header(title);
        for (const line of rest) {
          ux.print(line);
        }
      } catch (err) {
        process.exitCode = presenter.present(err);
      }
    });
}
