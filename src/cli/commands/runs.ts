/**
 * Runs CLI command group.
 *
 * Usage:
 *   tapforge runs list
 *   tapforge runs show <runId>
 *
 * @module
 */

import { Command } from "commander";
import { resolveAppPaths } from "../../core/utils/paths.js";
import type { StepStatus } from "../../core/state/RunStateStore.js";
import { handleRunsList, handleRunsShow } from "../handlers/runsHandler.js";
import { ErrorPresenter } from "../errors/ErrorPresenter.js";
import { formatRunList, formatSummary, resumeCommand } from "../printers/SummaryPrinter.js";
import { getCliUx, type StepMark } from "../ux/CliUx.js";

const STEP_MARK: Record<StepStatus, StepMark> = {
  succeeded: "done",
  skipped: "skipped",
  failed: "failed",
  pending: "pending",
};

function presenterFor(command: Command): ErrorPresenter {
  const ux = getCliUx();
  const debug = command.optsWithGlobals<{ debug?: boolean }>().debug ?? false;
  return new ErrorPresenter({ debug, output: (line) => ux.errorLines([line]) });
}

export function buildRunsCommand(): Command {
  const runs = new Command("runs").description("Inspect recorded runs");

  runs
    .command("list")
    .description("List recorded runs, newest first")
    .action(async (_options: unknown, command: Command) => {
      const ux = getCliUx();
      try {
        const entries = await handleRunsList({ runsDir: resolveAppPaths().runsDir });
        for (const line of formatRunList(entries)) {
          ux.print(line);
        }
      } catch (err) {
        process.exitCode = presenterFor(command).present(err);
      }
    });

  runs
    .command("show")
    .description("Show the summary and step records of a run")
    .argument("<runId>", "Run identifier")
    .action(async (runId: string, _options: unknown, command: Command) => {
      const ux = getCliUx();
      try {
        const summary = await handleRunsShow(runId, { runsDir: resolveAppPaths().runsDir });

        const [title = "", ...rest] = formatSummary(summary);
        ux.header(title);
        for (const line of rest) {
          ux.print(line);
        }

        ux.header("Steps");
        for (const step of summary.steps) {
          const note = step.errorCode ? `[${step.errorCode}] ${step.errorMessage ?? ""}` : undefined;
          ux.stepLine(STEP_MARK[step.status], step.name, note);
        }

        if (summary.status === "halted" || summary.status === "running") {
          ux.print("");
          ux.print(`Resume with: ${resumeCommand(summary.runId)}`);
        }
      } catch (err) {
        process.exitCode = presenterFor(command).present(err);
      }
    });

  return runs;
}
