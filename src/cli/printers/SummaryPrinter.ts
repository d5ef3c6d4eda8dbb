/**
 * Plain-text reports for finished, halted and listed runs.
 *
 * ## Output Format
 *
 * ```
 * Run 5f0c... completed
 *   Repository: alice/homebrew-tools (https://github.com/alice/homebrew-tools)
 *   Tap path:   /opt/homebrew/Library/Taps/alice/homebrew-tools
 *   Formula:    tools (/opt/homebrew/.../Formula/tools.rb)
 *   Branch:     main
 *   Tap name:   alice/tools
 *   Install:    brew install alice/tools/tools
 *   State file: /home/alice/.local/share/tapforge/runs/5f0c.../state.json
 * ```
 *
 * Functions return lines; commands decide where they go.
 *
 * @module
 */

import { isPrePipelineFatal } from "../../core/errors/ErrorCode.js";
import type { TapError } from "../../core/errors/errors.js";
import type { StepName } from "../../core/pipeline/Step.js";
import type { RunListEntry } from "../../core/state/RunStateStore.js";
import type { RunSummary } from "../../core/summary/RunSummary.js";

const LABEL_WIDTH = 12;

function field(label: string, value: string | undefined): string[] {
  return value ? [`  ${`${label}:`.padEnd(LABEL_WIDTH)}${value}`] : [];
}

export function resumeCommand(runId: string): string {
  return `tapforge provision --resume ${runId}`;
}

export function formatSummary(summary: RunSummary): string[] {
  const title = summary.dryRun
    ? `Dry run ${summary.runId} ${summary.status} (nothing was changed)`
    : `Run ${summary.runId} ${summary.status}`;

  const repository =
    summary.repoSlug && summary.repoUrl
      ? `${summary.repoSlug} (${summary.repoUrl})`
      : summary.repoSlug;
  const formula =
    summary.formulaName && summary.formulaPath
      ? `${summary.formulaName} (${summary.formulaPath})`
      : summary.formulaName;

  const lines = [
    title,
    ...field("Repository", repository),
    ...field("Tap path", summary.tapPath),
    ...field("Formula", formula),
    ...field("Branch", summary.branch),
    ...field("Tap name", summary.tapName),
    ...field("Install", summary.dryRun ? undefined : summary.installCommand),
    ...field("State file", summary.statePath),
  ];

  if (summary.dryRun && summary.plan.length > 0) {
    lines.push("Planned commands:");
    for (const planned of summary.plan) {
      lines.push(`  ${planned.step.padEnd(LABEL_WIDTH)}${planned.command}`);
    }
  }

  return lines;
}

export function formatHalt(runId: string, step: StepName, error: TapError): string[] {
  const lines = [`Run ${runId} halted at ${step}`, `  Cause: [${error.code}] ${error.message}`];
  if (error.hint) {
    lines.push(`  Hint:  ${error.hint}`);
  }
  if (!isPrePipelineFatal(error.code)) {
    lines.push(`  Resume: ${resumeCommand(runId)}`);
  }
  return lines;
}

export function formatRunList(entries: readonly RunListEntry[]): string[] {
  if (entries.length === 0) {
    return ["No runs recorded."];
  }

  return entries.map((entry) => {
    if (entry.kind === "corrupt") {
      return `${entry.runId}  corrupt    ${entry.error.message}`;
    }
    const { state } = entry;
    const dryRun = state.inputs.dryRun ? "  (dry run)" : "";
    return (
      `${state.runId}  ${state.status.padEnd(9)}  ` +
      `${state.inputs.owner}/${state.inputs.repoName}  ${state.createdAt}${dryRun}`
    );
  });
}
