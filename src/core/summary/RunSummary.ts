/**
 * Summary of a run, built from its persisted state.
 *
 * @module
 */

import {
  getStepRecord,
  type RunState,
  type RunStatus,
  type StepStatus,
} from "../state/RunStateStore.js";
import type { StepName } from "../pipeline/Step.js";
import type { ErrorCode } from "../errors/ErrorCode.js";

export interface PlannedCommand {
  readonly step: StepName;
  readonly command: string;
}

export interface StepSummary {
  readonly name: StepName;
  readonly status: StepStatus;
  readonly attempts: number;
  readonly errorCode?: ErrorCode;
  readonly errorMessage?: string;
}

export interface RunSummary {
  readonly runId: string;
  readonly status: RunStatus;
  readonly dryRun: boolean;
  readonly repoSlug?: string;
  readonly repoUrl?: string;
  readonly tapPath?: string;
  readonly formulaName?: string;
  readonly formulaPath?: string;
  readonly branch?: string;
  readonly tapName?: string;
  readonly installCommand?: string;
  readonly statePath: string;
  readonly steps: StepSummary[];

  /** Commands a dry-run would execute, in pipeline order. */
  readonly plan: PlannedCommand[];
}

export function buildRunSummary(state: RunState, statePath: string): RunSummary {
  const artifact = (step: StepName, key: string): string | undefined =>
    getStepRecord(state, step).artifacts[key];

  const tapName = artifact("validate", "tapName");
  const formulaName = artifact("add-formula", "formulaName");

  return {
    runId: state.runId,
    status: state.status,
    dryRun: state.inputs.dryRun,
    repoSlug: artifact("repo-create", "repoSlug"),
    repoUrl: artifact("repo-create", "repoUrl"),
    tapPath: artifact("tap-new", "tapPath"),
    formulaName,
    formulaPath: artifact("add-formula", "formulaPath"),
    branch: artifact("commit-push", "branch"),
    tapName,
    installCommand:
      tapName && formulaName ? `brew install ${tapName}/${formulaName}` : undefined,
    statePath,
    steps: state.steps.map((record) => ({
      name: record.name,
      status: record.status,
      attempts: record.attempts,
      errorCode: record.error?.code,
      errorMessage: record.error?.message,
    })),
    plan: state.steps.flatMap((record) => {
      const command = record.artifacts["plan"];
      return command ? [{ step: record.name, command }] : [];
    }),
  };
}
