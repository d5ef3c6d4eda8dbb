/**
 * commit-push: commits the tap and pushes it to `origin`.
 *
 * @module
 */

import { TapError } from "../../errors/errors.js";
import { ErrorCode } from "../../errors/ErrorCode.js";
import {
  alreadyDone,
  needsApply,
  type ArtifactRef,
  type Artifacts,
  type CheckResult,
  type PipelineStep,
  type StepContext,
} from "../Step.js";
import { REPO_SLUG, TAP_PATH } from "./refs.js";

const REMOTE = "origin";

export class CommitPushStep implements PipelineStep {
  readonly name = "commit-push";
  readonly description = "Commit and push the tap";
  readonly requires: readonly ArtifactRef[] = [TAP_PATH, REPO_SLUG];

  async check(ctx: StepContext): Promise<CheckResult> {
    const tapPath = ctx.artifact(TAP_PATH);
    const { git } = ctx.tools;
    const branch = ctx.inputs.branch;

    if (!(await git.isRepo(tapPath)) || (await git.remoteUrl(tapPath, REMOTE)) === null) {
      return needsApply();
    }

    const status = await git.status(tapPath);
    if (status.dirty) {
      return needsApply();
    }

    const head = await git.localHead(tapPath);
    if (head === null) {
      return needsApply();
    }

    const remoteHead = await git.remoteHead(tapPath, REMOTE, branch);
    return remoteHead === head ? alreadyDone({ branch, head }) : needsApply();
  }

  async apply(ctx: StepContext): Promise<Artifacts> {
    const tapPath = ctx.artifact(TAP_PATH);
    const { git } = ctx.tools;
    const branch = ctx.inputs.branch;

    if (ctx.dryRun) {
      return {
        branch,
        plan:
          `git add -A && git commit -m "${ctx.settings.commitMessage}" && ` +
          `git push --set-upstream ${REMOTE} ${branch}`,
      };
    }

    const status = await git.status(tapPath);
    if (status.behind > 0) {
      throw new TapError(
        `Local ${branch} is ${status.behind} commit(s) behind ${status.tracking ?? REMOTE}`,
        ErrorCode.GIT_BEHIND_REMOTE,
        { tapPath, branch, behind: status.behind },
        `Integrate the remote changes (git -C ${tapPath} pull --rebase), then resume.`,
      );
    }

    const commit = await git.commitAll(tapPath, ctx.settings.commitMessage);
    if (commit) {
      ctx.logger.info("Committed tap", { commit });
    }

    const head = await git.localHead(tapPath);
    if (head === null) {
      throw new TapError(
        `Nothing to push: ${tapPath} has no commits`,
        ErrorCode.STEP_APPLY_FAILED,
        { tapPath },
      );
    }

    await git.push(tapPath, REMOTE, branch);
    ctx.logger.info("Pushed tap", { branch, head });

    return { branch, head };
  }

  async validate(ctx: StepContext, artifacts: Artifacts): Promise<void> {
    const tapPath = ctx.artifact(TAP_PATH);
    const branch = artifacts["branch"] ?? ctx.inputs.branch;

    const remoteHead = await ctx.tools.git.remoteHead(tapPath, REMOTE, branch);
    if (remoteHead !== artifacts["head"]) {
      throw new TapError(
        `${REMOTE}/${branch} is at ${remoteHead ?? "nothing"}, expected ${artifacts["head"] ?? "the pushed commit"}`,
        ErrorCode.STEP_VALIDATE_FAILED,
        { branch, remoteHead: remoteHead ?? undefined },
      );
    }
  }
}
