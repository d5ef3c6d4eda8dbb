/**
 * tap-new: scaffolds the local tap with `brew tap-new`.
 *
 * @module
 */

import * as path from "node:path";
import { repoSlug, type RunInputs } from "../../inputs/RunInputs.js";
import { fileExists } from "../../utils/fs.js";
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

/**
 * Where Homebrew keeps the tap: `<brew repository>/Library/Taps/<owner>/<repo>`.
 */
export function tapPathFor(
  brewRepository: string,
  inputs: Pick<RunInputs, "owner" | "repoName">,
): string {
  return path.join(brewRepository, "Library", "Taps", inputs.owner, inputs.repoName);
}

export class TapNewStep implements PipelineStep {
  readonly name = "tap-new";
  readonly description = "Create the local tap";
  readonly requires: readonly ArtifactRef[] = [];

  async check(ctx: StepContext): Promise<CheckResult> {
    const tapPath = tapPathFor(await ctx.tools.brew.repository(), ctx.inputs);

    if (!(await fileExists(tapPath))) {
      return needsApply();
    }
    if (await ctx.tools.git.isRepo(tapPath)) {
      return alreadyDone({ tapPath });
    }

    throw new TapError(
      `Tap path exists but is not a git repository: ${tapPath}`,
      ErrorCode.TAP_PATH_INVALID,
      { tapPath },
      `Remove ${tapPath} (or run git init in it), then resume.`,
    );
  }

  async apply(ctx: StepContext): Promise<Artifacts> {
    const tapPath = tapPathFor(await ctx.tools.brew.repository(), ctx.inputs);
    const slug = repoSlug(ctx.inputs);

    if (ctx.dryRun) {
      return { tapPath, plan: `brew tap-new ${slug}` };
    }

    await ctx.tools.brew.tapNew(slug);
    ctx.logger.info("Tap created", { tapPath });
    return { tapPath };
  }

  async validate(_ctx: StepContext, artifacts: Artifacts): Promise<void> {
    const tapPath = artifacts["tapPath"] ?? "";
    if (!(await fileExists(path.join(tapPath, ".git")))) {
      throw new TapError(
        `brew tap-new did not create a git repository at ${tapPath}`,
        ErrorCode.STEP_VALIDATE_FAILED,
        { tapPath },
      );
    }
  }
}
