/**
 * validate: taps the published repository and optionally audits, installs and
 * tests the formula.
 *
 * @module
 */

import { repoSlug, tapName } from "../../inputs/RunInputs.js";
import { fileExists } from "../../utils/fs.js";
import { TapError } from "../../errors/errors.js";
import { ErrorCode } from "../../errors/ErrorCode.js";
import {
  needsApply,
  type ArtifactRef,
  type Artifacts,
  type CheckResult,
  type PipelineStep,
  type StepContext,
} from "../Step.js";
import { BRANCH, FORMULA_NAME, FORMULA_PATH, TAP_PATH } from "./refs.js";

export class ValidateStep implements PipelineStep {
  readonly name = "validate";
  readonly description = "Validate the published tap";
  readonly requires: readonly ArtifactRef[] = [TAP_PATH, FORMULA_PATH, FORMULA_NAME, BRANCH];

  async check(): Promise<CheckResult> {
    return needsApply();
  }

  async apply(ctx: StepContext): Promise<Artifacts> {
    const name = tapName(ctx.inputs);
    const formulaRef = `${name}/${ctx.artifact(FORMULA_NAME)}`;
    const { validation } = ctx.settings;

    const commands: Array<[string, () => Promise<void>]> = [
      [`brew tap ${name}`, () => ctx.tools.brew.tap(name)],
    ];
    if (validation.audit) {
      commands.push([`brew audit --formula ${formulaRef}`, () => ctx.tools.brew.audit(formulaRef)]);
    }
    if (validation.install) {
      commands.push([`brew install ${formulaRef}`, () => ctx.tools.brew.install(formulaRef)]);
    }
    if (validation.test) {
      commands.push([`brew test ${formulaRef}`, () => ctx.tools.brew.test(formulaRef)]);
    }

    if (ctx.dryRun) {
      return { tapName: name, plan: commands.map(([label]) => label).join(" && ") };
    }

    for (const [label, run] of commands) {
      ctx.logger.debug("Running validation", { command: label });
      await run();
    }
    return { tapName: name };
  }

  async validate(ctx: StepContext, artifacts: Artifacts): Promise<void> {
    const name = artifacts["tapName"] ?? tapName(ctx.inputs);
    const candidates = [name, repoSlug(ctx.inputs)].map((c) => c.toLowerCase());

    const taps = await ctx.tools.brew.listTaps();
    if (!taps.some((t) => candidates.includes(t.toLowerCase()))) {
      throw new TapError(`brew tap does not list ${name}`, ErrorCode.STEP_VALIDATE_FAILED, {
        tapName: name,
        taps,
      });
    }

    const formulaPath = ctx.artifact(FORMULA_PATH);
    if (!(await fileExists(formulaPath))) {
      throw new TapError(
        `Formula file is missing: ${formulaPath}`,
        ErrorCode.STEP_VALIDATE_FAILED,
        { formulaPath },
      );
    }

    const branch = ctx.artifact(BRANCH);
    const remoteHead = await ctx.tools.git.remoteHead(ctx.artifact(TAP_PATH), "origin", branch);
    if (remoteHead === null) {
      throw new TapError(
        `origin/${branch} is not reachable`,
        ErrorCode.STEP_VALIDATE_FAILED,
        { branch },
      );
    }
  }
}
