/**
 * add-formula: writes `Formula/<name>.rb` into the tap.
 *
 * In `stub` mode the formula is rendered from the packaged template. In
 * `brew-create` mode `brew create` generates it from the source URL; when brew
 * normalises the requested name, the single `.rb` file it left behind is
 * adopted.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import fg from "fast-glob";
import { repoSlug, type RunInputs } from "../../inputs/RunInputs.js";
import { deriveFormulaName } from "../../formula/FormulaNames.js";
import { renderStubFormula } from "../../formula/FormulaTemplate.js";
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
import { TAP_PATH } from "./refs.js";

/**
 * Name of the formula a run produces.
 *
 * @throws TapError (INPUT_REQUIRED) when brew-create mode cannot derive one
 */
export function resolveFormulaName(inputs: RunInputs): string {
  if (inputs.formulaName) {
    return inputs.formulaName;
  }
  if (inputs.formulaMode === "stub") {
    return inputs.tap;
  }

  const derived = deriveFormulaName(inputs.formulaUrl ?? "");
  if (!derived) {
    throw new TapError(
      `Could not derive a formula name from ${inputs.formulaUrl ?? "an empty URL"}`,
      ErrorCode.INPUT_REQUIRED,
      { field: "formulaName", formulaUrl: inputs.formulaUrl },
      "Pass --formula-name explicitly.",
    );
  }
  return derived;
}

function formulaDir(tapPath: string): string {
  return path.join(tapPath, "Formula");
}

export class AddFormulaStep implements PipelineStep {
  readonly name = "add-formula";
  readonly description = "Add the formula";
  readonly requires: readonly ArtifactRef[] = [TAP_PATH];

  async check(ctx: StepContext): Promise<CheckResult> {
    const formulaName = resolveFormulaName(ctx.inputs);
    const formulaPath = path.join(formulaDir(ctx.artifact(TAP_PATH)), `${formulaName}.rb`);

    if (await fileExists(formulaPath)) {
      return alreadyDone({ formulaName, formulaPath });
    }
    return needsApply();
  }

  async apply(ctx: StepContext): Promise<Artifacts> {
    const tapPath = ctx.artifact(TAP_PATH);
    const formulaName = resolveFormulaName(ctx.inputs);
    const formulaPath = path.join(formulaDir(tapPath), `${formulaName}.rb`);

    if (ctx.inputs.formulaMode === "stub") {
      if (ctx.dryRun) {
        return { formulaName, formulaPath, plan: `write stub formula ${formulaPath}` };
      }

      await fs.mkdir(formulaDir(tapPath), { recursive: true });
      await fs.writeFile(
        formulaPath,
        renderStubFormula({ name: formulaName, url: ctx.inputs.formulaUrl }),
        "utf-8",
      );
      ctx.logger.info("Stub formula written", { formulaPath });
      return { formulaName, formulaPath };
    }

    const url = ctx.inputs.formulaUrl ?? "";
    const slug = repoSlug(ctx.inputs);

    if (ctx.dryRun) {
      return {
        formulaName,
        formulaPath,
        plan: `brew create --tap ${slug} --set-name ${formulaName} ${url}`,
      };
    }

    await ctx.tools.brew.create({
      tapSlug: slug,
      name: formulaName,
      url,
      editor: ctx.settings.editor,
    });

    if (await fileExists(formulaPath)) {
      return { formulaName, formulaPath };
    }
    return this.adoptGeneratedFormula(ctx, tapPath, formulaName);
  }

  async validate(_ctx: StepContext, artifacts: Artifacts): Promise<void> {
    const formulaPath = artifacts["formulaPath"] ?? "";
    if (!(await fileExists(formulaPath))) {
      throw new TapError(
        `Formula file is missing: ${formulaPath}`,
        ErrorCode.STEP_VALIDATE_FAILED,
        { formulaPath },
      );
    }
  }

  private async adoptGeneratedFormula(
    ctx: StepContext,
    tapPath: string,
    requestedName: string,
  ): Promise<Artifacts> {
    const dir = formulaDir(tapPath);
    const files = await fg("*.rb", { cwd: dir, onlyFiles: true });

    const [only] = files;
    if (files.length !== 1 || only === undefined) {
      throw new TapError(
        `brew create did not produce Formula/${requestedName}.rb`,
        ErrorCode.STEP_APPLY_FAILED,
        { formulaDir: dir, found: files },
        "Start a new run with --formula-name set to the name brew uses.",
      );
    }

    const formulaName = path.basename(only, ".rb");
    ctx.logger.info("Adopted formula generated under another name", {
      requested: requestedName,
      formulaName,
    });
    return { formulaName, formulaPath: path.join(dir, only) };
  }
}
