/**
 * The provisioning pipeline, in execution order.
 *
 * @module
 */

import type { PipelineStep } from "./Step.js";
import { PreflightStep } from "./steps/PreflightStep.js";
import { TapNewStep } from "./steps/TapNewStep.js";
import { RepoCreateStep } from "./steps/RepoCreateStep.js";
import { AddFormulaStep } from "./steps/AddFormulaStep.js";
import { CommitPushStep } from "./steps/CommitPushStep.js";
import { ValidateStep } from "./steps/ValidateStep.js";

export function createPipeline(): PipelineStep[] {
  return [
    new PreflightStep(),
    new TapNewStep(),
    new RepoCreateStep(),
    new AddFormulaStep(),
    new CommitPushStep(),
    new ValidateStep(),
  ];
}
