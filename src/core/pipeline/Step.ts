/**
 * Step contract for the provisioning pipeline.
 *
 * A step is one idempotent unit of work with three operations:
 *
 * - `check`: read-only probe answering "is this already done?". It must be
 *   safe to call on every resume and never mutates external state.
 * - `apply`: performs the side effect. In dry-run mode it performs only the
 *   read-only part needed to compute realistic artifacts.
 * - `validate`: post-condition check after a real apply. Never called in
 *   dry-run mode.
 *
 * @module
 */

import type { RunInputs } from "../inputs/RunInputs.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";
import type { Toolbox } from "../tools/Toolbox.js";

// =============================================================================
// Step names
// =============================================================================

/**
 * Pipeline step names in execution order.
 */
export const STEP_NAMES = [
  "preflight",
  "tap-new",
  "repo-create",
  "add-formula",
  "commit-push",
  "validate",
] as const;

export type StepName = (typeof STEP_NAMES)[number];

// =============================================================================
// Artifacts and check results
// =============================================================================

/**
 * Values produced by a step, consumed by later steps and the summary.
 */
export type Artifacts = Record<string, string>;

/**
 * Reference to an artifact produced by an upstream step.
 */
export interface ArtifactRef {
  readonly step: StepName;
  readonly key: string;
}

export type CheckResult =
  | { readonly kind: "already-done"; readonly artifacts: Artifacts }
  | { readonly kind: "needs-apply" };

export function alreadyDone(artifacts: Artifacts = {}): CheckResult {
  return { kind: "already-done", artifacts };
}

export function needsApply(): CheckResult {
  return { kind: "needs-apply" };
}

// =============================================================================
// Settings and context
// =============================================================================

/**
 * How `brew create`'s editor is handled.
 *
 * - `suppress`: the editor variables point at `true`, so brew returns at once
 * - `interactive`: the terminal is inherited and the operator edits the file
 */
export const EDITOR_POLICIES = ["suppress", "interactive"] as const;

export type EditorPolicy = (typeof EDITOR_POLICIES)[number];

/**
 * Operator settings that shape how steps run but are not part of the run's
 * identity (they may change between resumes).
 */
export interface PipelineSettings {
  readonly editor: EditorPolicy;
  readonly commitMessage: string;
  readonly validation: {
    readonly audit: boolean;
    readonly install: boolean;
    readonly test: boolean;
  };
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  editor: "suppress",
  commitMessage: "Initialize tap",
  validation: { audit: false, install: false, test: false },
};

/**
 * Everything a step may read while executing.
 */
export interface StepContext {
  readonly runId: string;
  readonly inputs: RunInputs;
  readonly dryRun: boolean;
  readonly tools: Toolbox;
  readonly settings: PipelineSettings;
  readonly logger: ContextualLogger;

  /**
   * Returns an upstream artifact.
   *
   * @throws TapError (MISSING_DEPENDENCY) when the artifact is absent
   */
  artifact(ref: ArtifactRef): string;
}

// =============================================================================
// PipelineStep
// =============================================================================

export interface PipelineStep {
  readonly name: StepName;

  /** Human-readable description shown in progress output. */
  readonly description: string;

  /** Upstream artifacts that must be present before this step runs. */
  readonly requires: readonly ArtifactRef[];

  check(ctx: StepContext): Promise<CheckResult>;
  apply(ctx: StepContext): Promise<Artifacts>;
  validate(ctx: StepContext, artifacts: Artifacts): Promise<void>;
}
