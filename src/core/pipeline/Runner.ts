/**
 * Pipeline Runner - drives a run's steps against its persisted state.
 *
 * For each step, in pipeline order:
 *
 * 1. `succeeded` or `skipped` records are passed over without calling the step.
 * 2. A missing upstream artifact fails the step with MISSING_DEPENDENCY.
 * 3. `check` reporting AlreadyDone marks the step `skipped`.
 * 4. Otherwise `apply`, then `validate` (not in dry-run), marks it `succeeded`.
 * 5. Any failure marks the step `failed` and halts the run.
 *
 * State is saved before each attempted step and after each transition, so an
 * interrupted process resumes from the last saved transition. A failed step
 * is never retried within one invocation.
 *
 * @module
 */

import { TapError, asError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";
import { StepTimer } from "../logging/StepTimer.js";
import {
  getStepRecord,
  type ErrorPhase,
  type RunState,
  type RunStateStore,
  type StepRecord,
} from "../state/RunStateStore.js";
import type { Toolbox } from "../tools/Toolbox.js";
import {
  DEFAULT_PIPELINE_SETTINGS,
  type ArtifactRef,
  type Artifacts,
  type PipelineSettings,
  type PipelineStep,
  type StepContext,
  type StepName,
} from "./Step.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Progress callbacks, used by the CLI for its spinner.
 */
export interface RunnerReporter {
  stepStarted?(step: PipelineStep): void;
  stepSkipped?(step: PipelineStep, reason: "recorded" | "already-done"): void;
  stepSucceeded?(step: PipelineStep, artifacts: Artifacts): void;
  stepFailed?(step: PipelineStep, error: TapError): void;
}

export interface PipelineRunnerOptions {
  readonly steps: readonly PipelineStep[];
  readonly store: Pick<RunStateStore, "save">;
  readonly tools: Toolbox;
  readonly logger: ContextualLogger;
  readonly settings?: PipelineSettings;
  readonly reporter?: RunnerReporter;
}

export type RunOutcome =
  | { readonly status: "completed"; readonly state: RunState }
  | {
      readonly status: "halted";
      readonly state: RunState;
      readonly step: StepName;
      readonly error: TapError;
    };

// =============================================================================
// Error classification
// =============================================================================

const PHASE_ERROR_CODES: Record<Exclude<ErrorPhase, "dependency">, ErrorCode> = {
  check: ErrorCode.STEP_CHECK_FAILED,
  apply: ErrorCode.STEP_APPLY_FAILED,
  validate: ErrorCode.STEP_VALIDATE_FAILED,
};

/**
 * Keeps a TapError's own code; anything else gets the code of the phase it
 * escaped from.
 */
export function classifyStepError(
  error: unknown,
  step: StepName,
  phase: Exclude<ErrorPhase, "dependency">,
): TapError {
  if (error instanceof TapError) {
    return error;
  }

  const cause = asError(error);
  return new TapError(
    `${step} ${phase} failed: ${cause.message}`,
    PHASE_ERROR_CODES[phase],
    { step, phase },
    undefined,
    cause,
    false,
  );
}

function missingDependency(step: StepName, ref: ArtifactRef): TapError {
  return new TapError(
    `${step} requires artifact '${ref.key}' from ${ref.step}`,
    ErrorCode.MISSING_DEPENDENCY,
    { step, requires: `${ref.step}.${ref.key}` },
    `Resume the run so that ${ref.step} runs first.`,
  );
}

// =============================================================================
// PipelineRunner
// =============================================================================

export class PipelineRunner {
  private readonly steps: readonly PipelineStep[];
  private readonly store: Pick<RunStateStore, "save">;
  private readonly tools: Toolbox;
  private readonly logger: ContextualLogger;
  private readonly settings: PipelineSettings;
  private readonly reporter: RunnerReporter;

  constructor(options: PipelineRunnerOptions) {
    this.steps = options.steps;
    this.store = options.store;
    this.tools = options.tools;
    this.logger = options.logger;
    this.settings = options.settings ?? DEFAULT_PIPELINE_SETTINGS;
    this.reporter = options.reporter ?? {};
  }

  /**
   * Runs every step that is not already complete. Mutates and saves `state`.
   *
   * @throws TapError (STATE_WRITE_FAILED) when state cannot be saved
   */
  async run(state: RunState): Promise<RunOutcome> {
    const logger = this.logger.withContext({ runId: state.runId });
    const timer = new StepTimer(logger);

    state.status = "running";
    await this.store.save(state);
    logger.info("Run started", { dryRun: state.inputs.dryRun });

    for (const step of this.steps) {
      const record = getStepRecord(state, step.name);

      if (record.status === "succeeded" || record.status === "skipped") {
        logger.debug("Step already complete", { step: step.name, status: record.status });
        this.reporter.stepSkipped?.(step, "recorded");
        continue;
      }

      const missing = step.requires.find((ref) => !getStepRecord(state, ref.step).artifacts[ref.key]);
      if (missing) {
        const error = missingDependency(step.name, missing);
        this.recordFailure(record, error, "dependency");
        return this.halt(state, step, error, logger);
      }

      state.currentStep = step.name;
      record.attempts += 1;
      record.startedAt = new Date().toISOString();
      await this.store.save(state);

      this.reporter.stepStarted?.(step);
      timer.start(step.name, { attempt: record.attempts });

      const ctx = this.createContext(state, step, logger);
      let phase: Exclude<ErrorPhase, "dependency"> = "check";

      try {
        const checked = await step.check(ctx);

        if (checked.kind === "already-done") {
          record.status = "skipped";
          record.artifacts = { ...checked.artifacts };
          delete record.error;
          record.finishedAt = new Date().toISOString();
          await this.store.save(state);

          timer.end(step.name, { outcome: "skipped" });
          this.reporter.stepSkipped?.(step, "already-done");
          continue;
        }

        phase = "apply";
        const artifacts = await step.apply(ctx);

        if (!ctx.dryRun) {
          phase = "validate";
          await step.validate(ctx, artifacts);
        }

        record.status = "succeeded";
        record.artifacts = { ...artifacts };
        delete record.error;
        record.finishedAt = new Date().toISOString();
        await this.store.save(state);

        timer.end(step.name, { outcome: "succeeded" });
        this.reporter.stepSucceeded?.(step, artifacts);
      } catch (err) {
        if (err instanceof TapError && err.code === ErrorCode.STATE_WRITE_FAILED) {
          throw err;
        }

        const error = classifyStepError(err, step.name, phase);
        timer.endWithError(step.name, error, { phase });
        this.recordFailure(record, error, phase);
        return this.halt(state, step, error, logger);
      }
    }

    state.status = "completed";
    delete state.currentStep;
    await this.store.save(state);
    logger.info("Run completed");

    return { status: "completed", state };
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private createContext(
    state: RunState,
    step: PipelineStep,
    logger: ContextualLogger,
  ): StepContext {
    return {
      runId: state.runId,
      inputs: state.inputs,
      dryRun: state.inputs.dryRun,
      tools: this.tools,
      settings: this.settings,
      logger: logger.withContext({ step: step.name }),
      artifact: (ref) => {
        const value = getStepRecord(state, ref.step).artifacts[ref.key];
        if (value === undefined || value === "") {
          throw missingDependency(step.name, ref);
        }
        return value;
      },
    };
  }

  private recordFailure(record: StepRecord, error: TapError, phase: ErrorPhase): void {
    record.status = "failed";
    record.error = { code: error.code, message: error.message, phase };
    if (error.hint) {
      record.error.hint = error.hint;
    }
    record.finishedAt = new Date().toISOString();
  }

  private async halt(
    state: RunState,
    step: PipelineStep,
    error: TapError,
    logger: ContextualLogger,
  ): Promise<RunOutcome> {
    state.status = "halted";
    state.currentStep = step.name;
    await this.store.save(state);

    logger.error("Run halted", { step: step.name, error });
    this.reporter.stepFailed?.(step, error);

    return { status: "halted", state, step: step.name, error };
  }
}
