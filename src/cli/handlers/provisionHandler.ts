/**
 * Handler for `tapforge provision`.
 *
 * Starts a new run from flags and configuration defaults, or resumes a stored
 * run with `--resume <runId>`. A resumed run always uses its stored inputs;
 * input flags given alongside `--resume` are only compared with them.
 *
 * Everything that can fail before the pipeline starts (configuration, inputs,
 * state loading) throws; failures inside the pipeline come back as a halted
 * outcome.
 *
 * @module
 */

import { ConfigLoader, toPipelineSettings, type TapConfig } from "../../core/config/ConfigLoader.js";
import {
  assertResumeInputs,
  normalizeRunInputs,
  type RawRunInputs,
} from "../../core/inputs/RunInputs.js";
import {
  createLogger,
  FileJsonSink,
  type LogSink,
} from "../../core/logging/ContextualLogger.js";
import { createPipeline } from "../../core/pipeline/Pipeline.js";
import { PipelineRunner, type RunOutcome, type RunnerReporter } from "../../core/pipeline/Runner.js";
import { EDITOR_POLICIES, type EditorPolicy, type PipelineSettings } from "../../core/pipeline/Step.js";
import { RunStateStore, type RunState } from "../../core/state/RunStateStore.js";
import { buildRunSummary, type RunSummary } from "../../core/summary/RunSummary.js";
import type { Toolbox } from "../../core/tools/Toolbox.js";
import { TapError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Options as parsed by commander. Absent flags stay undefined so that a
 * resume can tell explicit values from defaults.
 */
export interface ProvisionFlags {
  readonly owner?: string;
  readonly tap?: string;
  readonly repoName?: string;
  readonly visibility?: string;
  readonly branch?: string;
  readonly formulaMode?: string;
  readonly formulaUrl?: string;
  readonly formulaName?: string;
  readonly dryRun?: boolean;
  readonly resume?: string;
  readonly editor?: string;
  readonly config?: string;
}

export interface ProvisionDependencies {
  readonly runsDir: string;

  /** Configuration file used when `--config` is not given */
  readonly defaultConfigFile: string;

  readonly tools: Toolbox;
  readonly reporter?: RunnerReporter;

  /** Include stacks and causes in the run log */
  readonly debug?: boolean;

  /** Sink for the run log (default: JSON lines in the run directory) */
  readonly createLogSink?: (logPath: string) => LogSink;

  readonly configLoader?: ConfigLoader;
}

export interface ProvisionResult {
  readonly outcome: RunOutcome;
  readonly summary: RunSummary;
  readonly resumed: boolean;

  /** Input warnings for a new run */
  readonly warnings: string[];
}

// =============================================================================
// Helpers
// =============================================================================

function explicitInputs(flags: ProvisionFlags): RawRunInputs {
  return {
    owner: flags.owner,
    tap: flags.tap,
    repoName: flags.repoName,
    visibility: flags.visibility,
    branch: flags.branch,
    formulaMode: flags.formulaMode,
    formulaUrl: flags.formulaUrl,
    formulaName: flags.formulaName,
    dryRun: flags.dryRun,
  };
}

function withConfigDefaults(flags: ProvisionFlags, config: TapConfig): RawRunInputs {
  return {
    ...explicitInputs(flags),
    owner: flags.owner ?? config.owner,
    branch: flags.branch ?? config.branch,
    visibility: flags.visibility ?? config.visibility,
  };
}

function resolveEditor(flag: string | undefined, fallback: EditorPolicy): EditorPolicy {
  if (flag === undefined) {
    return fallback;
  }
  const match = EDITOR_POLICIES.find((policy) => policy === flag.trim());
  if (match === undefined) {
    throw new TapError(
      `Invalid editor policy "${flag}"`,
      ErrorCode.INPUT_INVALID,
      { field: "editor", value: flag, allowed: [...EDITOR_POLICIES] },
      `Use one of: ${EDITOR_POLICIES.join(", ")}.`,
    );
  }
  return match;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Runs (or resumes) a provisioning run.
 *
 * @throws TapError for configuration, input and state errors
 */
export async function handleProvision(
  flags: ProvisionFlags,
  deps: ProvisionDependencies,
): Promise<ProvisionResult> {
  const configLoader = deps.configLoader ?? new ConfigLoader();
  const { config } = await configLoader.load(flags.config ?? deps.defaultConfigFile, {
    mustExist: flags.config !== undefined,
  });

  const configured = toPipelineSettings(config);
  const settings: PipelineSettings = {
    ...configured,
    editor: resolveEditor(flags.editor, configured.editor),
  };

  const store = new RunStateStore({ runsDir: deps.runsDir });

  let state: RunState;
  let warnings: string[] = [];
  const resumed = flags.resume !== undefined;

  if (flags.resume !== undefined) {
    const runId = flags.resume.trim();
    state = await store.load(runId);
    assertResumeInputs(runId, state.inputs, explicitInputs(flags));
  } else {
    const normalized = normalizeRunInputs(withConfigDefaults(flags, config));
    warnings = normalized.warnings;
    state = await store.create(normalized.inputs);
  }

  const logPath = store.logPath(state.runId);
  const sink = deps.createLogSink ? deps.createLogSink(logPath) : new FileJsonSink(logPath);
  const logger = createLogger({
    sink,
    minLevel: deps.debug ? "debug" : "info",
    debug: deps.debug ?? false,
  });

  for (const warning of warnings) {
    logger.warn(warning, { runId: state.runId });
  }
  if (resumed) {
    logger.info("Resuming run", { runId: state.runId, status: state.status });
  }

  const runner = new PipelineRunner({
    steps: createPipeline(),
    store,
    tools: deps.tools,
    logger,
    settings,
    reporter: deps.reporter,
  });

  const outcome = await runner.run(state);

  return {
    outcome,
    summary: buildRunSummary(outcome.state, store.statePath(state.runId)),
    resumed,
    warnings,
  };
}
