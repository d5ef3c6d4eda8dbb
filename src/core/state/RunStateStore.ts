/**
 * Run State Store.
 *
 * Persists one provisioning run at `<runsDir>/<runId>/state.json`, next to its
 * structured log `run.log`. The stored state is the single source of truth for
 * resume: the runner saves after every step transition.
 *
 * ## Atomic Writes
 *
 * 1. Write to a temp file in the run directory
 * 2. Rename temp to `state.json` (atomic on POSIX)
 *
 * ## Loading
 *
 * Unknown fields are ignored. A file that is not JSON, fails the schema, was
 * written by a newer schema version, or whose step list differs from the
 * pipeline's is reported as STATE_CORRUPT.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as crypto from "node:crypto";
import { z } from "zod";
import { RunInputsSchema, type RunInputs } from "../inputs/RunInputs.js";
import { STEP_NAMES, type StepName } from "../pipeline/Step.js";
import { ErrorCode, isErrorCode } from "../errors/ErrorCode.js";
import { TapError, asError } from "../errors/errors.js";

// =============================================================================
// Constants
// =============================================================================

/** Current schema version for state files. */
export const CURRENT_SCHEMA_VERSION = 1;

const STATE_FILE = "state.json";
const LOG_FILE = "run.log";

const RUN_ID_PATTERN = /^[A-Za-z0-9-]+$/;

// =============================================================================
// Zod Schemas
// =============================================================================

export const STEP_STATUSES = ["pending", "succeeded", "skipped", "failed"] as const;
export const RUN_STATUSES = ["created", "running", "completed", "halted"] as const;
export const ERROR_PHASES = ["check", "apply", "validate", "dependency"] as const;

const StepErrorSchema = z.object({
  code: z.string().refine(isErrorCode, { message: "Unknown error code" }),
  message: z.string(),
  phase: z.enum(ERROR_PHASES),
  hint: z.string().optional(),
});

const StepRecordSchema = z.object({
  name: z.enum(STEP_NAMES),
  status: z.enum(STEP_STATUSES),
  error: StepErrorSchema.optional(),
  artifacts: z.record(z.string(), z.string()),
  attempts: z.number().int().nonnegative(),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
});

export const RunStateSchema = z.object({
  schemaVersion: z.number().int().positive(),
  runId: z.string().min(1),
  createdAt: z.string(),
  updatedAt: z.string(),
  status: z.enum(RUN_STATUSES),
  currentStep: z.enum(STEP_NAMES).optional(),
  inputs: RunInputsSchema,
  steps: z.array(StepRecordSchema),
});

// =============================================================================
// Types
// =============================================================================

export type StepStatus = (typeof STEP_STATUSES)[number];
export type RunStatus = (typeof RUN_STATUSES)[number];
export type ErrorPhase = (typeof ERROR_PHASES)[number];

export interface StepError {
  code: ErrorCode;
  message: string;
  phase: ErrorPhase;
  hint?: string;
}

export interface StepRecord {
  name: StepName;
  status: StepStatus;
  error?: StepError;
  artifacts: Record<string, string>;
  attempts: number;
  startedAt?: string;
  finishedAt?: string;
}

export interface RunState {
  schemaVersion: number;
  runId: string;
  createdAt: string;
  updatedAt: string;
  status: RunStatus;
  currentStep?: StepName;
  inputs: RunInputs;
  steps: StepRecord[];
}

/**
 * One entry of {@link RunStateStore.list}.
 */
export type RunListEntry =
  | { readonly kind: "ok"; readonly state: RunState }
  | { readonly kind: "corrupt"; readonly runId: string; readonly error: TapError };

export interface RunStateStoreOptions {
  /** Directory holding one sub-directory per run. */
  readonly runsDir: string;
}

// =============================================================================
// Helpers
// =============================================================================

export function isValidRunId(runId: string): boolean {
  return RUN_ID_PATTERN.test(runId);
}

/**
 * Returns the record for a step. Every state holds one record per step.
 */
export function getStepRecord(state: RunState, name: StepName): StepRecord {
  const record = state.steps.find((s) => s.name === name);
  if (!record) {
    throw new TapError(
      `Run ${state.runId} has no record for step ${name}`,
      ErrorCode.STATE_CORRUPT,
      { runId: state.runId, step: name },
    );
  }
  return record;
}

function hasPipelineSteps(steps: readonly StepRecord[]): boolean {
  return (
    steps.length === STEP_NAMES.length && steps.every((step, i) => step.name === STEP_NAMES[i])
  );
}

// =============================================================================
// RunStateStore
// =============================================================================

/**
 * Loads and saves run state.
 *
 * @example
 * ```typescript
 * const store = new RunStateStore({ runsDir });
 * const state = await store.create(inputs);
 * // ... later
 * const resumed = await store.load(state.runId);
 * ```
 */
export class RunStateStore {
  readonly runsDir: string;

  constructor(options: RunStateStoreOptions) {
    this.runsDir = options.runsDir;
  }

  statePath(runId: string): string {
    return path.join(this.runsDir, runId, STATE_FILE);
  }

  logPath(runId: string): string {
    return path.join(this.runsDir, runId, LOG_FILE);
  }

  /**
   * Mints a run with every step pending and persists it.
   */
  async create(inputs: RunInputs): Promise<RunState> {
    const now = new Date().toISOString();
    const state: RunState = {
      schemaVersion: CURRENT_SCHEMA_VERSION,
      runId: crypto.randomUUID(),
      createdAt: now,
      updatedAt: now,
      status: "created",
      inputs,
      steps: STEP_NAMES.map((name) => ({
        name,
        status: "pending",
        artifacts: {},
        attempts: 0,
      })),
    };

    await this.save(state);
    return state;
  }

  /**
   * Loads a run.
   *
   * @throws TapError (STATE_NOT_FOUND) when the run does not exist
   * @throws TapError (STATE_CORRUPT) when the file cannot be trusted
   */
  async load(runId: string): Promise<RunState> {
    if (!isValidRunId(runId)) {
      throw this.notFound(runId);
    }

    const statePath = this.statePath(runId);

    let content: string;
    try {
      content = await fs.readFile(statePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        throw this.notFound(runId);
      }
      throw this.corrupt(runId, statePath, "could not be read", asError(err));
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw this.corrupt(runId, statePath, "contains invalid JSON", asError(err));
    }

    const result = RunStateSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw this.corrupt(runId, statePath, `has an invalid structure: ${issues}`);
    }

    const state: RunState = result.data;

    if (state.schemaVersion > CURRENT_SCHEMA_VERSION) {
      throw this.corrupt(
        runId,
        statePath,
        `was written by a newer version (schema ${state.schemaVersion}, supported ${CURRENT_SCHEMA_VERSION})`,
      );
    }
    if (!hasPipelineSteps(state.steps)) {
      throw this.corrupt(
        runId,
        statePath,
        `lists steps [${state.steps.map((s) => s.name).join(", ")}], expected [${STEP_NAMES.join(", ")}]`,
      );
    }
    if (state.runId !== runId) {
      throw this.corrupt(runId, statePath, `belongs to run ${state.runId}`);
    }

    return state;
  }

  /**
   * Atomically overwrites the stored state and refreshes `updatedAt`.
   *
   * @throws TapError (STATE_WRITE_FAILED)
   */
  async save(state: RunState): Promise<void> {
    const statePath = this.statePath(state.runId);
    const stateDir = path.dirname(statePath);
    const tempPath = path.join(
      stateDir,
      `${STATE_FILE}.tmp-${process.pid}-${crypto.randomBytes(8).toString("hex")}`,
    );

    state.updatedAt = new Date().toISOString();
    const content = JSON.stringify(state, null, 2) + "\n";

    try {
      await fs.mkdir(stateDir, { recursive: true });
      await fs.writeFile(tempPath, content, "utf-8");
      await fs.rename(tempPath, statePath);
    } catch (err) {
      await fs.rm(tempPath, { force: true }).catch(() => undefined);
      throw new TapError(
        `Failed to write state for run ${state.runId}`,
        ErrorCode.STATE_WRITE_FAILED,
        { path: statePath },
        `Check that ${stateDir} is writable.`,
        asError(err),
      );
    }
  }

  /**
   * Lists stored runs, newest first.
   */
  async list(): Promise<RunListEntry[]> {
    let names: string[];
    try {
      const entries = await fs.readdir(this.runsDir, { withFileTypes: true });
      names = entries.filter((e) => e.isDirectory()).map((e) => e.name);
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return [];
      }
      throw err;
    }

    const results: RunListEntry[] = [];
    for (const runId of names) {
      try {
        results.push({ kind: "ok", state: await this.load(runId) });
      } catch (err) {
        if (err instanceof TapError && err.code === ErrorCode.STATE_CORRUPT) {
          results.push({ kind: "corrupt", runId, error: err });
        } else if (!(err instanceof TapError && err.code === ErrorCode.STATE_NOT_FOUND)) {
          throw err;
        }
      }
    }

    const createdAt = (entry: RunListEntry): string =>
      entry.kind === "ok" ? entry.state.createdAt : "";
    return results.sort((a, b) => createdAt(b).localeCompare(createdAt(a)));
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private notFound(runId: string): TapError {
    return new TapError(
      `Run ${runId} not found`,
      ErrorCode.STATE_NOT_FOUND,
      { runId, runsDir: this.runsDir },
      "List known runs with: tapforge runs list",
    );
  }

  private corrupt(runId: string, statePath: string, problem: string, cause?: Error): TapError {
    return new TapError(
      `State file for run ${runId} ${problem}`,
      ErrorCode.STATE_CORRUPT,
      { runId, path: statePath },
      `Inspect or delete ${statePath}, then start a new run.`,
      cause,
    );
  }
}
