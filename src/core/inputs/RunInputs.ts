/**
 * Run inputs: capture, normalisation and resume comparison.
 *
 * Inputs are captured once, when a run is created, and stored with the run.
 * A resumed run always executes with the stored inputs; values passed again
 * on the command line are only compared against them.
 *
 * ## Normalisation rules
 *
 * - Every value is trimmed.
 * - owner, tap, repo name and formula name must be non-empty and contain
 *   neither `/` nor whitespace.
 * - The repo name defaults to `homebrew-<tap>`.
 * - `brew-create` mode requires a formula URL; an empty URL counts as absent.
 *
 * @module
 */

import { z } from "zod";
import { TapError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { deriveFormulaName } from "../formula/FormulaNames.js";

// =============================================================================
// Constants
// =============================================================================

export const VISIBILITIES = ["public", "private"] as const;
export const FORMULA_MODES = ["stub", "brew-create"] as const;

export const DEFAULT_BRANCH = "main";
export const DEFAULT_VISIBILITY: Visibility = "public";
export const DEFAULT_FORMULA_MODE: FormulaMode = "stub";

/** Prefix Homebrew expects on tap repository names. */
export const TAP_REPO_PREFIX = "homebrew-";

// =============================================================================
// Schema
// =============================================================================

/**
 * Persisted shape of run inputs.
 */
export const RunInputsSchema = z.object({
  owner: z.string().min(1),
  tap: z.string().min(1),
  repoName: z.string().min(1),
  visibility: z.enum(VISIBILITIES),
  branch: z.string().min(1),
  formulaMode: z.enum(FORMULA_MODES),
  formulaUrl: z.string().min(1).optional(),
  formulaName: z.string().min(1).optional(),
  dryRun: z.boolean(),
});

export type RunInputs = z.infer<typeof RunInputsSchema>;
export type Visibility = (typeof VISIBILITIES)[number];
export type FormulaMode = (typeof FORMULA_MODES)[number];

/**
 * Inputs as they arrive from the CLI or configuration: every field optional,
 * enumerations not yet checked.
 */
export interface RawRunInputs {
  readonly owner?: string;
  readonly tap?: string;
  readonly repoName?: string;
  readonly visibility?: string;
  readonly branch?: string;
  readonly formulaMode?: string;
  readonly formulaUrl?: string;
  readonly formulaName?: string;
  readonly dryRun?: boolean;
}

export interface NormalizedInputs {
  readonly inputs: RunInputs;

  /** Non-fatal observations worth showing to the operator. */
  readonly warnings: string[];
}

/**
 * One field whose resume value differs from the stored value.
 */
export interface InputMismatch {
  readonly field: keyof RunInputs;
  readonly stored: string;
  readonly provided: string;
}

// =============================================================================
// Normalisation
// =============================================================================

function requireToken(label: string, value: string | undefined): string {
  const trimmed = value?.trim() ?? "";

  if (trimmed === "") {
    throw new TapError(
      `${label} is required`,
      ErrorCode.INPUT_REQUIRED,
      { field: label },
      `Pass --${label.replace(/\s+/g, "-")} or set it in the configuration file.`,
    );
  }

  if (trimmed.includes("/")) {
    throw new TapError(`${label} must not include '/'`, ErrorCode.INPUT_INVALID, {
      field: label,
      value: trimmed,
    });
  }

  if (/\s/.test(trimmed)) {
    throw new TapError(`${label} must not contain whitespace`, ErrorCode.INPUT_INVALID, {
      field: label,
      value: trimmed,
    });
  }

  return trimmed;
}

function optionalToken(label: string, value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  return requireToken(label, value);
}

function pickOption<T extends string>(
  label: string,
  options: readonly T[],
  value: string | undefined,
  fallback: T,
): T {
  const trimmed = value?.trim();
  if (trimmed === undefined || trimmed === "") {
    return fallback;
  }

  const match = options.find((option) => option === trimmed);
  if (match === undefined) {
    throw new TapError(
      `Invalid ${label} "${trimmed}"`,
      ErrorCode.INPUT_INVALID,
      { field: label, value: trimmed, allowed: [...options] },
      `Use one of: ${options.join(", ")}.`,
    );
  }
  return match;
}

/**
 * Validates raw inputs and fills in defaults.
 *
 * @throws TapError (INPUT_REQUIRED / INPUT_INVALID)
 */
export function normalizeRunInputs(raw: RawRunInputs): NormalizedInputs {
  const owner = requireToken("owner", raw.owner);
  const tap = requireToken("tap", raw.tap);
  const visibility = pickOption("visibility", VISIBILITIES, raw.visibility, DEFAULT_VISIBILITY);
  const formulaMode = pickOption(
    "formula mode",
    FORMULA_MODES,
    raw.formulaMode,
    DEFAULT_FORMULA_MODE,
  );

  const branch = raw.branch?.trim() || DEFAULT_BRANCH;
  const formulaUrl = raw.formulaUrl?.trim() || undefined;
  const formulaName = optionalToken("formula name", raw.formulaName);

  if (formulaMode === "brew-create" && formulaUrl === undefined) {
    throw new TapError(
      "formula-url is required when formula-mode is brew-create",
      ErrorCode.INPUT_REQUIRED,
      { field: "formulaUrl" },
      "Pass --formula-url <tarball URL>, or use --formula-mode stub.",
    );
  }
  if (
    formulaMode === "brew-create" &&
    formulaName === undefined &&
    deriveFormulaName(formulaUrl ?? "") === null
  ) {
    throw new TapError(
      `Could not derive a formula name from ${formulaUrl ?? "an empty URL"}`,
      ErrorCode.INPUT_REQUIRED,
      { field: "formulaName", formulaUrl },
      "Pass --formula-name explicitly.",
    );
  }

  const warnings: string[] = [];
  if (tap.startsWith(TAP_REPO_PREFIX)) {
    warnings.push(
      `Tap short name includes '${TAP_REPO_PREFIX}'; the default repo would become '${TAP_REPO_PREFIX}${tap}'.`,
    );
  }

  const repoName = optionalToken("repo name", raw.repoName) ?? defaultRepoName(tap);
  if (repoName !== defaultRepoName(tap)) {
    warnings.push(
      `Repo name does not match ${TAP_REPO_PREFIX}<tap>; 'brew tap ${owner}/${tap}' shorthand may not work.`,
    );
  }

  const inputs: RunInputs = {
    owner,
    tap,
    repoName,
    visibility,
    branch,
    formulaMode,
    dryRun: raw.dryRun ?? false,
  };
  if (formulaUrl !== undefined) {
    inputs.formulaUrl = formulaUrl;
  }
  if (formulaName !== undefined) {
    inputs.formulaName = formulaName;
  }

  return { inputs, warnings };
}

// =============================================================================
// Derived names
// =============================================================================

export function defaultRepoName(tap: string): string {
  return `${TAP_REPO_PREFIX}${tap}`;
}

/**
 * `owner/repo` slug used by `gh` and `brew tap-new`.
 */
export function repoSlug(inputs: Pick<RunInputs, "owner" | "repoName">): string {
  return `${inputs.owner}/${inputs.repoName}`;
}

/**
 * Name the tap is known by in `brew tap`: the `owner/tap` shorthand when the
 * repo follows the `homebrew-<tap>` convention, the full slug otherwise.
 */
export function tapName(inputs: Pick<RunInputs, "owner" | "tap" | "repoName">): string {
  return inputs.repoName === defaultRepoName(inputs.tap)
    ? `${inputs.owner}/${inputs.tap}`
    : repoSlug(inputs);
}

// =============================================================================
// Resume comparison
// =============================================================================

/**
 * Lists every explicitly provided field that differs from the stored inputs.
 *
 * Fields left undefined in `provided` are not compared.
 */
export function findInputMismatches(stored: RunInputs, provided: RawRunInputs): InputMismatch[] {
  const mismatches: InputMismatch[] = [];

  const compare = (field: keyof RunInputs, value: string | boolean | undefined): void => {
    if (value === undefined) return;

    const providedValue = typeof value === "string" ? value.trim() : String(value);
    const storedValue = String(stored[field] ?? "");
    if (providedValue !== storedValue) {
      mismatches.push({ field, stored: storedValue, provided: providedValue });
    }
  };

  compare("owner", provided.owner);
  compare("tap", provided.tap);
  compare("repoName", provided.repoName);
  compare("visibility", provided.visibility);
  compare("branch", provided.branch);
  compare("formulaMode", provided.formulaMode);
  compare("formulaUrl", provided.formulaUrl);
  compare("formulaName", provided.formulaName);
  compare("dryRun", provided.dryRun);

  return mismatches;
}

/**
 * Rejects a resume whose explicit inputs differ from the stored ones.
 *
 * @throws TapError (INPUT_MISMATCH_ON_RESUME)
 */
export function assertResumeInputs(runId: string, stored: RunInputs, provided: RawRunInputs): void {
  const mismatches = findInputMismatches(stored, provided);
  if (mismatches.length === 0) {
    return;
  }

  throw new TapError(
    `Inputs differ from those stored for run ${runId}`,
    ErrorCode.INPUT_MISMATCH_ON_RESUME,
    {
      runId,
      mismatches: mismatches.map(
        (m) => `${m.field}: stored "${m.stored}", provided "${m.provided}"`,
      ),
    },
    "A run keeps the inputs it was created with. Resume without those flags, " +
      "or start a new run with the new inputs.",
  );
}
