/**
 * Standardized error codes for tapforge.
 *
 * Error codes are stable public API contracts. They should be:
 * - SCREAMING_SNAKE_CASE
 * - Grouped by domain
 *
 * @module
 */

// =============================================================================
// Error Code Enum
// =============================================================================

/**
 * All tapforge error codes.
 *
 * Codes are grouped by domain:
 * - PREFLIGHT_* / AUTH_* / TOOL_* : External tool availability and calls
 * - STEP_* / MISSING_* : Pipeline step failures
 * - REMOTE_* / GIT_* / TAP_* : Repository conditions
 * - STATE_* : Run state persistence
 * - INPUT_* : Run inputs
 * - CONFIG_* : Configuration file
 * - INTERNAL_* : Internal errors
 */
export const ErrorCode = {
  // Tool errors (10-19)
  PREFLIGHT_MISSING_TOOL: "PREFLIGHT_MISSING_TOOL",
  AUTH_REQUIRED: "AUTH_REQUIRED",
  TOOL_COMMAND_FAILED: "TOOL_COMMAND_FAILED",

  // Step errors (20-29)
  STEP_CHECK_FAILED: "STEP_CHECK_FAILED",
  STEP_APPLY_FAILED: "STEP_APPLY_FAILED",
  STEP_VALIDATE_FAILED: "STEP_VALIDATE_FAILED",
  MISSING_DEPENDENCY: "MISSING_DEPENDENCY",

  // Repository errors (30-39)
  REMOTE_ALREADY_EXISTS: "REMOTE_ALREADY_EXISTS",
  GIT_BEHIND_REMOTE: "GIT_BEHIND_REMOTE",
  TAP_PATH_INVALID: "TAP_PATH_INVALID",

  // State errors (60-69)
  STATE_NOT_FOUND: "STATE_NOT_FOUND",
  STATE_CORRUPT: "STATE_CORRUPT",
  STATE_WRITE_FAILED: "STATE_WRITE_FAILED",

  // Input errors (70-79)
  INPUT_REQUIRED: "INPUT_REQUIRED",
  INPUT_INVALID: "INPUT_INVALID",
  INPUT_MISMATCH_ON_RESUME: "INPUT_MISMATCH_ON_RESUME",

  // Config errors (80-89)
  CONFIG_PARSE_FAILED: "CONFIG_PARSE_FAILED",
  CONFIG_INVALID: "CONFIG_INVALID",

  // Internal errors (1)
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Error Categories
// =============================================================================

/**
 * Error category for grouping related errors.
 */
export type ErrorCategory =
  | "tool"
  | "step"
  | "repository"
  | "state"
  | "input"
  | "config"
  | "internal";

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: ErrorCode): ErrorCategory {
  if (
    code.startsWith("PREFLIGHT_") ||
    code.startsWith("AUTH_") ||
    code.startsWith("TOOL_")
  )
    return "tool";
  if (code.startsWith("STEP_") || code === ErrorCode.MISSING_DEPENDENCY) return "step";
  if (code.startsWith("REMOTE_") || code.startsWith("GIT_") || code.startsWith("TAP_"))
    return "repository";
  if (code.startsWith("STATE_")) return "state";
  if (code.startsWith("INPUT_")) return "input";
  if (code.startsWith("CONFIG_")) return "config";
  return "internal";
}

/**
 * Whether an error of this code stops the run before any step executes.
 *
 * These never leave a resumable halt behind: the stored state is either
 * unreadable or was not touched.
 */
export function isPrePipelineFatal(code: ErrorCode): boolean {
  const category = getErrorCategory(code);
  return category === "state" || category === "input" || category === "config";
}

// =============================================================================
// Exit Codes
// =============================================================================

/**
 * Exit code ranges by category:
 * - 1: Internal/generic error
 * - 10-19: Tool errors
 * - 20-29: Step errors
 * - 30-39: Repository errors
 * - 60-69: State errors
 * - 70-79: Input errors
 * - 80-89: Config errors
 */
const EXIT_CODE_MAP: Record<ErrorCode, number> = {
  [ErrorCode.PREFLIGHT_MISSING_TOOL]: 10,
  [ErrorCode.AUTH_REQUIRED]: 11,
  [ErrorCode.TOOL_COMMAND_FAILED]: 12,

  [ErrorCode.STEP_CHECK_FAILED]: 20,
  [ErrorCode.STEP_APPLY_FAILED]: 21,
  [ErrorCode.STEP_VALIDATE_FAILED]: 22,
  [ErrorCode.MISSING_DEPENDENCY]: 23,

  [ErrorCode.REMOTE_ALREADY_EXISTS]: 30,
  [ErrorCode.GIT_BEHIND_REMOTE]: 31,
  [ErrorCode.TAP_PATH_INVALID]: 32,

  [ErrorCode.STATE_NOT_FOUND]: 60,
  [ErrorCode.STATE_CORRUPT]: 61,
  [ErrorCode.STATE_WRITE_FAILED]: 62,

  [ErrorCode.INPUT_REQUIRED]: 70,
  [ErrorCode.INPUT_INVALID]: 71,
  [ErrorCode.INPUT_MISMATCH_ON_RESUME]: 72,

  [ErrorCode.CONFIG_PARSE_FAILED]: 80,
  [ErrorCode.CONFIG_INVALID]: 81,

  [ErrorCode.INTERNAL_ERROR]: 1,
};

/**
 * Gets the exit code for an error code.
 */
export function getExitCode(code: ErrorCode): number {
  return EXIT_CODE_MAP[code] ?? 1;
}

/**
 * Narrows an arbitrary string to a known error code.
 */
export function isErrorCode(value: string): value is ErrorCode {
  return Object.prototype.hasOwnProperty.call(EXIT_CODE_MAP, value);
}
