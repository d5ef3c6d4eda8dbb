/**
 * Error presentation for CLI output.
 *
 * Renders TapError (and anything else thrown) as:
 *
 * ```
 * Error [STATE_NOT_FOUND]: Run 1234 not found
 *
 * Run Id: 1234
 *
 * Hint:
 *   List known runs with: tapforge runs list
 * ```
 *
 * Stack traces and causes are only included with `--debug`.
 *
 * @module
 */

import { TapError } from "../../core/errors/errors.js";
import { ErrorCode, getExitCode } from "../../core/errors/ErrorCode.js";

export interface FormatErrorOptions {
  /** Include stack traces and the cause (default: false) */
  readonly debug?: boolean;
}

export interface ErrorPresenterOptions {
  /** Line writer (default: console.error) */
  readonly output?: (line: string) => void;
  readonly debug?: boolean;
}

export class ErrorPresenter {
  private readonly output: (line: string) => void;
  private readonly debug: boolean;

  constructor(options: ErrorPresenterOptions = {}) {
    this.output = options.output ?? console.error;
    this.debug = options.debug ?? false;
  }

  /**
   * Prints the error and returns the exit code it maps to.
   */
  present(error: unknown): number {
    const tapError = normalizeError(error);
    for (const line of formatError(tapError, { debug: this.debug }).split("\n")) {
      this.output(line);
    }
    return getExitCode(tapError.code);
  }
}

/**
 * Formats an error for CLI output. Non-TapError values become INTERNAL_ERROR.
 */
export function formatError(error: unknown, options: FormatErrorOptions = {}): string {
  const tapError = normalizeError(error);
  const lines: string[] = [`Error [${tapError.code}]: ${tapError.message}`, ""];

  const detailLines = formatDetails(tapError.details ?? {});
  if (detailLines.length > 0) {
    lines.push(...detailLines, "");
  }

  if (tapError.hint) {
    lines.push("Hint:");
    lines.push(...tapError.hint.split("\n").map((line) => `  ${line}`));
    lines.push("");
  }

  if (options.debug) {
    if (tapError.stack) {
      lines.push("Stack trace:", ...tapError.stack.split("\n").slice(1), "");
    }
    if (tapError.cause) {
      lines.push("Caused by:", `  ${tapError.cause.message}`);
      if (tapError.cause.stack) {
        lines.push(...tapError.cause.stack.split("\n").slice(1));
      }
      lines.push("");
    }
  }

  return lines.join("\n").trimEnd();
}

export function normalizeError(error: unknown): TapError {
  if (error instanceof TapError) {
    return error;
  }

  const cause = error instanceof Error ? error : undefined;
  const tapError = new TapError(
    cause ? cause.message : String(error),
    ErrorCode.INTERNAL_ERROR,
    undefined,
    undefined,
    cause,
    false,
  );
  if (cause?.stack) {
    tapError.stack = cause.stack;
  }
  return tapError;
}

function formatDetails(details: Record<string, unknown>): string[] {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(details)) {
    if (value === undefined) {
      continue;
    }
    if (Array.isArray(value)) {
      if (value.length > 0) {
        lines.push(`${formatKey(key)}:`, ...value.map((item) => `  - ${String(item)}`));
      }
    } else if (typeof value === "object" && value !== null) {
      lines.push(`${formatKey(key)}: ${JSON.stringify(value)}`);
    } else {
      lines.push(`${formatKey(key)}: ${String(value)}`);
    }
  }

  return lines;
}

/**
 * `repoUrl` becomes `Repo Url`.
 */
function formatKey(key: string): string {
  return key
    .replace(/([A-Z])/g, " $1")
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
