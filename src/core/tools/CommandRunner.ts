/**
 * Command Runner - invokes external tools as subprocesses.
 *
 * Every call resolves to a structured {@link CommandResult} (exit code,
 * stdout, stderr). Non-zero exits never throw here; callers decide what a
 * failure means. Steps depend on the {@link CommandRunner} interface only, so
 * tests substitute a scripted fake.
 *
 * Calls are awaited one at a time by the pipeline and carry no timeout: a
 * hanging tool hangs the run, which the operator can interrupt and resume.
 *
 * @module
 */

import { execa, type Options as ExecaOptions } from "execa";
import { TapError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

export interface RunCommandOptions {
  /** Working directory (default: current directory) */
  readonly cwd?: string;

  /** Variables merged over the current environment */
  readonly env?: Record<string, string>;

  /** Inherit the terminal instead of capturing output */
  readonly interactive?: boolean;
}

export interface CommandResult {
  /** The command line, for messages */
  readonly command: string;

  /** Exit code (0 for success) */
  readonly exitCode: number;

  /** Captured stdout, trimmed of the trailing newline */
  readonly stdout: string;

  /** Captured stderr, trimmed of the trailing newline */
  readonly stderr: string;

  /** Duration in milliseconds */
  readonly durationMs: number;

  /** True when the executable could not be started (e.g. not on PATH) */
  readonly spawnFailed: boolean;
}

export interface CommandRunner {
  run(file: string, args: readonly string[], options?: RunCommandOptions): Promise<CommandResult>;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * One-line description of a failed command for error messages.
 */
export function describeFailure(result: CommandResult): string {
  if (result.spawnFailed) {
    return `${result.command}: could not be started`;
  }
  const firstLine = (result.stderr || result.stdout).split("\n")[0]?.trim();
  return firstLine
    ? `${result.command} exited with code ${result.exitCode}: ${firstLine}`
    : `${result.command} exited with code ${result.exitCode}`;
}

/**
 * Throws TOOL_COMMAND_FAILED unless the command exited with 0.
 */
export function expectSuccess(result: CommandResult, hint?: string): CommandResult {
  if (result.exitCode === 0 && !result.spawnFailed) {
    return result;
  }

  throw new TapError(
    describeFailure(result),
    ErrorCode.TOOL_COMMAND_FAILED,
    {
      command: result.command,
      exitCode: result.exitCode,
      stderr: result.stderr || undefined,
    },
    hint ?? `Run the command manually to debug: ${result.command}`,
  );
}

/**
 * Converts the shapes execa may return for an output stream to text.
 */
function outputToString(output: unknown): string {
  if (typeof output === "string") return output;
  if (Array.isArray(output)) return output.map(String).join("\n");
  if (output instanceof Uint8Array) return Buffer.from(output).toString("utf-8");
  return "";
}

// =============================================================================
// ExecaCommandRunner
// =============================================================================

/**
 * {@link CommandRunner} backed by execa.
 *
 * @example
 * ```typescript
 * const commands = new ExecaCommandRunner();
 * const result = await commands.run("brew", ["--repository"]);
 * if (result.exitCode === 0) {
 *   console.log(result.stdout);
 * }
 * ```
 */
export class ExecaCommandRunner implements CommandRunner {
  async run(
    file: string,
    args: readonly string[],
    options: RunCommandOptions = {},
  ): Promise<CommandResult> {
    const command = [file, ...args].join(" ");
    const startTime = Date.now();

    const execaOptions: ExecaOptions = {
      cwd: options.cwd,
      env: options.env,
      stdin: options.interactive ? "inherit" : "ignore",
      stdout: options.interactive ? "inherit" : "pipe",
      stderr: options.interactive ? "inherit" : "pipe",
      // Non-zero exits are reported, not thrown
      reject: false,
    };

    try {
      const result = await execa(file, [...args], execaOptions);
      const spawnFailed = result.failed && result.exitCode === undefined;

      return {
        command,
        exitCode: result.exitCode ?? (result.failed ? 1 : 0),
        stdout: outputToString(result.stdout).trim(),
        stderr: outputToString(result.stderr).trim(),
        durationMs: Date.now() - startTime,
        spawnFailed,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);

      return {
        command,
        exitCode: 1,
        stdout: "",
        stderr: message,
        durationMs: Date.now() - startTime,
        spawnFailed: true,
      };
    }
  }
}
