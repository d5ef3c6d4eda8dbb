/**
 * Terminal output for tapforge commands.
 *
 * Colors come from picocolors and are only used on a TTY. Output levels:
 * `silent` (errors only), `info`, `verbose`, `debug`.
 *
 * @module
 */

import pc from "picocolors";

// =============================================================================
// Types
// =============================================================================

export type OutputLevel = "silent" | "info" | "verbose" | "debug";

export interface CliUxOptions {
  readonly level: OutputLevel;

  /** Use colors (default: stdout is a TTY) */
  readonly colors?: boolean;

  /** stdout writer (for testing) */
  readonly stdout?: (msg: string) => void;

  /** stderr writer (for testing) */
  readonly stderr?: (msg: string) => void;
}

export interface ErrorDetails {
  readonly code?: string;
  readonly hint?: string;
}

/**
 * Marker shown in front of a step line.
 */
export type StepMark = "done" | "skipped" | "failed" | "pending" | "planned";

// =============================================================================
// Constants
// =============================================================================

const LEVEL_ORDER: Record<OutputLevel, number> = {
  silent: 0,
  info: 1,
  verbose: 2,
  debug: 3,
};

const SYMBOLS = {
  success: "✓",
  error: "✗",
  warning: "⚠",
  info: "→",
};

const STEP_MARKS: Record<StepMark, string> = {
  done: "✓",
  skipped: "↷",
  failed: "✗",
  pending: "·",
  planned: "○",
};

// =============================================================================
// CliUx
// =============================================================================

/**
 * @example
 * ```typescript
 * const ux = createCliUx({ level: "info" });
 * ux.success("Run completed");
 * ux.stepLine("skipped", "tap-new", "already done");
 * ux.error("Repository exists", { code: "REMOTE_ALREADY_EXISTS", hint: "Pick another name" });
 * ```
 */
export class CliUx {
  readonly level: OutputLevel;
  private readonly useColors: boolean;
  private readonly writeStdout: (msg: string) => void;
  private readonly writeStderr: (msg: string) => void;

  constructor(options: CliUxOptions) {
    this.level = options.level;
    this.useColors = options.colors ?? process.stdout.isTTY ?? false;
    this.writeStdout = options.stdout ?? ((msg) => process.stdout.write(msg));
    this.writeStderr = options.stderr ?? ((msg) => process.stderr.write(msg));
  }

  private canLog(level: OutputLevel): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  private paint(color: (text: string) => string, text: string): string {
    return this.useColors ? color(text) : text;
  }

  success(message: string): void {
    if (!this.canLog("info")) return;
    this.writeStdout(`${this.paint(pc.green, SYMBOLS.success)} ${message}\n`);
  }

  /**
   * Always shown, whatever the level.
   */
  error(message: string, details?: ErrorDetails): void {
    const code = details?.code ? `${this.paint(pc.red, details.code)}: ` : "";
    this.writeStderr(`${this.paint(pc.red, SYMBOLS.error)} ${code}${message}\n`);

    if (details?.hint) {
      this.writeStderr(`  ${this.paint(pc.dim, "Hint:")} ${details.hint}\n`);
    }
  }

  /**
   * Writes raw lines to stderr; used for multi-line error reports.
   */
  errorLines(lines: readonly string[]): void {
    for (const line of lines) {
      this.writeStderr(`${line}\n`);
    }
  }

  warn(message: string): void {
    if (!this.canLog("info")) return;
    this.writeStderr(`${this.paint(pc.yellow, SYMBOLS.warning)} ${message}\n`);
  }

  info(message: string): void {
    if (!this.canLog("info")) return;
    this.writeStdout(`${this.paint(pc.cyan, SYMBOLS.info)} ${message}\n`);
  }

  verbose(message: string): void {
    if (!this.canLog("verbose")) return;
    this.writeStdout(`  ${this.paint(pc.dim, message)}\n`);
  }

  debug(message: string): void {
    if (!this.canLog("debug")) return;
    this.writeStdout(`  ${this.paint(pc.dim, `[debug] ${message}`)}\n`);
  }

  detail(message: string): void {
    if (!this.canLog("info")) return;
    this.writeStdout(`  ${message}\n`);
  }

  /**
   * Writes a line as is.
   */
  print(line: string): void {
    if (!this.canLog("info")) return;
    this.writeStdout(`${line}\n`);
  }

  header(title: string): void {
    if (!this.canLog("info")) return;
    this.writeStdout(`\n${this.paint(pc.bold, title)}\n`);
  }

  /**
   * One pipeline step: `  ✓ tap-new  already done`.
   */
  stepLine(mark: StepMark, name: string, note?: string): void {
    if (!this.canLog("info")) return;

    const colors: Record<StepMark, (text: string) => string> = {
      done: pc.green,
      skipped: pc.cyan,
      failed: pc.red,
      pending: pc.dim,
      planned: pc.yellow,
    };
    const suffix = note ? `  ${this.paint(pc.dim, note)}` : "";
    this.writeStdout(`  ${this.paint(colors[mark], STEP_MARKS[mark])} ${name.padEnd(12)}${suffix}\n`);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCliUx(options: CliUxOptions): CliUx {
  return new CliUx(options);
}

let defaultInstance: CliUx | null = null;

/**
 * Gets or creates the process-wide instance.
 */
export function getCliUx(): CliUx {
  if (!defaultInstance) {
    defaultInstance = createCliUx({ level: "info" });
  }
  return defaultInstance;
}

export function setDefaultCliUx(ux: CliUx): void {
  defaultInstance = ux;
}

// =============================================================================
// Level parsing
// =============================================================================

export interface OutputLevelFlags {
  readonly verbose: boolean;
  readonly debug: boolean;
  readonly silent: boolean;
}

/**
 * `--debug` wins over `--silent`, which wins over `--verbose`.
 */
export function parseOutputLevel(flags: OutputLevelFlags): OutputLevel {
  if (flags.debug) {
    return "debug";
  }
  if (flags.silent) {
    return "silent";
  }
  if (flags.verbose) {
    return "verbose";
  }
  return "info";
}
