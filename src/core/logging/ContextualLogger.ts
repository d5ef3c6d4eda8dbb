/**
 * Contextual Logger with structured output.
 *
 * Provides structured logging with:
 * - Automatic context enrichment (runId, step, timestamp)
 * - Child loggers via withContext()
 * - Level filtering
 * - Error handling with TapError support
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { TapError } from "../errors/errors.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * A structured log entry.
 */
export interface LogEntry {
  /** ISO timestamp */
  ts: string;

  /** Log level */
  level: LogLevel;

  /** Log message */
  msg: string;

  /** Run identifier */
  runId?: string;

  /** Current pipeline step */
  step?: string;

  /** Error code (if logging an error) */
  errorCode?: string;

  /** Error message (if logging an error) */
  errorMessage?: string;

  /** Stack trace (debug mode only) */
  stack?: string;

  /** Error cause message (debug mode only) */
  cause?: string;

  /** Additional context fields */
  [key: string]: unknown;
}

/**
 * Log sink interface for output.
 */
export interface LogSink {
  write(entry: LogEntry): void;
}

/**
 * Context that can be bound to a logger.
 */
export interface LogContext {
  runId?: string;
  step?: string;
  [key: string]: unknown;
}

/**
 * Options for creating a logger.
 */
export interface CreateLoggerOptions {
  /** Output sink */
  sink: LogSink;

  /** Minimum log level (default: "info") */
  minLevel?: LogLevel;

  /** Include debug details (stack, cause) */
  debug?: boolean;

  /** Initial context */
  context?: LogContext;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

// =============================================================================
// Sinks
// =============================================================================

/**
 * Appends JSON lines to a file, creating its directory on first write.
 */
export class FileJsonSink implements LogSink {
  private ensured = false;

  constructor(private readonly filePath: string) {}

  write(entry: LogEntry): void {
    if (!this.ensured) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.ensured = true;
    }
    fs.appendFileSync(this.filePath, JSON.stringify(entry) + "\n", "utf-8");
  }
}

/**
 * Keeps entries in memory.
 */
export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }
}

/**
 * Discards every entry.
 */
export const nullSink: LogSink = {
  write: () => undefined,
};

// =============================================================================
// ContextualLogger Class
// =============================================================================

/**
 * Structured logger with context binding.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ sink: new FileJsonSink(logPath) });
 * const stepLogger = logger.withContext({ runId: "abc", step: "tap-new" });
 * stepLogger.info("Tap scaffolded", { tapPath });
 * ```
 */
export class ContextualLogger {
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;
  private readonly debugMode: boolean;
  private readonly context: LogContext;

  constructor(options: CreateLoggerOptions) {
    this.sink = options.sink;
    this.minLevel = options.minLevel ?? "info";
    this.debugMode = options.debug ?? false;
    this.context = options.context ?? {};
  }

  /**
   * Creates a child logger with additional context.
   *
   * @param ctx - Context to add
   * @returns New logger with merged context
   */
  withContext(ctx: LogContext): ContextualLogger {
    return new ContextualLogger({
      sink: this.sink,
      minLevel: this.minLevel,
      debug: this.debugMode,
      context: { ...this.context, ...ctx },
    });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.log("debug", msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.log("info", msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.log("warn", msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.log("error", msg, ctx);
  }

  private log(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
    };

    if (this.context.runId) {
      entry.runId = this.context.runId;
    }
    if (this.context.step) {
      entry.step = this.context.step;
    }

    for (const [key, value] of Object.entries(this.context)) {
      if (key !== "runId" && key !== "step" && value !== undefined) {
        entry[key] = value;
      }
    }

    if (ctx) {
      for (const [key, value] of Object.entries(ctx)) {
        if (key === "error" && value instanceof Error) {
          this.enrichWithError(entry, value);
        } else if (value !== undefined) {
          entry[key] = value;
        }
      }
    }

    this.sink.write(entry);
  }

  private enrichWithError(entry: LogEntry, error: Error): void {
    if (error instanceof TapError) {
      entry.errorCode = error.code;
    }
    entry.errorMessage = error.message;

    if (!this.debugMode) {
      return;
    }
    if (error.stack) {
      entry.stack = error.stack;
    }
    if (error instanceof TapError && error.cause) {
      entry.cause = error.cause.message;
    }
  }
}

/**
 * Creates a new contextual logger.
 */
export function createLogger(options: CreateLoggerOptions): ContextualLogger {
  return new ContextualLogger(options);
}
