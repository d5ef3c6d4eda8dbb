/**
 * Step Timer for pipeline instrumentation.
 *
 * Tracks step start/end times and emits `step.start` / `step.end` log events
 * so a run's timeline can be rebuilt from its log file.
 *
 * @module
 */

import type { ContextualLogger } from "./ContextualLogger.js";

/**
 * Timer for tracking pipeline step durations.
 *
 * @example
 * ```typescript
 * const timer = new StepTimer(logger);
 *
 * timer.start("tap-new");
 * await step.apply(ctx);
 * timer.end("tap-new", { outcome: "succeeded" });
 * ```
 */
export class StepTimer {
  private readonly logger: ContextualLogger;
  private readonly startTimes: Map<string, number> = new Map();

  constructor(logger: ContextualLogger) {
    this.logger = logger;
  }

  start(step: string, context?: Record<string, unknown>): void {
    this.startTimes.set(step, Date.now());

    this.logger
      .withContext({ step })
      .info("Step started", { event: "step.start", ...context });
  }

  /**
   * Ends timing a step. Steps that were never started are ignored.
   */
  end(step: string, context?: Record<string, unknown>): void {
    const durationMs = this.stop(step);
    if (durationMs === undefined) {
      return;
    }

    this.logger
      .withContext({ step })
      .info("Step completed", { event: "step.end", durationMs, ...context });
  }

  endWithError(step: string, error: Error, context?: Record<string, unknown>): void {
    const durationMs = this.stop(step);
    if (durationMs === undefined) {
      return;
    }

    this.logger.withContext({ step }).error("Step failed", {
      event: "step.end",
      durationMs,
      error,
      ...context,
    });
  }

  private stop(step: string): number | undefined {
    const startTime = this.startTimes.get(step);
    if (startTime === undefined) {
      return undefined;
    }
    this.startTimes.delete(step);
    return Date.now() - startTime;
  }
}
