/**
 * Progress spinner for pipeline steps.
 *
 * On a TTY the @clack/prompts spinner animates while a step runs; elsewhere
 * (CI, pipes) each start is printed once as an info line. Either way the
 * outcome of the step is printed through {@link CliUx}.
 *
 * @module
 */

import * as clack from "@clack/prompts";
import type { CliUx } from "./CliUx.js";

export interface CliSpinnerOptions {
  readonly ux: CliUx;

  /** Override TTY detection (for testing) */
  readonly isTTY?: boolean;
}

export class CliSpinner {
  private readonly ux: CliUx;
  private readonly animated: boolean;
  private clackSpinner: ReturnType<typeof clack.spinner> | null = null;
  private currentMessage = "";

  constructor(options: CliSpinnerOptions) {
    this.ux = options.ux;
    const isTTY = options.isTTY ?? process.stdout.isTTY ?? false;
    // No animation when output is suppressed
    this.animated = isTTY && options.ux.level !== "silent";
  }

  start(message: string): void {
    this.currentMessage = message;

    if (this.animated) {
      this.clackSpinner = clack.spinner();
      this.clackSpinner.start(message);
    } else {
      this.ux.info(message);
    }
  }

  succeed(message?: string): void {
    this.halt();
    this.ux.success(message ?? this.currentMessage);
  }

  fail(message?: string): void {
    this.halt();
    this.ux.error(message ?? this.currentMessage);
  }

  /**
   * Stops without printing an outcome.
   */
  stop(): void {
    this.halt();
  }

  private halt(): void {
    if (this.clackSpinner) {
      this.clackSpinner.stop();
      this.clackSpinner = null;
    }
  }
}

export function createCliSpinner(options: CliSpinnerOptions): CliSpinner {
  return new CliSpinner(options);
}
