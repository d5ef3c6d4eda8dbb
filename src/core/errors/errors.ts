import type { ErrorCode } from "./ErrorCode.js";

export class TapError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
    public readonly hint?: string,
    public readonly cause?: Error,
    public readonly isOperational: boolean = true,
  ) {
    super(message);
    this.name = "TapError";
  }
}

/**
 * Wraps a caught value as an Error suitable for the `cause` slot.
 */
export function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
