import { PlugscanError } from "./base.js";

/**
 * Wraps anything unexpected that escaped the engine, so that callers still
 * receive a typed failure and can fall back.
 */
export class InternalError extends PlugscanError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;

  constructor(message: string, metadata?: Record<string, string>, options?: { cause?: unknown }) {
    super(message, metadata, options);
  }
}
