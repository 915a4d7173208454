import { ERROR_CATALOG, type ErrorCode, type ErrorDomain, type ErrorSeverity } from "./catalog.js";

/**
 * JSON shape produced by `PlugscanError.toJSON()`.
 */
export interface ErrorJSON {
  readonly _tag: string;
  readonly name: string;
  readonly code: ErrorCode;
  readonly message: string;
  readonly domain: ErrorDomain;
  readonly severity: ErrorSeverity;
  readonly triggersFallback: boolean;
  readonly metadata: Readonly<Record<string, string>>;
  readonly timestamp: string;
}

/**
 * Root of the plugscan error hierarchy.
 *
 * Subclasses pin `_tag` and `code`; everything else (domain, severity,
 * fallback behaviour) is read from the catalog entry for that code.
 */
export abstract class PlugscanError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;

  /** String-only context for logs and wire formats */
  readonly metadata: Readonly<Record<string, string>>;
  readonly timestamp: Date;

  constructor(message: string, metadata?: Record<string, string>, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.metadata = Object.freeze({ ...metadata });
    this.timestamp = new Date();
  }

  get domain(): ErrorDomain {
    return ERROR_CATALOG[this.code].domain;
  }

  get severity(): ErrorSeverity {
    return ERROR_CATALOG[this.code].severity;
  }

  get triggersFallback(): boolean {
    return ERROR_CATALOG[this.code].triggersFallback;
  }

  get isExpected(): boolean {
    return ERROR_CATALOG[this.code].isExpected;
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      severity: this.severity,
      triggersFallback: this.triggersFallback,
      metadata: this.metadata,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

export function isPlugscanError(error: unknown): error is PlugscanError {
  return error instanceof PlugscanError;
}
