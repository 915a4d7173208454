/**
 * Span helper for discovery runs.
 *
 * Wraps OpenTelemetry's tracer.startActiveSpan with attribute setting,
 * error recording, and span ending. With no tracer provider registered the
 * API hands out no-op spans.
 */

import { type Attributes, type Span, SpanStatusCode, trace } from "@opentelemetry/api";

const TRACER_NAME = "plugscan";

/**
 * Execute a synchronous function within a named span.
 *
 * - Sets provided attributes on the span
 * - Records exceptions and sets ERROR status when fn throws
 * - Always ends the span
 *
 * `fn` receives the span so it can add attributes derived from its result.
 */
export function withSpan<T>(name: string, attributes: Attributes, fn: (span: Span) => T): T {
  const tracer = trace.getTracer(TRACER_NAME);
  return tracer.startActiveSpan(name, { attributes }, (span) => {
    try {
      return fn(span);
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      span.end();
    }
  });
}
