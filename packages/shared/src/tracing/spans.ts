/**
 * Tracing span helpers — typed wrappers around the OpenTelemetry API.
 *
 * These helpers keep instrumentation call-sites concise and ensure
 * consistent attribute naming across the codebase.
 */

import { type Attributes, type Span, SpanStatusCode, trace } from "@opentelemetry/api"

// ──────────────────────────────────────────────────
// Semantic Attribute Constants
// ──────────────────────────────────────────────────

export const WardenAttributes = {
  PLAN_ID: "warden.plan.id",
  TASK_ID: "warden.task.id",
  TASK_ATTEMPT: "warden.task.attempt",
  ACTION_KIND: "warden.action.kind",
  RISK_TIER: "warden.risk.tier",
  CONFIRMATION_ID: "warden.confirmation.id",
  CONFIRMATION_STATUS: "warden.confirmation.status",
  CONFIRMATION_TIMEOUT_MS: "warden.confirmation.timeout_ms",
  ERROR_CODE: "warden.error.code",
} as const

// ──────────────────────────────────────────────────
// Tracer
// ──────────────────────────────────────────────────

const TRACER_NAME = "warden"

function getTracer() {
  return trace.getTracer(TRACER_NAME)
}

// ──────────────────────────────────────────────────
// withSpan
// ──────────────────────────────────────────────────

/**
 * Execute an async function inside a new active span.
 *
 * On success the span ends with OK status; on error it records the
 * exception and sets ERROR status before re-throwing.
 *
 * ```ts
 * const outcome = await withSpan("warden.confirmation.request", async (span) => {
 *   span.setAttribute(WardenAttributes.RISK_TIER, tier)
 *   // ... instrumented work
 * })
 * ```
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span) => Promise<T>,
  attributes?: Attributes,
): Promise<T> {
  return getTracer().startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span)
      span.setStatus({ code: SpanStatusCode.OK })
      return result
    } catch (err) {
      span.setStatus({
        code: SpanStatusCode.ERROR,
        message: err instanceof Error ? err.message : String(err),
      })
      if (err instanceof Error) {
        span.recordException(err)
      }
      throw err
    } finally {
      span.end()
    }
  })
}

// ──────────────────────────────────────────────────
// Utility
// ──────────────────────────────────────────────────

/** Trace and span id of the active span, for log correlation. */
export function activeTraceIds(): { traceId: string; spanId: string } | undefined {
  const span = trace.getActiveSpan()
  if (!span) return undefined
  const ctx = span.spanContext()
  return { traceId: ctx.traceId, spanId: ctx.spanId }
}

/** Record an event (log-style annotation) on the current active span. */
export function addSpanEvent(name: string, attributes?: Attributes): void {
  const span = trace.getActiveSpan()
  if (span) {
    span.addEvent(name, attributes)
  }
}
