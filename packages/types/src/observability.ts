import type { SpanId, TraceId } from "./foundational.js";

/**
 * Attached to every bus event. One trace per chat turn; every tool call and
 * completion inside the turn gets its own span.
 *
 * Compatible with OpenTelemetry W3C Trace Context.
 */
export interface TraceContext {
  /** Unique per top-level user request. All descendant spans share this. */
  readonly traceId: TraceId;
  /** Unique per event/operation. */
  readonly spanId: SpanId;
  /** The span that caused this event. Absent for root spans. */
  readonly parentSpanId?: SpanId;
}
