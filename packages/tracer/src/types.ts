import type { TagValue } from './tags.js'

/**
 * Read-only view of a span context. Contexts from other tracer
 * implementations can be used as parents through this interface.
 */
export interface TracingSpanContext {
  /** The trace header for this position in the trace, when known */
  toTraceId: () => string | undefined
  toSpanId: () => string
  baggageItems: () => Iterable<[string, string]>
}

/**
 * The part of a span that application code relies on. `Span` is the only
 * implementation that can be activated or used as a live parent.
 */
export interface TracingSpan {
  context: () => TracingSpanContext
  setTag: (key: string, value: TagValue) => TracingSpan
  setBaggageItem: (key: string, value: string) => TracingSpan
  getBaggageItem: (key: string) => string | undefined
  finish: (timestampMicros?: number) => void
}

/**
 * A value logged with `span.log`. Errors under `error.object` are recorded
 * as exceptions on the entity; anywhere else they are stored as text.
 * Nested records and arrays are stored with their structure intact.
 */
export type LogFieldValue = TagValue | Error | Array<LogFieldValue> | LogRecord

export type LogRecord = { [key: string]: LogFieldValue }
