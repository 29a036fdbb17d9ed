import { TRACE_HEADER_KEY } from '@arbor-trace/recorder'
import type { TraceHeader } from '@arbor-trace/recorder'
import type { TracingSpanContext } from './types.js'

export interface TraceHeaderSource {
  traceHeader: () => TraceHeader
}

/**
 * Identity and baggage of a span. Baggage is copied on construction, so a
 * child seeded from its parent's baggage never shares the parent's map.
 */
export class SpanContext implements TracingSpanContext {
  private readonly baggage: Map<string, string>

  constructor(
    private readonly spanId: string,
    baggage: Iterable<[string, string]> = [],
    private readonly headerSource?: TraceHeaderSource,
  ) {
    this.baggage = new Map(baggage)
  }

  toSpanId(): string {
    return this.spanId
  }

  /**
   * The trace header of the owning entity, falling back to a header carried
   * in baggage under `X-Amzn-Trace-Id`.
   */
  toTraceId(): string | undefined {
    return (
      this.headerSource?.traceHeader().toString() ??
      this.baggage.get(TRACE_HEADER_KEY)
    )
  }

  baggageItems(): IterableIterator<[string, string]> {
    return this.baggage.entries()
  }

  getBaggageItem(key: string): string | undefined {
    return this.baggage.get(key)
  }

  setBaggageItem(key: string, value: string): void {
    this.baggage.set(key, value)
  }
}
