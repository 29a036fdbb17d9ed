import { PropagationUnsupportedError } from './errors.js'
import { ScopeManager } from './scope.js'
import { SpanBuilder } from './span-builder.js'
import type { Logger, Recorder } from '@arbor-trace/recorder'
import type { Scope } from './scope.js'
import type { Span } from './span.js'
import type { Format } from './tags.js'
import type { TracingSpan, TracingSpanContext } from './types.js'

export interface TracerOptions {
  /** Defaults to the recorder's logger */
  logger?: Logger
}

/**
 * Entry point for instrumented code: builds spans on top of a `Recorder`
 * and tracks which span is active.
 */
export class Tracer {
  private readonly scopes: ScopeManager
  private readonly logger: Logger

  constructor(
    readonly recorder: Recorder,
    options: TracerOptions = {},
  ) {
    this.logger = options.logger ?? recorder.logger
    this.scopes = new ScopeManager(recorder, this.logger)
  }

  buildSpan(operationName: string): SpanBuilder {
    return new SpanBuilder(operationName, this.recorder, this.scopes, this.logger)
  }

  scopeManager(): ScopeManager {
    return this.scopes
  }

  activeSpan(): Span | null {
    return this.scopes.activeSpan()
  }

  activateSpan(
    span: TracingSpan | null | undefined,
    finishSpanOnClose = false,
  ): Scope | null {
    return this.scopes.activate(span, finishSpanOnClose)
  }

  /**
   * Runs `fn` as a separate line of work: it starts with the caller's active
   * span, and spans it activates stay out of the caller's view.
   */
  fork<T>(fn: () => T): T {
    return this.scopes.fork(fn)
  }

  /**
   * Not supported: propagate the trace header (`X-Amzn-Trace-Id`) instead.
   */
  inject(
    _spanContext: TracingSpanContext,
    _format: Format,
    _carrier: unknown,
  ): never {
    throw new PropagationUnsupportedError(`inject`)
  }

  /**
   * Not supported: pass a context carrying the trace header in its baggage
   * to `asChildOf` instead.
   */
  extract(_format: Format, _carrier: unknown): never {
    throw new PropagationUnsupportedError(`extract`)
  }
}
