import { AsyncLocalStorage } from 'node:async_hooks'
import { Span } from './span.js'
import type { Entity, Logger, Recorder } from '@arbor-trace/recorder'
import type { TracingSpan } from './types.js'

// Objects made with Object.create(null) have no constructor to name
function describeValue(value: object): string {
  const prototype: object | null = Object.getPrototypeOf(value)
  if (
    prototype !== null &&
    `constructor` in prototype &&
    typeof prototype.constructor === `function` &&
    prototype.constructor.name
  ) {
    return prototype.constructor.name
  }
  return `an object without a prototype`
}

/**
 * Marks a span as active until closed. Scopes form a stack through their
 * `previous` links; closing one makes its predecessor active again.
 *
 * Scopes are expected to close in reverse order of activation. Closing them
 * out of order is not detected and leaves the older scope's predecessor
 * active.
 */
export class Scope {
  constructor(
    private readonly manager: ScopeManager,
    readonly previous: Scope | null,
    private readonly activeSpan: Span,
    readonly finishSpanOnClose: boolean,
  ) {}

  span(): Span {
    return this.activeSpan
  }

  close(): void {
    if (this.finishSpanOnClose) {
      this.activeSpan.finish()
    }
    this.manager.setCurrentScope(this.previous)
  }
}

interface ScopeSlot {
  scope: Scope | null
}

/**
 * Tracks the active scope per async context and keeps the recorder's
 * current entity pointing at the active span's entity.
 *
 * All changes to the recorder's current entity made by the tracer go through
 * this class.
 */
export class ScopeManager {
  private readonly storage = new AsyncLocalStorage<ScopeSlot>()
  private readonly rootSlot: ScopeSlot = { scope: null }

  constructor(
    private readonly recorder: Recorder,
    private readonly logger: Logger = console,
  ) {}

  active(): Scope | null {
    return this.slot().scope
  }

  activeSpan(): Span | null {
    return this.active()?.span() ?? null
  }

  /**
   * Makes `span` the active span. Anything other than a `Span` from this
   * package cannot be activated: a warning is logged and the current scope
   * is returned unchanged.
   */
  activate(
    span: TracingSpan | null | undefined,
    finishSpanOnClose = false,
  ): Scope | null {
    if (!(span instanceof Span)) {
      if (span) {
        this.logger.warn(
          `[ScopeManager] Cannot activate span: expected a Span but got ${describeValue(span)}`,
        )
      }
      return this.active()
    }
    return this.activateSpan(span, finishSpanOnClose)
  }

  activateSpan(span: Span, finishSpanOnClose = false): Scope {
    const scope = new Scope(this, this.active(), span, finishSpanOnClose)
    this.setCurrentScope(scope)
    return scope
  }

  /** @internal Used by `Scope.close` */
  setCurrentScope(scope: Scope | null): void {
    this.slot().scope = scope
    this.recorder.setTraceEntity(scope ? scope.span().entity : null)
  }

  /**
   * Runs `fn` with `entity` installed as the recorder's current entity, then
   * puts the previous one back.
   */
  withTraceEntity<T>(entity: Entity | null, fn: () => T): T {
    const original = this.recorder.getTraceEntity()
    this.recorder.setTraceEntity(entity)
    try {
      return fn()
    } finally {
      this.recorder.setTraceEntity(original)
    }
  }

  /**
   * Runs `fn` in a new async context that starts with the caller's active
   * scope and entity. Activations inside `fn` are not seen by the caller.
   */
  fork<T>(fn: () => T): T {
    return this.recorder.runInContext(() =>
      this.storage.run({ scope: this.active() }, fn),
    )
  }

  private slot(): ScopeSlot {
    return this.storage.getStore() ?? this.rootSlot
  }
}
