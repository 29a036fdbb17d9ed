import { TraceHeader, Subsegment, nowSeconds } from '@arbor-trace/recorder'
import type { Entity, FacadeSegment, Logger, Recorder } from '@arbor-trace/recorder'
import { Span } from './span.js'
import { SpanContext } from './span-context.js'
import { REFERENCE_CHILD_OF } from './tags.js'
import type { Scope, ScopeManager } from './scope.js'
import type { TagValue, TagValueOf, TypedTag } from './tags.js'
import type { TracingSpan, TracingSpanContext } from './types.js'

interface ParentReference {
  context: TracingSpanContext
  /** Set when the parent is a live span in this process */
  span?: Span
}

function isTracingSpan(
  value: TracingSpan | TracingSpanContext,
): value is TracingSpan {
  return `finish` in value
}

/**
 * Collects the settings of a span before it starts.
 *
 * A builder belongs to the code that created it: it keeps plain mutable
 * state and must not be shared between tasks that run concurrently.
 */
export class SpanBuilder {
  private readonly tags: Array<[string, TagValue]> = []
  private readonly references = new Map<string, ParentReference>()
  private startTimestampSeconds: number | undefined
  private ignoreActive = false
  private sendStart = false

  constructor(
    private readonly operationName: string,
    private readonly recorder: Recorder,
    private readonly scopes: ScopeManager,
    private readonly logger: Logger = console,
  ) {}

  withTag(key: string, value: TagValue): this
  withTag<TTag extends TypedTag>(tag: TTag, value: TagValueOf<TTag>): this
  withTag(keyOrTag: string | TypedTag, value: TagValue): this {
    const key = typeof keyOrTag === `string` ? keyOrTag : keyOrTag.key
    this.tags.push([key, value])
    return this
  }

  /**
   * Only `child_of` references affect the new span; others are dropped
   * with a warning when the span starts.
   */
  addReference(referenceType: string, referencedContext: TracingSpanContext): this {
    return this.putReference(referenceType, { context: referencedContext })
  }

  /**
   * Parents the new span explicitly, overriding the active span. A live
   * `Span` becomes the direct parent; a bare context (for example one
   * carried in from another process) is represented by a facade segment.
   */
  asChildOf(parent: TracingSpanContext | TracingSpan | null | undefined): this {
    if (!parent) return this
    if (parent instanceof Span) {
      return this.putReference(REFERENCE_CHILD_OF, {
        context: parent.context(),
        span: parent,
      })
    }
    return this.addReference(
      REFERENCE_CHILD_OF,
      isTracingSpan(parent) ? parent.context() : parent,
    )
  }

  ignoreActiveSpan(): this {
    this.ignoreActive = true
    return this
  }

  /**
   * Transmits the in-progress entity as soon as the span starts, instead of
   * only once its whole tree is finished.
   */
  sendOnStart(): this {
    this.sendStart = true
    return this
  }

  withStartTimestamp(microseconds: number): this {
    this.startTimestampSeconds = microseconds / 1000 / 1000
    return this
  }

  start(): Span {
    for (const referenceType of this.references.keys()) {
      if (referenceType !== REFERENCE_CHILD_OF) {
        this.logger.warn(
          `[SpanBuilder] Ignoring reference of type '${referenceType}': only child_of references are supported`,
        )
      }
    }

    const explicitParent = this.references.get(REFERENCE_CHILD_OF)
    let parentEntity: Entity | null
    let parentBaggage = new Map<string, string>()

    if (explicitParent?.span) {
      parentEntity = explicitParent.span.entity
      parentBaggage = new Map(explicitParent.context.baggageItems())
    } else if (explicitParent) {
      parentBaggage = new Map(explicitParent.context.baggageItems())
      parentEntity = this.createFacadeParent(explicitParent.context)
    } else if (this.ignoreActive) {
      parentEntity = null
    } else {
      parentEntity = this.recorder.getTraceEntity()
    }

    // The recorder parents new entities to its current entity, so borrow
    // that slot for the duration of the call
    const entity = this.scopes.withTraceEntity(parentEntity, () =>
      parentEntity === null && !this.recorder.resolveHostContext()
        ? this.recorder.beginSegment(this.operationName)
        : this.recorder.beginSubsegment(this.operationName),
    )

    entity.inProgress = true
    entity.startTime = this.startTimestampSeconds ?? nowSeconds()

    const span = new Span(
      entity,
      new SpanContext(entity.id, parentBaggage, entity),
      this.logger,
    )
    for (const [key, value] of this.tags) {
      span.setTag(key, value)
    }

    if (this.sendStart) {
      if (entity instanceof Subsegment) {
        this.recorder.sendSubsegment(entity)
      } else {
        this.recorder.sendSegment(entity)
      }
    }

    return span
  }

  startActive(finishSpanOnClose = false): Scope {
    return this.scopes.activateSpan(this.start(), finishSpanOnClose)
  }

  private putReference(referenceType: string, reference: ParentReference): this {
    if (this.references.has(referenceType)) {
      this.logger.warn(
        `[SpanBuilder] Replacing reference of type '${referenceType}': a span can only have one parent`,
      )
    }
    this.references.set(referenceType, reference)
    return this
  }

  /**
   * Stands in for a parent that lives outside this process, or whose span
   * object is not at hand. The context's own header names the parent; a
   * header inherited through baggage names an ancestor further up.
   */
  private createFacadeParent(context: TracingSpanContext): FacadeSegment {
    return this.recorder.createFacadeSegment(
      TraceHeader.tryParse(context.toTraceId()),
    )
  }
}
