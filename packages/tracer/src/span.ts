import { Segment, nowSeconds } from '@arbor-trace/recorder'
import type {
  AttributeMap,
  AttributeValue,
  Entity,
  Logger,
} from '@arbor-trace/recorder'
import { resolveAttributePath } from './attribute-path.js'
import { OperationNameImmutableError } from './errors.js'
import { projectAttribute } from './projection.js'
import { LogFields, MetadataNamespaces, SegmentTags, Tags } from './tags.js'
import type { SpanContext } from './span-context.js'
import type { TagValue, TagValueOf, TypedTag } from './tags.js'
import type { LogFieldValue, LogRecord, TracingSpan } from './types.js'

type SpanState = `open` | `finished`

function toLogAttribute(value: LogFieldValue): AttributeValue {
  if (value instanceof Error) return String(value)
  if (Array.isArray(value)) return value.map(toLogAttribute)
  if (typeof value === `object`) return toLogAttributes(value)
  return value
}

function toLogAttributes(fields: LogRecord): AttributeMap {
  const attributes = new Map<string, AttributeValue>()
  for (const [key, value] of Object.entries(fields)) {
    attributes.set(key, toLogAttribute(value))
  }
  return attributes
}

/**
 * Handle for one traced operation, wrapping a single trace entity.
 *
 * Tags are mapped onto the entity's containers (see `resolveAttributePath`),
 * logs are kept as metadata, and `finish` closes the entity exactly once.
 */
export class Span implements TracingSpan {
  private state: SpanState = `open`

  constructor(
    readonly entity: Entity,
    private readonly spanContext: SpanContext,
    private readonly logger: Logger = console,
  ) {}

  get operationName(): string {
    return this.entity.name
  }

  get isFinished(): boolean {
    return this.state === `finished`
  }

  context(): SpanContext {
    return this.spanContext
  }

  setTag(key: string, value: TagValue): this
  setTag<TTag extends TypedTag>(tag: TTag, value: TagValueOf<TTag>): this
  setTag(keyOrTag: string | TypedTag, value: TagValue): this {
    const key = typeof keyOrTag === `string` ? keyOrTag : keyOrTag.key
    if (typeof value === `string`) {
      this.setStringTag(key, value)
    } else if (typeof value === `boolean`) {
      this.setBooleanTag(key, value)
    } else {
      this.setAttribute(key, value)
    }
    return this
  }

  addTags(tags: Record<string, TagValue>): this {
    for (const [key, value] of Object.entries(tags)) {
      this.setTag(key, value)
    }
    return this
  }

  log(event: string): this
  log(fields: LogRecord): this
  log(timestampMicros: number, event: string): this
  log(timestampMicros: number, fields: LogRecord): this
  log(first: number | string | LogRecord, second?: string | LogRecord): this {
    const timestampMicros = typeof first === `number` ? first : undefined
    const payload = typeof first === `number` ? second : first
    const fields: LogRecord =
      typeof payload === `string`
        ? { [LogFields.MESSAGE]: payload }
        : (payload ?? {})

    const errorObject: LogFieldValue | undefined = fields[LogFields.ERROR_OBJECT]
    if (errorObject instanceof Error) {
      this.entity.addException(errorObject)
      return this
    }

    // Logs made within the same millisecond share a key; the last one wins
    const millis =
      timestampMicros === undefined ? Date.now() : Math.floor(timestampMicros / 1000)
    this.entity.putMetadata(
      MetadataNamespaces.LOG,
      new Date(millis).toISOString(),
      toLogAttributes(fields),
    )
    return this
  }

  setBaggageItem(key: string, value: string): this {
    this.spanContext.setBaggageItem(key, value)
    return this
  }

  getBaggageItem(key: string): string | undefined {
    return this.spanContext.getBaggageItem(key)
  }

  setOperationName(_operationName: string): this {
    throw new OperationNameImmutableError(this.entity.name)
  }

  /**
   * Ends the span, at `timestampMicros` (microseconds since the epoch) when
   * given. Only the first call has any effect, and it never throws.
   */
  finish(timestampMicros?: number): void {
    if (this.state === `finished`) return
    this.state = `finished`

    try {
      this.entity.endTime =
        timestampMicros === undefined ? nowSeconds() : timestampMicros / 1000 / 1000
      this.entity.close()
    } catch (error) {
      this.logger.error(
        `[Span] Failed to close trace entity '${this.entity.name}':`,
        error,
      )
    }
  }

  private setStringTag(key: string, value: string): void {
    const entity = this.entity
    if (key === SegmentTags.USER.key && entity instanceof Segment) {
      entity.user = value
    } else if (key === SegmentTags.ORIGIN.key && entity instanceof Segment) {
      entity.origin = value
    } else if (key === SegmentTags.PARENT_ID.key) {
      entity.parentId = value
    } else {
      this.setAttribute(key, value)
    }
  }

  private setBooleanTag(key: string, value: boolean): void {
    const entity = this.entity
    if (key === Tags.ERROR.key) {
      entity.error = value
    } else if (key === SegmentTags.FAULT.key) {
      entity.fault = value
    } else if (key === SegmentTags.THROTTLE.key) {
      entity.throttle = value
    } else if (key === SegmentTags.IS_SAMPLED.key && entity instanceof Segment) {
      entity.sampled = value
    } else {
      this.setAttribute(key, value)
    }
  }

  private setAttribute(key: string, value: TagValue): void {
    projectAttribute(this.entity, resolveAttributePath(key), value)
  }
}
