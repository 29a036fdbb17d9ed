import { EntityAlreadyClosedError } from './errors.js'
import { describeException } from './exceptions.js'
import { newEntityId, newTraceId, nowSeconds } from './ids.js'
import { TraceHeader } from './trace-header.js'
import type {
  AttributeMap,
  AttributeValue,
  DocumentObject,
  DocumentValue,
  ExceptionDescription,
} from './types.js'

/**
 * Notified when an entity closes, so the owner can move the current-entity
 * pointer and transmit completed trees.
 */
export interface EntityLifecycle {
  onEntityClosed: (entity: Entity) => void
}

export interface DocumentOptions {
  /**
   * Serialize a subsegment on its own rather than embedded in its parent:
   * adds `type`, `trace_id` and `parent_id`.
   */
  standalone?: boolean
}

export function attributeMapToObject(map: AttributeMap): DocumentObject {
  const result: DocumentObject = {}
  for (const [key, value] of map) {
    result[key] = toDocumentValue(value)
  }
  return result
}

function toDocumentValue(value: AttributeValue): DocumentValue {
  if (value instanceof Map) return attributeMapToObject(value)
  if (Array.isArray(value)) return value.map(toDocumentValue)
  return value
}

/**
 * A node in the trace tree. Roots are `Segment`s, everything below them is a
 * `Subsegment`; a tree only ever has one parent per node.
 */
export abstract class Entity {
  readonly id: string
  startTime: number = nowSeconds()
  /** Filled in by `close()` unless set beforehand */
  endTime: number | undefined
  inProgress = false
  error = false
  fault = false
  throttle = false
  parentId: string | undefined

  readonly annotations: AttributeMap = new Map<string, AttributeValue>()
  readonly aws: AttributeMap = new Map<string, AttributeValue>()
  readonly http: AttributeMap = new Map<string, AttributeValue>()
  readonly sql: AttributeMap = new Map<string, AttributeValue>()
  readonly metadata = new Map<string, AttributeMap>()
  readonly cause: Array<ExceptionDescription> = []
  readonly subsegments: Array<Subsegment> = []

  private closed = false
  /** Set once the tree rooted here has been transmitted automatically */
  emitted = false

  constructor(
    readonly name: string,
    protected readonly lifecycle: EntityLifecycle,
    id: string = newEntityId(),
  ) {
    this.id = id
  }

  abstract get traceId(): string
  abstract get parent(): Entity | null
  abstract get rootSegment(): Segment

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * True once this entity and every entity below it have closed.
   */
  isTreeComplete(): boolean {
    return this.closed && this.subsegments.every((child) => child.isTreeComplete())
  }

  metadataNamespace(namespace: string): AttributeMap {
    let container = this.metadata.get(namespace)
    if (!container) {
      container = new Map<string, AttributeValue>()
      this.metadata.set(namespace, container)
    }
    return container
  }

  putMetadata(namespace: string, key: string, value: AttributeValue): void {
    this.metadataNamespace(namespace).set(key, value)
  }

  /**
   * Records an error with its parsed stack and marks the entity as faulted.
   */
  addException(error: Error): void {
    this.fault = true
    this.cause.push(describeException(error))
  }

  traceHeader(): TraceHeader {
    return new TraceHeader(
      this.traceId,
      this.id,
      this.rootSegment.sampled ? `sampled` : `not-sampled`,
    )
  }

  /**
   * Ends the entity. Throws if it was already closed.
   */
  close(): void {
    if (this.closed) {
      throw new EntityAlreadyClosedError(this.id, this.name)
    }
    this.closed = true
    if (this.endTime === undefined) {
      this.endTime = nowSeconds()
    }
    this.inProgress = false
    this.lifecycle.onEntityClosed(this)
  }

  toDocument(_options: DocumentOptions = {}): DocumentObject {
    const document: DocumentObject = {
      name: this.name,
      id: this.id,
      start_time: this.startTime,
    }

    if (this.inProgress) {
      document.in_progress = true
    } else if (this.endTime !== undefined) {
      document.end_time = this.endTime
    }
    if (this.parentId !== undefined) document.parent_id = this.parentId
    if (this.error) document.error = true
    if (this.fault) document.fault = true
    if (this.throttle) document.throttle = true

    const containers: Array<[string, AttributeMap]> = [
      [`annotations`, this.annotations],
      [`aws`, this.aws],
      [`http`, this.http],
      [`sql`, this.sql],
    ]
    for (const [name, container] of containers) {
      if (container.size > 0) document[name] = attributeMapToObject(container)
    }

    if (this.metadata.size > 0) {
      const metadata: DocumentObject = {}
      for (const [namespace, container] of this.metadata) {
        metadata[namespace] = attributeMapToObject(container)
      }
      document.metadata = metadata
    }

    if (this.cause.length > 0) {
      document.cause = {
        working_directory: process.cwd(),
        exceptions: this.cause.map(exceptionToDocument),
      }
    }

    if (this.subsegments.length > 0) {
      document.subsegments = this.subsegments.map((child) => child.toDocument())
    }

    return document
  }

  toJSON(): DocumentObject {
    return this.toDocument()
  }
}

function exceptionToDocument(exception: ExceptionDescription): DocumentObject {
  const stack: Array<DocumentValue> = exception.stack.map((frame) => {
    const entry: DocumentObject = { path: frame.path }
    if (frame.line !== undefined) entry.line = frame.line
    if (frame.label !== undefined) entry.label = frame.label
    return entry
  })
  const document: DocumentObject = {
    id: exception.id,
    type: exception.type,
    message: exception.message,
    stack,
  }
  if (exception.truncated !== undefined) document.truncated = exception.truncated
  return document
}

export interface SegmentOptions {
  /** Defaults to a new random id */
  id?: string
  traceId?: string
  parentId?: string
  sampled?: boolean
}

/**
 * Root of a trace tree.
 */
export class Segment extends Entity {
  private readonly segmentTraceId: string
  readonly service: AttributeMap = new Map<string, AttributeValue>()
  sampled: boolean
  user: string | undefined
  origin: string | undefined

  constructor(name: string, lifecycle: EntityLifecycle, options: SegmentOptions = {}) {
    super(name, lifecycle, options.id)
    this.segmentTraceId = options.traceId ?? newTraceId()
    this.parentId = options.parentId
    this.sampled = options.sampled ?? true
  }

  get traceId(): string {
    return this.segmentTraceId
  }

  get parent(): null {
    return null
  }

  get rootSegment(): Segment {
    return this
  }

  override toDocument(options: DocumentOptions = {}): DocumentObject {
    const document = super.toDocument(options)
    document.trace_id = this.traceId
    if (this.service.size > 0) document.service = attributeMapToObject(this.service)
    if (this.user !== undefined) document.user = this.user
    if (this.origin !== undefined) document.origin = this.origin
    return document
  }
}

/**
 * Stands in for a root segment that lives elsewhere: in a remote process, or
 * in the host runtime. Subsegments can hang off it, but the facade itself is
 * never transmitted; its children are sent individually instead.
 */
export class FacadeSegment extends Segment {}

/**
 * Any non-root node in a trace tree.
 */
export class Subsegment extends Entity {
  constructor(
    name: string,
    lifecycle: EntityLifecycle,
    private readonly parentEntity: Entity,
  ) {
    super(name, lifecycle)
    this.parentId = parentEntity.id
  }

  get traceId(): string {
    return this.parentEntity.traceId
  }

  get parent(): Entity {
    return this.parentEntity
  }

  get rootSegment(): Segment {
    return this.parentEntity.rootSegment
  }

  override toDocument(options: DocumentOptions = {}): DocumentObject {
    const document = super.toDocument(options)
    // Embedded subsegments take their position from the enclosing document
    if (!options.standalone) {
      if (this.parentId === this.parentEntity.id) delete document.parent_id
      return document
    }
    document.type = `subsegment`
    document.trace_id = this.traceId
    if (this.parentId !== undefined) document.parent_id = this.parentId
    return document
  }
}
