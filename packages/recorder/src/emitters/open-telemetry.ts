import { SpanStatusCode, context, trace } from "@opentelemetry/api"
import type {
  Attributes,
  Context,
  Tracer as OtelTracer,
} from "@opentelemetry/api"
import { Segment } from "../entity.js"
import type { Entity, Subsegment } from "../entity.js"
import type { AttributeMap, AttributeValue } from "../types.js"
import type { Emitter } from "./types.js"

function flattenValue(
  attributes: Attributes,
  path: string,
  value: AttributeValue
): void {
  if (value instanceof Map) {
    flattenInto(attributes, path, value)
  } else if (Array.isArray(value)) {
    // Lists can mix types, which OpenTelemetry array attributes cannot
    value.forEach((item, index) => flattenValue(attributes, `${path}.${index}`, item))
  } else {
    attributes[path] = value
  }
}

function flattenInto(
  attributes: Attributes,
  prefix: string,
  container: AttributeMap
): void {
  for (const [key, value] of container) {
    flattenValue(attributes, `${prefix}.${key}`, value)
  }
}

/**
 * Flattens an entity's containers back into dotted attribute keys, e.g. the
 * http container's `request.method` becomes `http.request.method` and the
 * `widget` metadata namespace's `bar` becomes `metadata.widget.bar`.
 */
export function entityAttributes(entity: Entity): Attributes {
  const attributes: Attributes = {
    "trace.entity_id": entity.id,
    "trace.trace_id": entity.traceId,
  }
  if (entity.error) attributes[`trace.error`] = true
  if (entity.fault) attributes[`trace.fault`] = true
  if (entity.throttle) attributes[`trace.throttle`] = true

  flattenInto(attributes, `annotations`, entity.annotations)
  flattenInto(attributes, `aws`, entity.aws)
  flattenInto(attributes, `http`, entity.http)
  flattenInto(attributes, `sql`, entity.sql)
  for (const [namespace, container] of entity.metadata) {
    flattenInto(attributes, `metadata.${namespace}`, container)
  }

  if (entity instanceof Segment) {
    flattenInto(attributes, `service`, entity.service)
    if (entity.user !== undefined) attributes[`trace.user`] = entity.user
    if (entity.origin !== undefined) attributes[`trace.origin`] = entity.origin
  }
  return attributes
}

/**
 * Replays finished trace trees as OpenTelemetry spans, so entities recorded
 * through this package can flow into an existing OpenTelemetry pipeline.
 * In-progress entities are skipped: an OpenTelemetry span cannot be updated
 * once it has ended.
 */
export class OpenTelemetryEmitter implements Emitter {
  constructor(private otelTracer: OtelTracer) {}

  sendSegment(segment: Segment): boolean {
    return this.replayRoot(segment)
  }

  sendSubsegment(subsegment: Subsegment): boolean {
    return this.replayRoot(subsegment)
  }

  private replayRoot(entity: Entity): boolean {
    if (entity.inProgress) return false
    this.replay(entity, context.active())
    return true
  }

  private replay(entity: Entity, parentContext: Context): void {
    const span = this.otelTracer.startSpan(
      entity.name,
      {
        startTime: new Date(entity.startTime * 1000),
        attributes: entityAttributes(entity),
      },
      parentContext
    )

    if (entity.error || entity.fault) {
      span.setStatus({ code: SpanStatusCode.ERROR })
    }
    for (const exception of entity.cause) {
      span.recordException({ name: exception.type, message: exception.message })
    }

    // Child spans nest under this one
    const childContext = trace.setSpan(parentContext, span)
    for (const child of entity.subsegments) {
      if (!child.inProgress) {
        this.replay(child, childContext)
      }
    }

    span.end(
      entity.endTime === undefined ? undefined : new Date(entity.endTime * 1000)
    )
  }
}
