/**
 * @arbor-trace/tracer
 *
 * A vendor-neutral span API (spans, span contexts, scopes and tags) on top
 * of the segment/subsegment trace entities of `@arbor-trace/recorder`.
 *
 * @example
 * ```ts
 * import { Recorder } from '@arbor-trace/recorder'
 * import { Tags, Tracer } from '@arbor-trace/tracer'
 *
 * const tracer = new Tracer(Recorder.fromEnv())
 *
 * const scope = tracer.buildSpan('checkout').startActive(true)
 * scope.span().setTag(Tags.HTTP_METHOD, 'POST') // http.request.method
 *
 * const query = tracer.buildSpan('load-cart').start() // child of checkout
 * query.setTag(Tags.DB_STATEMENT, 'SELECT * FROM cart WHERE id = ?')
 * query.finish()
 *
 * scope.close()
 * ```
 *
 * @packageDocumentation
 */

export { Tracer, type TracerOptions } from './tracer.js'
export { SpanBuilder } from './span-builder.js'
export { Span } from './span.js'
export { SpanContext, type TraceHeaderSource } from './span-context.js'
export { Scope, ScopeManager } from './scope.js'
export { withSpan, withSpanAsync, type WithSpanOptions } from './with-span.js'
export {
  TAG_SYNONYMS,
  resolveAttributePath,
  type AttributeDestination,
  type DirectContainer,
} from './attribute-path.js'
export {
  getAttribute,
  projectAttribute,
  putAttribute,
  readAttribute,
} from './projection.js'
export {
  BooleanTag,
  Formats,
  LogFields,
  MetadataNamespaces,
  NumberTag,
  REFERENCE_CHILD_OF,
  REFERENCE_FOLLOWS_FROM,
  SegmentTags,
  StringTag,
  Tags,
  type Format,
  type TagValue,
  type TagValueOf,
  type TypedTag,
} from './tags.js'
export * from './errors.js'
export type * from './types.js'
