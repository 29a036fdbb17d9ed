/**
 * @arbor-trace/recorder
 *
 * The trace backend: a tree of segments and subsegments, a current-entity
 * pointer per async context, and emitters that hand finished trees to a
 * collector.
 *
 * @example
 * ```ts
 * import { InMemoryEmitter, Recorder } from '@arbor-trace/recorder'
 *
 * const emitter = new InMemoryEmitter()
 * const recorder = new Recorder({ emitter })
 *
 * const segment = recorder.beginSegment('checkout')
 * const query = recorder.beginSubsegment('load-cart')
 * query.sql.set('url', 'postgres://db/cart')
 * query.close()
 * segment.close()
 *
 * emitter.emitted.length // 1: the whole tree, sent once the segment closed
 * ```
 *
 * @packageDocumentation
 */

export { Recorder, type RecorderConfig } from './recorder.js'
export {
  Entity,
  FacadeSegment,
  Segment,
  Subsegment,
  attributeMapToObject,
  type DocumentOptions,
  type EntityLifecycle,
  type SegmentOptions,
} from './entity.js'
export {
  EntityContextStorage,
  LambdaContextResolver,
  resolveHostContext,
  type HostContext,
  type HostContextResolver,
} from './context.js'
export {
  TRACE_HEADER_KEY,
  TraceHeader,
  type SampleDecision,
} from './trace-header.js'
export {
  CONTEXT_MISSING_ENV,
  DAEMON_ADDRESS_ENV,
  DEFAULT_CONTEXT_MISSING_STRATEGY,
  DEFAULT_DAEMON_ADDRESS,
  parseContextMissingStrategy,
  parseDaemonAddress,
  readRecorderEnv,
  type RecorderEnvSettings,
} from './config.js'
export { describeException, parseStackFrames, MAX_STACK_FRAMES } from './exceptions.js'
export { isEntityId, isTraceId, newEntityId, newTraceId, nowSeconds } from './ids.js'
export { InMemoryEmitter, type EmittedDocument } from './emitters/memory.js'
export {
  DAEMON_PROTOCOL_HEADER,
  UdpEmitter,
  formatDaemonPacket,
  type UdpEmitterOptions,
} from './emitters/udp.js'
export { OpenTelemetryEmitter, entityAttributes } from './emitters/open-telemetry.js'
export type { Emitter } from './emitters/types.js'
export * from './errors.js'
export type * from './types.js'
