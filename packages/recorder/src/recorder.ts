import {
  DEFAULT_CONTEXT_MISSING_STRATEGY,
  DEFAULT_DAEMON_ADDRESS,
  parseDaemonAddress,
  readRecorderEnv,
} from './config.js'
import {
  EntityContextStorage,
  LambdaContextResolver,
  resolveHostContext,
} from './context.js'
import { FacadeSegment, Segment, Subsegment } from './entity.js'
import { UdpEmitter } from './emitters/udp.js'
import { ContextMissingError } from './errors.js'
import { newTraceId } from './ids.js'
import type { HostContext, HostContextResolver } from './context.js'
import type { Emitter } from './emitters/types.js'
import type { Entity, EntityLifecycle, SegmentOptions } from './entity.js'
import type { TraceHeader } from './trace-header.js'
import type {
  ContextMissingStrategy,
  DaemonAddress,
  Logger,
} from './types.js'

export interface RecorderConfig {
  /** Where finished entities go. Defaults to a `UdpEmitter` for `daemonAddress`. */
  emitter?: Emitter
  daemonAddress?: string | DaemonAddress
  /** What `beginSubsegment` does when nothing is active. Defaults to `LOG_ERROR`. */
  contextMissingStrategy?: ContextMissingStrategy
  /** Defaults to detecting function-as-a-service hosts from the environment. */
  hostContextResolvers?: Array<HostContextResolver>
  logger?: Logger
}

/**
 * Entry point to the trace backend: creates entities, tracks the current
 * entity per async context and hands completed trees to the emitter.
 */
export class Recorder implements EntityLifecycle {
  readonly emitter: Emitter
  readonly contextMissingStrategy: ContextMissingStrategy
  readonly logger: Logger
  private readonly hostContextResolvers: Array<HostContextResolver>
  private readonly context = new EntityContextStorage()

  constructor(config: RecorderConfig = {}) {
    this.logger = config.logger ?? console
    this.contextMissingStrategy =
      config.contextMissingStrategy ?? DEFAULT_CONTEXT_MISSING_STRATEGY
    this.hostContextResolvers = config.hostContextResolvers ?? [
      new LambdaContextResolver(),
    ]

    if (config.emitter) {
      this.emitter = config.emitter
    } else {
      const address =
        typeof config.daemonAddress === `object`
          ? config.daemonAddress
          : parseDaemonAddress(config.daemonAddress ?? DEFAULT_DAEMON_ADDRESS)
      this.emitter = new UdpEmitter({ address, logger: this.logger })
    }
  }

  /**
   * Builds a recorder from `AWS_XRAY_DAEMON_ADDRESS` and
   * `AWS_XRAY_CONTEXT_MISSING`; explicit config wins over the environment.
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    config: RecorderConfig = {},
  ): Recorder {
    const settings = readRecorderEnv(env)
    return new Recorder({
      hostContextResolvers: [new LambdaContextResolver(env)],
      ...settings,
      ...config,
    })
  }

  getTraceEntity(): Entity | null {
    return this.context.get()
  }

  setTraceEntity(entity: Entity | null): void {
    this.context.set(entity)
  }

  /**
   * Runs `fn` in a new async context that starts with the caller's current
   * entity. Changes to the current entity inside `fn` stay inside it.
   */
  runInContext<T>(fn: () => T): T {
    return this.context.run(fn)
  }

  resolveHostContext(): HostContext | undefined {
    return resolveHostContext(this.hostContextResolvers)
  }

  /**
   * Starts a new trace and makes its root segment the current entity.
   */
  beginSegment(name: string, options: SegmentOptions = {}): Segment {
    const segment = new Segment(name, this, options)
    this.setTraceEntity(segment)
    return segment
  }

  /**
   * Creates a subsegment under the current entity and makes it current.
   * Without a current entity the host context is used; failing that, the
   * context missing strategy decides.
   */
  beginSubsegment(name: string): Subsegment {
    let parent = this.getTraceEntity()

    if (!parent) {
      const hostContext = this.resolveHostContext()
      if (hostContext) {
        parent = this.createFacadeSegment(hostContext.traceHeader)
      } else {
        parent = this.handleContextMissing(name)
      }
    }

    const subsegment = new Subsegment(name, this, parent)
    parent.subsegments.push(subsegment)
    this.setTraceEntity(subsegment)
    return subsegment
  }

  /**
   * Placeholder for a parent that lives outside this process. The facade
   * takes the header's root trace id and uses its parent id as its own id,
   * so subsegments sent from under it point at the real parent. Without a
   * header a fresh trace is started.
   */
  createFacadeSegment(header?: TraceHeader): FacadeSegment {
    return new FacadeSegment(`facade`, this, {
      id: header?.parentId,
      traceId: header?.rootTraceId ?? newTraceId(),
      sampled: header?.sampled !== `not-sampled`,
    })
  }

  sendSegment(segment: Segment): boolean {
    if (segment instanceof FacadeSegment || !segment.sampled) return false
    return this.emit(segment.name, () => this.emitter.sendSegment(segment))
  }

  sendSubsegment(subsegment: Subsegment): boolean {
    if (!subsegment.rootSegment.sampled) return false
    return this.emit(subsegment.name, () => this.emitter.sendSubsegment(subsegment))
  }

  onEntityClosed(entity: Entity): void {
    if (this.getTraceEntity() === entity) {
      this.setTraceEntity(entity.parent)
    }

    const root = entity.rootSegment
    if (root instanceof FacadeSegment) {
      // The facade's owner sends the root, so emit the top-most local
      // subsegment once everything under it is done
      const topLevel = topLevelSubsegment(entity)
      if (topLevel && !topLevel.emitted && topLevel.isTreeComplete()) {
        topLevel.emitted = true
        this.sendSubsegment(topLevel)
      }
    } else if (!root.emitted && root.isTreeComplete()) {
      root.emitted = true
      this.sendSegment(root)
    }
  }

  private emit(name: string, send: () => boolean): boolean {
    try {
      return send()
    } catch (error) {
      this.logger.error(`[Recorder] Failed to emit '${name}':`, error)
      return false
    }
  }

  private handleContextMissing(name: string): FacadeSegment {
    const error = new ContextMissingError(name)
    if (this.contextMissingStrategy === `RUNTIME_ERROR`) {
      throw error
    }
    if (this.contextMissingStrategy === `LOG_ERROR`) {
      this.logger.error(`[Recorder] ${error.message}`)
    }
    // Detached and unsampled, so nothing recorded under it is transmitted
    return new FacadeSegment(`detached`, this, { sampled: false })
  }
}

function topLevelSubsegment(entity: Entity): Subsegment | undefined {
  let current: Entity = entity
  while (current instanceof Subsegment) {
    if (current.parent instanceof FacadeSegment) return current
    current = current.parent
  }
  return undefined
}
