import { AsyncLocalStorage } from 'node:async_hooks'
import { TraceHeader } from './trace-header.js'
import type { Entity } from './entity.js'

interface EntitySlot {
  entity: Entity | null
}

/**
 * Holds the current trace entity for each async context.
 *
 * Code that never calls `run` shares one process-wide slot. `run` starts a
 * new context seeded with the caller's entity; changes made inside it are
 * not visible to the caller, and vice versa.
 */
export class EntityContextStorage {
  private readonly storage = new AsyncLocalStorage<EntitySlot>()
  private readonly rootSlot: EntitySlot = { entity: null }

  private slot(): EntitySlot {
    return this.storage.getStore() ?? this.rootSlot
  }

  get(): Entity | null {
    return this.slot().entity
  }

  set(entity: Entity | null): void {
    this.slot().entity = entity
  }

  run<T>(fn: () => T): T {
    return this.storage.run({ entity: this.get() }, fn)
  }
}

/**
 * A top-level segment supplied by the execution environment, outside of
 * anything this process created.
 */
export interface HostContext {
  readonly source: string
  readonly traceHeader: TraceHeader | undefined
}

export interface HostContextResolver {
  resolve: () => HostContext | undefined
}

/**
 * Function-as-a-service runtimes open a segment per invocation and pass its
 * position in `_X_AMZN_TRACE_ID`.
 */
export class LambdaContextResolver implements HostContextResolver {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  resolve(): HostContext | undefined {
    if (!this.env.LAMBDA_TASK_ROOT) return undefined
    return {
      source: `lambda`,
      traceHeader: TraceHeader.tryParse(this.env._X_AMZN_TRACE_ID),
    }
  }
}

export function resolveHostContext(
  resolvers: ReadonlyArray<HostContextResolver>,
): HostContext | undefined {
  for (const resolver of resolvers) {
    const context = resolver.resolve()
    if (context) return context
  }
  return undefined
}
