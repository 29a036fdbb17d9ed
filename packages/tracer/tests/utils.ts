import { vi } from 'vitest'
import { InMemoryEmitter, Recorder } from '@arbor-trace/recorder'
import { Tracer } from '../src/index.js'
import type { Logger, RecorderConfig } from '@arbor-trace/recorder'

export const ROOT_TRACE_ID = `1-5c72a181-0123456789abcdef01234567`
export const PARENT_ID = `0f15eadda7879f1d`
export const TRACE_HEADER = `Root=${ROOT_TRACE_ID};Parent=${PARENT_ID};Sampled=1`

export function createLogger(): Logger {
  return { warn: vi.fn(), error: vi.fn() }
}

/**
 * A tracer over an in-memory recorder that sees no host environment.
 */
export function createTestTracer(config: RecorderConfig = {}) {
  const emitter = new InMemoryEmitter()
  const logger = createLogger()
  const recorder = new Recorder({
    emitter,
    logger,
    hostContextResolvers: [],
    ...config,
  })
  const tracer = new Tracer(recorder)
  return { tracer, recorder, emitter, logger }
}
