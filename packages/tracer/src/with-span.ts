import { LogFields, Tags } from './tags.js'
import type { Span } from './span.js'
import type { TagValue } from './tags.js'
import type { Tracer } from './tracer.js'
import type { TracingSpan, TracingSpanContext } from './types.js'

export interface WithSpanOptions {
  tags?: Record<string, TagValue>
  childOf?: TracingSpanContext | TracingSpan | null
}

function startScope(tracer: Tracer, name: string, options: WithSpanOptions) {
  const builder = tracer.buildSpan(name).asChildOf(options.childOf)
  for (const [key, value] of Object.entries(options.tags ?? {})) {
    builder.withTag(key, value)
  }
  return builder.startActive(true)
}

function recordError(span: Span, error: unknown): void {
  span.setTag(Tags.ERROR, true)
  if (error instanceof Error) {
    span.log({ [LogFields.ERROR_OBJECT]: error })
  } else {
    span.log({ [LogFields.EVENT]: `error`, [LogFields.MESSAGE]: String(error) })
  }
}

/**
 * Runs `fn` inside a new active span, finishing it when `fn` returns or
 * throws. Errors are recorded on the span and rethrown.
 */
export function withSpan<T>(
  tracer: Tracer,
  name: string,
  fn: (span: Span) => T,
  options: WithSpanOptions = {},
): T {
  return tracer.fork(() => {
    const scope = startScope(tracer, name, options)
    try {
      return fn(scope.span())
    } catch (error) {
      recordError(scope.span(), error)
      throw error
    } finally {
      scope.close()
    }
  })
}

export async function withSpanAsync<T>(
  tracer: Tracer,
  name: string,
  fn: (span: Span) => Promise<T>,
  options: WithSpanOptions = {},
): Promise<T> {
  return await tracer.fork(async () => {
    const scope = startScope(tracer, name, options)
    try {
      return await fn(scope.span())
    } catch (error) {
      recordError(scope.span(), error)
      throw error
    } finally {
      scope.close()
    }
  })
}
