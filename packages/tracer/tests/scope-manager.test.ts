import { describe, expect, it } from 'vitest'
import { Scope, SpanContext } from '../src/index.js'
import type { TracingSpan } from '../src/index.js'
import { createTestTracer } from './utils.js'

function createForeignSpan(): TracingSpan {
  const context = new SpanContext(`0f15eadda7879f1d`)
  const span: TracingSpan = {
    context: () => context,
    setTag: () => span,
    setBaggageItem: () => span,
    getBaggageItem: () => undefined,
    finish: () => {},
  }
  return span
}

describe(`ScopeManager`, () => {
  it(`has no active scope at first`, () => {
    const { tracer } = createTestTracer()
    const scopes = tracer.scopeManager()

    expect(scopes.active()).toBeNull()
    expect(scopes.activeSpan()).toBeNull()
  })

  it(`activates a span and keeps the recorder in step`, () => {
    const { tracer, recorder } = createTestTracer()
    const scopes = tracer.scopeManager()
    const span = tracer.buildSpan(`op`).start()

    const scope = scopes.activate(span)

    expect(scope).toBeInstanceOf(Scope)
    expect(scopes.active()).toBe(scope)
    expect(scopes.activeSpan()).toBe(span)
    expect(recorder.getTraceEntity()).toBe(span.entity)
  })

  it(`restores the previous scope on close`, () => {
    const { tracer, recorder } = createTestTracer()
    const scopes = tracer.scopeManager()
    const outer = scopes.activateSpan(tracer.buildSpan(`outer`).start())
    const inner = scopes.activateSpan(tracer.buildSpan(`inner`).start())

    expect(inner.previous).toBe(outer)

    inner.close()
    expect(scopes.active()).toBe(outer)
    expect(recorder.getTraceEntity()).toBe(outer.span().entity)

    outer.close()
    expect(scopes.active()).toBeNull()
    expect(recorder.getTraceEntity()).toBeNull()
  })

  it(`leaves the span open on close by default`, () => {
    const { tracer } = createTestTracer()
    const span = tracer.buildSpan(`op`).start()

    tracer.scopeManager().activate(span)?.close()

    expect(span.isFinished).toBe(false)
  })

  it(`finishes the span on close when asked to`, () => {
    const { tracer } = createTestTracer()
    const span = tracer.buildSpan(`op`).start()

    tracer.scopeManager().activate(span, true)?.close()

    expect(span.isFinished).toBe(true)
  })

  it(`warns and returns the current scope for foreign spans`, () => {
    const { tracer, logger } = createTestTracer()
    const scopes = tracer.scopeManager()
    const current = scopes.activateSpan(tracer.buildSpan(`op`).start())

    const result = scopes.activate(createForeignSpan())

    expect(result).toBe(current)
    expect(scopes.active()).toBe(current)
    expect(logger.warn).toHaveBeenCalledWith(
      `[ScopeManager] Cannot activate span: expected a Span but got Object`,
    )
  })

  it(`warns instead of throwing for spans without a prototype`, () => {
    const { tracer, logger } = createTestTracer()
    const current = tracer.activateSpan(tracer.buildSpan(`op`).start())
    const bare: TracingSpan = Object.assign(Object.create(null), createForeignSpan())

    expect(tracer.activateSpan(bare)).toBe(current)
    expect(logger.warn).toHaveBeenCalledWith(
      `[ScopeManager] Cannot activate span: expected a Span but got an object without a prototype`,
    )
  })

  it(`returns the current scope for null without warning`, () => {
    const { tracer, logger } = createTestTracer()

    expect(tracer.scopeManager().activate(null)).toBeNull()
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it(`does not check that scopes close in order`, () => {
    const { tracer, recorder } = createTestTracer()
    const scopes = tracer.scopeManager()
    const outer = scopes.activateSpan(tracer.buildSpan(`outer`).start())
    const inner = scopes.activateSpan(tracer.buildSpan(`inner`).start())

    outer.close()
    expect(scopes.active()).toBeNull()
    expect(recorder.getTraceEntity()).toBeNull()

    inner.close()
    expect(scopes.active()).toBe(outer)
  })

  it(`borrows the recorder's current entity`, () => {
    const { tracer, recorder } = createTestTracer()
    const scopes = tracer.scopeManager()
    const span = tracer.buildSpan(`op`).start()

    const seen = scopes.withTraceEntity(span.entity, () => recorder.getTraceEntity())

    expect(seen).toBe(span.entity)
    expect(recorder.getTraceEntity()).toBeNull()
  })

  it(`restores the recorder's entity when the borrower throws`, () => {
    const { tracer, recorder } = createTestTracer()
    const scopes = tracer.scopeManager()
    const span = tracer.buildSpan(`op`).start()

    expect(() =>
      scopes.withTraceEntity(span.entity, () => {
        throw new Error(`boom`)
      }),
    ).toThrow(`boom`)
    expect(recorder.getTraceEntity()).toBeNull()
  })

  describe(`fork`, () => {
    it(`starts with the caller's scope and keeps its own activations`, () => {
      const { tracer, recorder } = createTestTracer()
      const outer = tracer.buildSpan(`outer`).startActive()

      tracer.fork(() => {
        expect(tracer.activeSpan()).toBe(outer.span())
        const inner = tracer.buildSpan(`inner`).startActive()
        expect(tracer.activeSpan()).toBe(inner.span())
        expect(recorder.getTraceEntity()).toBe(inner.span().entity)
      })

      expect(tracer.activeSpan()).toBe(outer.span())
      expect(recorder.getTraceEntity()).toBe(outer.span().entity)
    })

    it(`keeps concurrent tasks apart`, async () => {
      const { tracer } = createTestTracer()
      const root = tracer.buildSpan(`root`).startActive()

      const task = (name: string) =>
        tracer.fork(async () => {
          const scope = tracer.buildSpan(name).startActive()
          await new Promise((resolve) => setTimeout(resolve, 5))
          const child = tracer.buildSpan(`${name}-child`).start()
          const active = tracer.activeSpan()
          scope.close()
          return { scope, child, active }
        })

      const [first, second] = await Promise.all([task(`first`), task(`second`)])

      expect(first.active).toBe(first.scope.span())
      expect(second.active).toBe(second.scope.span())
      expect(first.child.entity.parent).toBe(first.scope.span().entity)
      expect(second.child.entity.parent).toBe(second.scope.span().entity)
      expect(first.scope.span().entity.parent).toBe(root.span().entity)
      expect(second.scope.span().entity.parent).toBe(root.span().entity)
      expect(tracer.activeSpan()).toBe(root.span())
    })

    it(`lets one finish win when tasks race`, async () => {
      const { tracer, logger } = createTestTracer()
      const span = tracer.buildSpan(`shared`).start()

      await Promise.all([
        tracer.fork(async () => {
          await Promise.resolve()
          span.finish(1551016322000000)
        }),
        tracer.fork(async () => {
          await Promise.resolve()
          span.finish(1551016323000000)
        }),
      ])

      expect(span.entity.endTime).toBe(1551016322)
      expect(logger.error).not.toHaveBeenCalled()
    })
  })
})
