import { EntityAlreadyClosedError, Segment, Subsegment } from '@arbor-trace/recorder'
import { describe, expect, it } from 'vitest'
import {
  OperationNameImmutableError,
  SegmentTags,
  Tags,
  UnsupportedOperationError,
  getAttribute,
} from '../src/index.js'
import { createTestTracer } from './utils.js'

function startRootAndChild() {
  const context = createTestTracer()
  const root = context.tracer.buildSpan(`root`).start()
  const child = context.tracer.buildSpan(`child`).asChildOf(root).start()
  return { ...context, root, child }
}

describe(`Span`, () => {
  describe(`setTag`, () => {
    it(`stores dotted keys in the matching container`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.setTag(`http.request.method`, `POST`)

      expect(getAttribute(span.entity.http, [`request`, `method`])).toBe(`POST`)
    })

    it(`stores other keys as metadata`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.setTag(`foo`, 1).setTag(`widget.bar`, `x`)

      expect(span.entity.metadata.get(`default`)?.get(`foo`)).toBe(1)
      expect(span.entity.metadata.get(`widget`)?.get(`bar`)).toBe(`x`)
    })

    it(`stores metadata edge-case keys`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span
        .setTag(``, `empty`)
        .setTag(`metadata`, `literal`)
        .setTag(`metadata.foo`, `chomped`)
        .setTag(`metadata.bar.foo`, `namespaced`)

      const defaults = span.entity.metadata.get(`default`)
      expect(defaults?.get(``)).toBe(`empty`)
      expect(defaults?.get(`metadata`)).toBe(`literal`)
      expect(defaults?.get(`foo`)).toBe(`chomped`)
      expect(span.entity.metadata.get(`bar`)?.get(`foo`)).toBe(`namespaced`)
    })

    it(`translates conventional tags`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span
        .setTag(Tags.HTTP_STATUS, 503)
        .setTag(Tags.DB_STATEMENT, `SELECT 1`)
        .setTag(Tags.VERSION, `2.0.0`)

      expect(getAttribute(span.entity.http, [`response`, `status`])).toBe(503)
      expect(span.entity.sql.get(`sanitized_query`)).toBe(`SELECT 1`)
      expect(span.entity).toBeInstanceOf(Segment)
      if (span.entity instanceof Segment) {
        expect(span.entity.service.get(`version`)).toBe(`2.0.0`)
      }
    })

    it(`sets the fault flag without touching the error flag`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.setTag(`fault`, true)

      expect(span.entity.fault).toBe(true)
      expect(span.entity.error).toBe(false)
    })

    it(`sets the error flag without touching the fault flag`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.setTag(Tags.ERROR, true)

      expect(span.entity.error).toBe(true)
      expect(span.entity.fault).toBe(false)
    })

    it(`sets throttle and parent id on any entity`, () => {
      const { child } = startRootAndChild()

      child.setTag(SegmentTags.THROTTLE, true).setTag(`parentId`, `0f15eadda7879f1d`)

      expect(child.entity.throttle).toBe(true)
      expect(child.entity.parentId).toBe(`0f15eadda7879f1d`)
    })

    it(`sets user, origin and sampling on the root`, () => {
      const { root } = startRootAndChild()

      root
        .setTag(SegmentTags.USER, `test-user`)
        .setTag(SegmentTags.ORIGIN, `AWS::ECS::Container`)
        .setTag(SegmentTags.IS_SAMPLED, false)

      expect(root.entity).toBeInstanceOf(Segment)
      if (root.entity instanceof Segment) {
        expect(root.entity.user).toBe(`test-user`)
        expect(root.entity.origin).toBe(`AWS::ECS::Container`)
        expect(root.entity.sampled).toBe(false)
      }
      expect(root.entity.metadata.size).toBe(0)
    })

    it(`stores root-only tags as metadata on children`, () => {
      const { child } = startRootAndChild()

      child.setTag(`user`, `test-user`).setTag(`isSampled`, false)

      expect(child.entity).toBeInstanceOf(Subsegment)
      expect(child.entity.metadata.get(`default`)?.get(`user`)).toBe(`test-user`)
      expect(child.entity.metadata.get(`default`)?.get(`isSampled`)).toBe(false)
    })

    it(`stores special keys as metadata when the value kind does not match`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.setTag(`error`, `yes`).setTag(`fault`, 1)

      expect(span.entity.error).toBe(false)
      expect(span.entity.fault).toBe(false)
      expect(span.entity.metadata.get(`default`)?.get(`error`)).toBe(`yes`)
      expect(span.entity.metadata.get(`default`)?.get(`fault`)).toBe(1)
    })

    it(`ignores service data on children`, () => {
      const { root, child } = startRootAndChild()

      child.setTag(`version`, `1.0.0`)

      expect(child.entity.metadata.size).toBe(0)
      expect(root.entity).toBeInstanceOf(Segment)
      if (root.entity instanceof Segment) {
        expect(root.entity.service.size).toBe(0)
      }
    })

    it(`applies a record of tags with addTags`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.addTags({ 'annotations.tenant': `acme`, fault: true, retries: 2 })

      expect(span.entity.annotations.get(`tenant`)).toBe(`acme`)
      expect(span.entity.fault).toBe(true)
      expect(span.entity.metadata.get(`default`)?.get(`retries`)).toBe(2)
    })
  })

  describe(`log`, () => {
    it(`stores fields under the log namespace keyed by time`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.log(1551016321000000, { event: `cache-miss`, key: `cart` })

      const entry = span.entity.metadata.get(`log`)?.get(`2019-02-24T13:52:01.000Z`)
      expect(entry).toEqual(
        new Map([
          [`event`, `cache-miss`],
          [`key`, `cart`],
        ]),
      )
    })

    it(`keeps the structure of nested fields`, () => {
      const { tracer, emitter } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.log(1551016321000000, {
        payload: { id: 1, items: [`a`, { sku: `b` }] },
        reason: new TypeError(`bad input`),
      })
      span.finish(1551016322000000)

      expect(emitter.emitted[0]?.document.metadata).toEqual({
        log: {
          '2019-02-24T13:52:01.000Z': {
            payload: { id: 1, items: [`a`, { sku: `b` }] },
            reason: `TypeError: bad input`,
          },
        },
      })
    })

    it(`stores a plain event as a message`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.log(1551016321500000, `started`)

      const entry = span.entity.metadata.get(`log`)?.get(`2019-02-24T13:52:01.500Z`)
      expect(entry).toEqual(new Map([[`message`, `started`]]))
    })

    it(`uses the current time without a timestamp`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.log(`now`)

      const keys = [...(span.entity.metadata.get(`log`)?.keys() ?? [])]
      expect(keys).toHaveLength(1)
      expect(keys[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/)
    })

    it(`overwrites logs made in the same millisecond`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.log(1551016321000100, `first`)
      span.log(1551016321000900, `second`)

      const log = span.entity.metadata.get(`log`)
      expect(log?.size).toBe(1)
      expect(log?.get(`2019-02-24T13:52:01.000Z`)).toEqual(
        new Map([[`message`, `second`]]),
      )
    })

    it(`records error objects as exceptions`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.log({ 'error.object': new RangeError(`out of stock`), event: `error` })

      expect(span.entity.fault).toBe(true)
      expect(span.entity.cause).toHaveLength(1)
      expect(span.entity.cause[0]?.type).toBe(`RangeError`)
      expect(span.entity.cause[0]?.message).toBe(`out of stock`)
      expect(span.entity.metadata.has(`log`)).toBe(false)
    })

    it(`stores errors under other keys as text`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.log(1551016321000000, { reason: new TypeError(`bad input`) })

      expect(
        span.entity.metadata.get(`log`)?.get(`2019-02-24T13:52:01.000Z`),
      ).toEqual(new Map([[`reason`, `TypeError: bad input`]]))
      expect(span.entity.cause).toHaveLength(0)
    })
  })

  describe(`baggage`, () => {
    it(`passes through to the span context`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.setBaggageItem(`tenant`, `acme`)

      expect(span.getBaggageItem(`tenant`)).toBe(`acme`)
      expect(span.context().getBaggageItem(`tenant`)).toBe(`acme`)
      expect(span.getBaggageItem(`missing`)).toBeUndefined()
    })
  })

  describe(`setOperationName`, () => {
    it(`is not supported`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      expect(() => span.setOperationName(`renamed`)).toThrow(
        OperationNameImmutableError,
      )
      expect(() => span.setOperationName(`renamed`)).toThrow(
        UnsupportedOperationError,
      )
      expect(span.operationName).toBe(`op`)
    })
  })

  describe(`finish`, () => {
    it(`converts microseconds to seconds and closes the entity`, () => {
      const { tracer } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.finish(1551016322000000)

      expect(span.isFinished).toBe(true)
      expect(span.entity.isClosed).toBe(true)
      expect(span.entity.inProgress).toBe(false)
      expect(span.entity.endTime).toBe(1551016322)
    })

    it(`keeps an explicit timestamp of zero`, () => {
      const { tracer, emitter } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.finish(0)

      expect(span.entity.endTime).toBe(0)
      expect(emitter.emitted[0]?.document.end_time).toBe(0)
    })

    it(`only takes effect once`, () => {
      const { tracer, logger } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()

      span.finish(1551016322000000)
      span.finish(1551016399000000)
      span.finish()

      expect(span.entity.endTime).toBe(1551016322)
      expect(logger.error).not.toHaveBeenCalled()
    })

    it(`logs close failures instead of throwing`, () => {
      const { tracer, logger } = createTestTracer()
      const span = tracer.buildSpan(`op`).start()
      span.entity.close()

      expect(() => span.finish()).not.toThrow()
      expect(span.isFinished).toBe(true)
      expect(logger.error).toHaveBeenCalledWith(
        `[Span] Failed to close trace entity 'op':`,
        expect.any(EntityAlreadyClosedError),
      )
    })
  })
})
