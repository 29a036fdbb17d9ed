import { randomBytes } from 'node:crypto'

const TRACE_ID_PATTERN = /^1-[0-9a-f]{8}-[0-9a-f]{24}$/
const ENTITY_ID_PATTERN = /^[0-9a-f]{16}$/

/**
 * Trace ids look like `1-5c72a181-0123456789abcdef01234567`: a version, the
 * epoch second the trace started in (hex) and 96 random bits.
 */
export function newTraceId(epochSeconds: number = Date.now() / 1000): string {
  const time = Math.floor(epochSeconds).toString(16).padStart(8, `0`)
  return `1-${time}-${randomBytes(12).toString(`hex`)}`
}

export function newEntityId(): string {
  return randomBytes(8).toString(`hex`)
}

export function isTraceId(value: string): boolean {
  return TRACE_ID_PATTERN.test(value)
}

export function isEntityId(value: string): boolean {
  return ENTITY_ID_PATTERN.test(value)
}

export function nowSeconds(): number {
  return Date.now() / 1000
}
