import { InvalidTraceHeaderError } from './errors.js'
import { isEntityId, isTraceId } from './ids.js'

export const TRACE_HEADER_KEY = `X-Amzn-Trace-Id`

export type SampleDecision = `sampled` | `not-sampled` | `requested` | `unknown`

const SAMPLE_DECISION_VALUES: Record<SampleDecision, string | undefined> = {
  sampled: `1`,
  "not-sampled": `0`,
  requested: `?`,
  unknown: undefined,
}

function parseSampleDecision(header: string, value: string): SampleDecision {
  switch (value) {
    case `1`:
      return `sampled`
    case `0`:
      return `not-sampled`
    case `?`:
      return `requested`
    default:
      throw new InvalidTraceHeaderError(header, `unknown Sampled value "${value}"`)
  }
}

/**
 * The `Root=…;Parent=…;Sampled=…` header used to carry a trace position
 * between processes and into hosted runtimes.
 */
export class TraceHeader {
  constructor(
    readonly rootTraceId?: string,
    readonly parentId?: string,
    readonly sampled: SampleDecision = `unknown`,
  ) {}

  static parse(header: string): TraceHeader {
    let rootTraceId: string | undefined
    let parentId: string | undefined
    let sampled: SampleDecision = `unknown`

    const parts = header
      .split(`;`)
      .map((part) => part.trim())
      .filter((part) => part.length > 0)

    if (parts.length === 0) {
      throw new InvalidTraceHeaderError(header, `header is empty`)
    }

    for (const part of parts) {
      const separator = part.indexOf(`=`)
      if (separator <= 0) {
        throw new InvalidTraceHeaderError(header, `expected key=value but got "${part}"`)
      }
      const key = part.slice(0, separator)
      const value = part.slice(separator + 1)

      if (key === `Root`) {
        if (!isTraceId(value)) {
          throw new InvalidTraceHeaderError(header, `malformed Root "${value}"`)
        }
        rootTraceId = value
      } else if (key === `Parent`) {
        if (!isEntityId(value)) {
          throw new InvalidTraceHeaderError(header, `malformed Parent "${value}"`)
        }
        parentId = value
      } else if (key === `Sampled`) {
        sampled = parseSampleDecision(header, value)
      }
      // Other keys (e.g. Self, Lineage) are added by intermediaries and are not
      // needed to position a trace entity
    }

    return new TraceHeader(rootTraceId, parentId, sampled)
  }

  /**
   * Like `parse`, but returns undefined for missing or malformed headers.
   */
  static tryParse(header: string | undefined): TraceHeader | undefined {
    if (header === undefined) return undefined
    try {
      return TraceHeader.parse(header)
    } catch (error) {
      if (error instanceof InvalidTraceHeaderError) return undefined
      throw error
    }
  }

  toString(): string {
    const parts: Array<string> = []
    if (this.rootTraceId !== undefined) parts.push(`Root=${this.rootTraceId}`)
    if (this.parentId !== undefined) parts.push(`Parent=${this.parentId}`)
    const sampled = SAMPLE_DECISION_VALUES[this.sampled]
    if (sampled !== undefined) parts.push(`Sampled=${sampled}`)
    return parts.join(`;`)
  }
}
