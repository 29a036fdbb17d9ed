import type { Segment, Subsegment } from '../entity.js'
import type { DocumentObject } from '../types.js'
import type { Emitter } from './types.js'

export interface EmittedDocument {
  kind: `segment` | `subsegment`
  document: DocumentObject
}

/**
 * Keeps serialized documents in memory instead of sending them anywhere.
 * Useful in tests and for local inspection.
 */
export class InMemoryEmitter implements Emitter {
  readonly emitted: Array<EmittedDocument> = []

  sendSegment(segment: Segment): boolean {
    this.emitted.push({ kind: `segment`, document: segment.toDocument() })
    return true
  }

  sendSubsegment(subsegment: Subsegment): boolean {
    this.emitted.push({
      kind: `subsegment`,
      document: subsegment.toDocument({ standalone: true }),
    })
    return true
  }

  clear(): void {
    this.emitted.length = 0
  }
}
