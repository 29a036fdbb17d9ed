import type { Segment, Subsegment } from '../entity.js'

/**
 * Transmits finished (or, on request, in-progress) entities to a collector.
 * Sends are best effort: the return value says whether the entity was handed
 * off, and failures are never thrown back to the caller.
 */
export interface Emitter {
  sendSegment: (segment: Segment) => boolean
  sendSubsegment: (subsegment: Subsegment) => boolean
}
