import { Segment } from '@arbor-trace/recorder'
import type { AttributeMap, AttributeValue, Entity } from '@arbor-trace/recorder'
import type { AttributeDestination } from './attribute-path.js'

/**
 * Stores `value` under the nested key path, creating intermediate maps as
 * needed. A scalar standing where a map is needed is replaced by a map.
 */
export function putAttribute(
  target: AttributeMap,
  keys: ReadonlyArray<string>,
  value: AttributeValue,
): void {
  const [key, ...rest] = keys
  if (key === undefined) return

  if (rest.length === 0) {
    target.set(key, value)
    return
  }

  let child = target.get(key)
  if (!(child instanceof Map)) {
    child = new Map<string, AttributeValue>()
    target.set(key, child)
  }
  putAttribute(child, rest, value)
}

export function getAttribute(
  target: AttributeMap,
  keys: ReadonlyArray<string>,
): AttributeValue | undefined {
  const [key, ...rest] = keys
  if (key === undefined) return undefined

  const value = target.get(key)
  if (rest.length === 0) return value
  return value instanceof Map ? getAttribute(value, rest) : undefined
}

function containerFor(
  entity: Entity,
  destination: AttributeDestination,
  create: boolean,
): AttributeMap | undefined {
  switch (destination.container) {
    case `metadata`:
      return create
        ? entity.metadataNamespace(destination.namespace)
        : entity.metadata.get(destination.namespace)
    case `service`:
      // Service information only exists on the root of a trace
      return entity instanceof Segment ? entity.service : undefined
    default:
      return entity[destination.container]
  }
}

/**
 * Applies a resolved tag to the entity. Returns false when the destination
 * does not exist on this entity (service data on a non-root entity).
 */
export function projectAttribute(
  entity: Entity,
  destination: AttributeDestination,
  value: AttributeValue,
): boolean {
  const container = containerFor(entity, destination, true)
  if (!container) return false
  putAttribute(container, destination.keys, value)
  return true
}

export function readAttribute(
  entity: Entity,
  destination: AttributeDestination,
): AttributeValue | undefined {
  const container = containerFor(entity, destination, false)
  return container ? getAttribute(container, destination.keys) : undefined
}
