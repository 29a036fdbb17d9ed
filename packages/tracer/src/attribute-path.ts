import { MetadataNamespaces } from './tags.js'

/**
 * Conventional tag keys that the backend stores somewhere other than where
 * their dotted name points.
 */
export const TAG_SYNONYMS: ReadonlyMap<string, string> = new Map([
  [`db.instance`, `sql.url`],
  [`db.statement`, `sql.sanitized_query`],
  [`db.type`, `sql.database_type`],
  [`db.user`, `sql.user`],
  [`db.driver`, `sql.driver_version`],
  [`db.version`, `sql.database_version`],
  [`http.method`, `http.request.method`],
  [`http.status_code`, `http.response.status`],
  [`http.url`, `http.request.url`],
  [`http.client_ip`, `http.request.client_ip`],
  [`http.user_agent`, `http.request.user_agent`],
  [`http.content_length`, `http.response.content_length`],
  [`version`, `service.version`],
])

export type DirectContainer = `annotations` | `aws` | `http` | `sql` | `service`

export type AttributeDestination =
  | { container: DirectContainer; keys: Array<string> }
  | { container: `metadata`; namespace: string; keys: Array<string> }

const DIRECT_CONTAINERS: ReadonlyArray<DirectContainer> = [
  `annotations`,
  `aws`,
  `http`,
  `sql`,
  `service`,
]

function isDirectContainer(value: string): value is DirectContainer {
  return DIRECT_CONTAINERS.some((container) => container === value)
}

// Trailing empty parts are dropped, but there is always at least one part
function splitKey(key: string): Array<string> {
  const parts = key.split(`.`)
  while (parts.length > 1 && parts[parts.length - 1] === ``) {
    parts.pop()
  }
  return parts
}

/**
 * Works out where a flat, dot-separated tag key is stored on a trace entity.
 *
 * Keys starting with `annotations`, `aws`, `http`, `sql` or `service` go to
 * that container. Everything else is metadata:
 *
 * ```
 * "foo"                     -> metadata, namespace "default", ["foo"]
 * "metadata.foo"            -> metadata, namespace "default", ["foo"]
 * "widget.bar"              -> metadata, namespace "widget", ["bar"]
 * "metadata.widget.bar.baz" -> metadata, namespace "widget", ["bar", "baz"]
 * ```
 */
export function resolveAttributePath(rawKey: string): AttributeDestination {
  const key = TAG_SYNONYMS.get(rawKey) ?? rawKey
  const parts = splitKey(key)
  const [first = ``, ...rest] = parts

  if (isDirectContainer(first)) {
    return { container: first, keys: rest }
  }

  // A leading "metadata" is only a marker when something follows it
  const metadataParts = first === `metadata` && rest.length > 0 ? rest : parts
  const [head = ``, ...nested] = metadataParts

  if (nested.length > 0) {
    return { container: `metadata`, namespace: head, keys: nested }
  }
  return {
    container: `metadata`,
    namespace: MetadataNamespaces.DEFAULT,
    keys: [head],
  }
}
