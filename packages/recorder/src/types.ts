export type AttributeScalar = string | number | boolean

/**
 * A value stored in one of an entity's attribute containers: a scalar, a
 * list, or a nested container. Nested containers are always `Map`s, so
 * `value instanceof Map` tells a container from anything else.
 */
export type AttributeValue = AttributeScalar | AttributeList | AttributeMap

// eslint-disable-next-line @typescript-eslint/no-empty-interface
export interface AttributeList extends Array<AttributeValue> {}

// eslint-disable-next-line @typescript-eslint/no-empty-interface
export interface AttributeMap extends Map<string, AttributeValue> {}

/**
 * JSON shape of a value once an entity is serialized for transmission.
 */
export type DocumentValue =
  | string
  | number
  | boolean
  | Array<DocumentValue>
  | DocumentObject

export interface DocumentObject {
  [key: string]: DocumentValue
}

export interface StackFrame {
  path: string
  line?: number
  label?: string
}

export interface ExceptionDescription {
  id: string
  type: string
  message: string
  stack: Array<StackFrame>
  /** Number of frames dropped from `stack` */
  truncated?: number
}

/**
 * Destination for diagnostics. Defaults to `console` everywhere.
 */
export type Logger = Pick<Console, `warn` | `error`>

export type ContextMissingStrategy = `LOG_ERROR` | `RUNTIME_ERROR` | `IGNORE_ERROR`

export interface DaemonAddress {
  host: string
  port: number
}
