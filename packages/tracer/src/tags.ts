export type TagValue = string | number | boolean

/**
 * A tag key bound to the kind of value it takes, so `span.setTag(tag, value)`
 * is checked at compile time.
 */
export class StringTag {
  readonly kind = `string` as const
  constructor(readonly key: string) {}
}

export class NumberTag {
  readonly kind = `number` as const
  constructor(readonly key: string) {}
}

export class BooleanTag {
  readonly kind = `boolean` as const
  constructor(readonly key: string) {}
}

export type TypedTag = StringTag | NumberTag | BooleanTag

export type TagValueOf<TTag extends TypedTag> = TTag extends StringTag
  ? string
  : TTag extends NumberTag
    ? number
    : boolean

/**
 * Conventional tag keys. The `db.*` and `http.*` keys are stored in the
 * entity's `sql` and `http` containers rather than in metadata.
 */
export const Tags = {
  ERROR: new BooleanTag(`error`),
  DB_INSTANCE: new StringTag(`db.instance`),
  DB_STATEMENT: new StringTag(`db.statement`),
  DB_TYPE: new StringTag(`db.type`),
  DB_USER: new StringTag(`db.user`),
  DB_DRIVER: new StringTag(`db.driver`),
  DB_VERSION: new StringTag(`db.version`),
  HTTP_METHOD: new StringTag(`http.method`),
  HTTP_STATUS: new NumberTag(`http.status_code`),
  HTTP_URL: new StringTag(`http.url`),
  HTTP_CLIENT_IP: new StringTag(`http.client_ip`),
  HTTP_USER_AGENT: new StringTag(`http.user_agent`),
  HTTP_CONTENT_LENGTH: new NumberTag(`http.content_length`),
  VERSION: new StringTag(`version`),
} as const

/**
 * Tags that set fields on the trace entity itself instead of being stored
 * in one of its containers.
 */
export const SegmentTags = {
  FAULT: new BooleanTag(`fault`),
  THROTTLE: new BooleanTag(`throttle`),
  /** Root spans only */
  IS_SAMPLED: new BooleanTag(`isSampled`),
  /** Root spans only */
  USER: new StringTag(`user`),
  /** Root spans only */
  ORIGIN: new StringTag(`origin`),
  PARENT_ID: new StringTag(`parentId`),
} as const

export const MetadataNamespaces = {
  DEFAULT: `default`,
  LOG: `log`,
} as const

export const LogFields = {
  ERROR_KIND: `error.kind`,
  ERROR_OBJECT: `error.object`,
  EVENT: `event`,
  MESSAGE: `message`,
  STACK: `stack`,
} as const

export const REFERENCE_CHILD_OF = `child_of`
export const REFERENCE_FOLLOWS_FROM = `follows_from`

export const Formats = {
  TEXT_MAP: `text_map`,
  HTTP_HEADERS: `http_headers`,
  BINARY: `binary`,
} as const

export type Format = (typeof Formats)[keyof typeof Formats]
