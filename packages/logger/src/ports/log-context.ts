export type LogContext = {
  service: string
  module: string
  env: string

  /** Logical cache name, usually the keyspace prefix it owns. */
  cache: string
  /** Secondary index involved in the operation. */
  index: string
  /** Backing server rendered as `host:port/db`. */
  server: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
