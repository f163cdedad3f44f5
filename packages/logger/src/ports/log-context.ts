/**
 * Fields a cache process binds onto its loggers.
 */
export type LogContext = {
  service: string
  env: string
  module: string

  /** Name of the cache instance emitting the entry. */
  cache: string

  /** Public cache operation in progress (`get`, `put`, `clear`, ...). */
  operation: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Overlay merged into an existing context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
