/**
 * Structured fields a cache attaches to its log entries.
 *
 * @remarks
 * `domain` is the cache namespace, `operation` the public method being run
 * (`get`, `set`, `clear`, ...), `key` the caller's cache key and `path` the
 * resolved item file.
 */
export type LogContext = {
  service: string
  module: string

  domain: string
  operation: string
  key: string
  path: string
}

export type LogEvent = {
  err: unknown
  reason: string
  durationMs: number
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
