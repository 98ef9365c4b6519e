/**
 * Structured fields the engine binds onto its loggers.
 *
 * @remarks
 * Stores bind `component` and `cache` / `limitName` once at construction;
 * pipelines add `operation`, `backend`, `key` or `identifier` per call.
 */
export type LogContext = {
  component: string
  cache: string
  limitName: string

  backend: string
  operation: string
  key: string
  identifier: string

  service: string
  env: string
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
