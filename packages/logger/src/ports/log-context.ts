export type LogContext = {
  requestId: string
  traceId: string

  service: string
  module: string
  env: string

  /** Name of the batch loader or view emitting the entry. */
  loader: string
  /** Name of the view registry (source query) emitting the entry. */
  registry: string
}

export type LogOutcome = {
  batchSize: number
  durationMs: number
  records: number
  primed: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogOutcome> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
