export type LogContext = {
  service: string
  module: string
  env: string

  /** Parameter a log line is about */
  param: string
  /** Provider name, e.g. "env", "cli", "json-file" */
  provider: string
  /** Registry generation, bumped on every reset */
  generation: number

  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Fields merged into an existing context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
