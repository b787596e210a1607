/**
 * Fields a resolution attaches to its log entries.
 *
 * `field` is the dotted path being resolved, `path` the file being read and
 * `origin` how that file was chosen ("override" or "manifest").
 */
export type LogContext = {
  service: string
  module: string
  env: string

  field: string
  path: string
  origin: string
  stage: string
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
