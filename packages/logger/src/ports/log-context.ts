export type LogContext = {
  service: string
  module: string
  env: string

  /** Operation being performed when the entry was written */
  op: string

  /** Printed kind of the outermost error, set by the error reporter */
  errorKind: string
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
