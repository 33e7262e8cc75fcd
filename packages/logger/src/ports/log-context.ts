export type LogContext = {
  module: string
  operation: string

  valueCount: number
  literalCount: number

  frozen: boolean
  cacheable: boolean
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by child().
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
