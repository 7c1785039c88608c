export type LogContext = {
  service: string
  version: string
  instanceId: string
  runId: string

  hook: string
  phase: string
  signal: string
}

export type LogEvent = {
  err: unknown
  durationMs: number
  timeoutMs: number
  hookCount: number
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
