/**
 * Well-known fields carried by cache log entries.
 *
 * Every field is optional at the call site; components bind the stable ones
 * (`service`, `module`, `backend`) through `child()` and pass the per-call ones
 * (`op`, `key`, `layer`) as meta.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  backend: string
  namespace: string

  op: string
  key: string
  layer: number
}

export type LogOutcome = {
  durationMs: number
  timeoutMs: number
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
